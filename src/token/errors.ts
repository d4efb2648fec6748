export class TokenTransferError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenTransferError";
  }
}
