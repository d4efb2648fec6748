import type { Address, TokenRegistry, TokenTransfers } from "../crowdfunding/types.js";
import { TokenTransferError } from "./errors.js";

/** Custody account key used for balances held by the platform itself */
export const CUSTODY = "custody" as const;

/**
 * In-process token ledger: registered tokens, holder balances and the platform's custody balance.
 */
export class InMemoryTokenVault implements TokenRegistry, TokenTransfers {
  private readonly balances = new Map<Address, Map<Address, bigint>>();

  registerToken(token: Address): void {
    if (!this.balances.has(token)) {
      this.balances.set(token, new Map());
    }
  }

  isContract(token: Address): boolean {
    return this.balances.has(token);
  }

  mint(token: Address, holder: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new TokenTransferError("Mint amount must be > 0");
    }
    const holders = this.requireToken(token);
    holders.set(holder, (holders.get(holder) ?? 0n) + amount);
  }

  balanceOf(token: Address, holder: Address): bigint {
    return this.balances.get(token)?.get(holder) ?? 0n;
  }

  custodyBalance(token: Address): bigint {
    return this.balanceOf(token, CUSTODY);
  }

  pull(token: Address, from: Address, amount: bigint): void {
    this.move(token, from, CUSTODY, amount);
  }

  push(token: Address, to: Address, amount: bigint): void {
    this.move(token, CUSTODY, to, amount);
  }

  private move(token: Address, from: Address, to: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new TokenTransferError("Transfer amount must be > 0");
    }
    const holders = this.requireToken(token);
    const available = holders.get(from) ?? 0n;
    if (available < amount) {
      throw new TokenTransferError(`Insufficient ${token} balance for ${from}: has ${available}, needs ${amount}`);
    }
    holders.set(from, available - amount);
    holders.set(to, (holders.get(to) ?? 0n) + amount);
  }

  private requireToken(token: Address): Map<Address, bigint> {
    const holders = this.balances.get(token);
    if (!holders) {
      throw new TokenTransferError(`Unknown token ${token}`);
    }
    return holders;
  }
}
