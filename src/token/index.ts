export { InMemoryTokenVault, CUSTODY } from "./memory.js";
export { TokenTransferError } from "./errors.js";
export {
  MintDirectory,
  inspectTokenAccount,
  describeAccount,
  TOKEN_PROGRAM_ID,
  TOKEN_2022_PROGRAM_ID,
  type AccountReader,
  type TokenAccountInspection
} from "./inspect.js";
