import { PublicKey } from "@solana/web3.js";
import { InvalidInputError } from "./errors.js";
import type { Address } from "./types.js";

export function isAddress(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

export function assertAddress(value: string, label: string): Address {
  if (!isAddress(value)) {
    throw new InvalidInputError(`${label} is not a valid address`, { value });
  }
  return value;
}
