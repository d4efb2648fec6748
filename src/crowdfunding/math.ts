import { ConservationViolationError, InvalidInputError } from "./errors.js";

/** 10000 basis points = 100% */
export const BASIS_POINTS = 10_000n;
export const MAX_BASIS_POINTS = 10_000;
export const MAX_UINT256 = (1n << 256n) - 1n;

function assertUnsigned(value: bigint, label: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new ConservationViolationError(`${label} is outside the unsigned 256-bit range`, { value });
  }
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  assertUnsigned(a, "Left operand");
  assertUnsigned(b, "Right operand");
  const sum = a + b;
  if (sum > MAX_UINT256) {
    throw new ConservationViolationError("Arithmetic overflow", { value: sum });
  }
  return sum;
}

export function checkedSub(a: bigint, b: bigint): bigint {
  assertUnsigned(a, "Left operand");
  assertUnsigned(b, "Right operand");
  if (b > a) {
    throw new ConservationViolationError("Arithmetic underflow", { value: a - b });
  }
  return a - b;
}

export function checkedMul(a: bigint, b: bigint): bigint {
  assertUnsigned(a, "Left operand");
  assertUnsigned(b, "Right operand");
  const product = a * b;
  if (product > MAX_UINT256) {
    throw new ConservationViolationError("Arithmetic overflow", { value: product });
  }
  return product;
}

/** floor(amount * rateBps / 10000) */
export function feeOf(amount: bigint, rateBps: number): bigint {
  return checkedMul(amount, BigInt(rateBps)) / BASIS_POINTS;
}

export function assertBasisPoints(rate: number, max: number = MAX_BASIS_POINTS): void {
  if (!Number.isInteger(max) || max < 0 || max > MAX_BASIS_POINTS) {
    throw new InvalidInputError(`Maximum fee rate must be an integer in [0, ${MAX_BASIS_POINTS}]`, { value: max });
  }
  if (!Number.isInteger(rate) || rate < 0 || rate > max) {
    throw new InvalidInputError(`Fee rate must be an integer in [0, ${max}] basis points`, { value: rate });
  }
}
