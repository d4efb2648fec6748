import dotenv from "dotenv";
import { DEFAULT_PLATFORM_CONFIG, validatePlatformConfig } from "./crowdfunding/config.js";
import { InvalidInputError } from "./crowdfunding/errors.js";
import type { PlatformConfig } from "./crowdfunding/types.js";

dotenv.config();

export const RPC_URL =
  process.env.SOLANA_RPC_URL?.trim() || "https://api.testnet.solana.com";

function readInteger(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`${key} must be a non-negative integer`, { value: raw });
  }
  return Number(raw);
}

function readAmount(env: NodeJS.ProcessEnv, key: string, fallback: bigint): bigint {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`${key} must be a non-negative integer`, { value: raw });
  }
  return BigInt(raw);
}

/** Platform constants from the environment, falling back to the built-in defaults */
export function loadPlatformConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  return validatePlatformConfig({
    minFundingPeriod: readInteger(env, "MIN_FUNDING_PERIOD_SECONDS", DEFAULT_PLATFORM_CONFIG.minFundingPeriod),
    maxFundingPeriod: readInteger(env, "MAX_FUNDING_PERIOD_SECONDS", DEFAULT_PLATFORM_CONFIG.maxFundingPeriod),
    minFundingGoal: readAmount(env, "MIN_FUNDING_GOAL", DEFAULT_PLATFORM_CONFIG.minFundingGoal),
    defaultPlatformFeeBps: readInteger(env, "DEFAULT_PLATFORM_FEE_BPS", DEFAULT_PLATFORM_CONFIG.defaultPlatformFeeBps),
    maxPlatformFeeBps: readInteger(env, "MAX_PLATFORM_FEE_BPS", DEFAULT_PLATFORM_CONFIG.maxPlatformFeeBps),
    refundGracePeriod: readInteger(env, "REFUND_GRACE_PERIOD_SECONDS", DEFAULT_PLATFORM_CONFIG.refundGracePeriod)
  });
}
