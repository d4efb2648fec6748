import { InvalidInputError } from "./errors.js";
import { assertBasisPoints } from "./math.js";
import type { PlatformConfig } from "./types.js";

const DAY_SECONDS = 86_400;

export const DEFAULT_PLATFORM_CONFIG: Readonly<PlatformConfig> = {
  minFundingPeriod: DAY_SECONDS,
  maxFundingPeriod: 90 * DAY_SECONDS,
  minFundingGoal: 100n,
  defaultPlatformFeeBps: 100,
  maxPlatformFeeBps: 1_000,
  refundGracePeriod: 30 * DAY_SECONDS
};

export function validatePlatformConfig(config: PlatformConfig): PlatformConfig {
  if (!Number.isInteger(config.minFundingPeriod) || config.minFundingPeriod <= 0) {
    throw new InvalidInputError("minFundingPeriod must be a positive integer", { value: config.minFundingPeriod });
  }
  if (!Number.isInteger(config.maxFundingPeriod) || config.maxFundingPeriod < config.minFundingPeriod) {
    throw new InvalidInputError("maxFundingPeriod must be an integer >= minFundingPeriod", { value: config.maxFundingPeriod });
  }
  if (config.minFundingGoal <= 0n) {
    throw new InvalidInputError("minFundingGoal must be > 0", { value: config.minFundingGoal });
  }
  if (!Number.isInteger(config.refundGracePeriod) || config.refundGracePeriod < 0) {
    throw new InvalidInputError("refundGracePeriod must be a non-negative integer", { value: config.refundGracePeriod });
  }
  assertBasisPoints(config.defaultPlatformFeeBps, config.maxPlatformFeeBps);
  return config;
}
