import { describe, expect, it } from "vitest";
import { DEFAULT_PLATFORM_CONFIG } from "../src/crowdfunding/config.js";
import { InvalidInputError } from "../src/crowdfunding/errors.js";
import { RPC_URL, loadPlatformConfig } from "../src/env.js";

describe("env", () => {
  it("uses testnet RPC by default", () => {
    expect(RPC_URL).toBe("https://api.testnet.solana.com");
  });

  it("falls back to the built-in platform constants", () => {
    expect(loadPlatformConfig({})).toEqual(DEFAULT_PLATFORM_CONFIG);
  });

  it("reads overrides from the environment", () => {
    const config = loadPlatformConfig({
      MIN_FUNDING_GOAL: "5000",
      DEFAULT_PLATFORM_FEE_BPS: " 250 ",
      REFUND_GRACE_PERIOD_SECONDS: "0"
    });
    expect(config.minFundingGoal).toBe(5_000n);
    expect(config.defaultPlatformFeeBps).toBe(250);
    expect(config.refundGracePeriod).toBe(0);
    expect(config.maxFundingPeriod).toBe(DEFAULT_PLATFORM_CONFIG.maxFundingPeriod);
  });

  it("rejects malformed or inconsistent values", () => {
    expect(() => loadPlatformConfig({ MIN_FUNDING_GOAL: "-1" })).toThrow(InvalidInputError);
    expect(() => loadPlatformConfig({ MAX_PLATFORM_FEE_BPS: "1.5" })).toThrow(/must be a non-negative integer/);
    expect(() => loadPlatformConfig({ DEFAULT_PLATFORM_FEE_BPS: "2000" })).toThrow(/Fee rate must be an integer in \[0, 1000\]/);
    expect(() => loadPlatformConfig({ MAX_PLATFORM_FEE_BPS: "20000" })).toThrow(/Maximum fee rate/);
    expect(() => loadPlatformConfig({ MAX_FUNDING_PERIOD_SECONDS: "60" })).toThrow(/maxFundingPeriod/);
  });
});
