import { describe, expect, it } from "vitest";
import { evaluateStatus, fundingProgress, hasEnded } from "../../src/crowdfunding/lifecycle.js";
import type { CampaignStatus, FundingModel } from "../../src/crowdfunding/types.js";

function campaign(status: CampaignStatus, fundingModel: FundingModel = "all_or_nothing") {
  return { status, fundingModel, fundingGoal: 1_000n, endTime: 2_000 };
}

describe("campaign lifecycle", () => {
  it("stays active below the goal before the deadline", () => {
    expect(evaluateStatus(campaign("active"), { totalDonations: 999n }, 1_500)).toBe("active");
  });

  it("succeeds exactly at the goal", () => {
    expect(evaluateStatus(campaign("active"), { totalDonations: 1_000n }, 1_500)).toBe("successful");
  });

  it("fails an all-or-nothing campaign that ended under goal", () => {
    expect(evaluateStatus(campaign("active"), { totalDonations: 600n }, 2_000)).toBe("active");
    expect(evaluateStatus(campaign("active"), { totalDonations: 600n }, 2_001)).toBe("failed");
  });

  it("never fails a keep-what-you-raise campaign on time alone", () => {
    expect(evaluateStatus(campaign("active", "keep_what_you_raise"), { totalDonations: 300n }, 9_999)).toBe("active");
  });

  it("treats successful, failed and deleted as terminal", () => {
    expect(evaluateStatus(campaign("failed"), { totalDonations: 5_000n }, 1_500)).toBe("failed");
    expect(evaluateStatus(campaign("deleted"), { totalDonations: 0n }, 9_999)).toBe("deleted");
    expect(evaluateStatus(campaign("successful"), { totalDonations: 1_000n }, 9_999)).toBe("successful");
  });

  it("ends strictly after the end time", () => {
    expect(hasEnded({ endTime: 2_000 }, 2_000)).toBe(false);
    expect(hasEnded({ endTime: 2_000 }, 2_001)).toBe(true);
  });

  it("reports truncated funding progress", () => {
    expect(fundingProgress({ fundingGoal: 1_000n }, { totalDonations: 600n })).toBe(60n);
    expect(fundingProgress({ fundingGoal: 3n }, { totalDonations: 2n })).toBe(66n);
    expect(fundingProgress({ fundingGoal: 1_000n }, { totalDonations: 2_500n })).toBe(250n);
    expect(fundingProgress({ fundingGoal: 0n }, { totalDonations: 10n })).toBe(0n);
  });
});
