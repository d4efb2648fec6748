import type { BalanceLedger, Campaign, CampaignStatus } from "./types.js";

export function hasEnded(campaign: Pick<Campaign, "endTime">, now: number): boolean {
  return now > campaign.endTime;
}

/**
 * Single source of truth for automatic status transitions.
 * Successful, Failed and Deleted are terminal and returned unchanged.
 */
export function evaluateStatus(
  campaign: Pick<Campaign, "status" | "fundingGoal" | "fundingModel" | "endTime">,
  ledger: Pick<BalanceLedger, "totalDonations">,
  now: number
): CampaignStatus {
  if (campaign.status !== "active") return campaign.status;

  if (ledger.totalDonations >= campaign.fundingGoal) {
    return "successful";
  }
  if (campaign.fundingModel === "all_or_nothing" && hasEnded(campaign, now)) {
    return "failed";
  }
  return "active";
}

/** totalDonations * 100 / fundingGoal, truncated; 0 when there is no goal */
export function fundingProgress(campaign: Pick<Campaign, "fundingGoal">, ledger: Pick<BalanceLedger, "totalDonations">): bigint {
  if (campaign.fundingGoal === 0n) return 0n;
  return (ledger.totalDonations * 100n) / campaign.fundingGoal;
}
