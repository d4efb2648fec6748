import type { Address, CampaignStatus, FundingModel } from "../crowdfunding/types.js";

/**
 * Condensed view of one campaign for the admin dashboard
 */
export interface CampaignSummary {
  id: number;
  name: string;
  creator: Address;
  token: Address;
  fundingModel: FundingModel;
  status: CampaignStatus;
  effectiveStatus: CampaignStatus;
  disputed: boolean;
  fundingGoal: bigint;
  totalDonations: bigint;
  fundingProgress: bigint;
  donorCount: number;
  withdrawableBalance: bigint;
  feeOutstanding: bigint;
}

/**
 * Per-token money totals across all campaigns using that token
 */
export interface TokenTotals {
  token: Address;
  campaigns: number;
  totalDonations: bigint;
  withdrawableBalance: bigint;
  feeOutstanding: bigint;
  /** Fees swept to admins so far */
  feesCollected: bigint;
  totalRefunded: bigint;
  totalWithdrawn: bigint;
}

/**
 * Platform-wide statistics
 */
export interface DashboardStats {
  totalCampaigns: number;
  activeCampaigns: number;
  successfulCampaigns: number;
  failedCampaigns: number;
  deletedCampaigns: number;
  disputedCampaigns: number;
  platformFeeBps: number;
  tokens: TokenTotals[];
}
