import type { CrowdfundingPlatform } from "../crowdfunding/platform.js";
import type { Address, CampaignStatus } from "../crowdfunding/types.js";
import type { CampaignSummary, DashboardStats, TokenTotals } from "./types.js";

/**
 * AdminDashboard is a read-only view over the platform ledger for reviewing campaigns,
 * disputes and per-token money flows.
 */
export class AdminDashboard {
  private readonly platform: CrowdfundingPlatform;

  constructor(platform: CrowdfundingPlatform) {
    this.platform = platform;
  }

  /**
   * All campaign ids ever created, oldest first
   */
  listCampaigns(): number[] {
    const ids: number[] = [];
    for (let id = 1; id <= this.platform.getLatestCampaignId(); id++) ids.push(id);
    return ids;
  }

  getCampaignSummary(campaignId: number): CampaignSummary {
    const info = this.platform.getCampaignInfo(campaignId);
    return {
      id: info.campaign.id,
      name: info.campaign.name,
      creator: info.campaign.creator,
      token: info.campaign.token,
      fundingModel: info.campaign.fundingModel,
      status: info.campaign.status,
      effectiveStatus: info.effectiveStatus,
      disputed: info.campaign.disputed,
      fundingGoal: info.campaign.fundingGoal,
      totalDonations: info.balance.totalDonations,
      fundingProgress: info.fundingProgress,
      donorCount: info.donorCount,
      withdrawableBalance: info.balance.withdrawableBalance,
      feeOutstanding: info.feeOutstanding
    };
  }

  /**
   * List campaigns whose effective status (time-based transitions applied) matches
   */
  listCampaignsByStatus(status: CampaignStatus): number[] {
    return this.listCampaigns().filter(id => this.platform.getCampaignInfo(id).effectiveStatus === status);
  }

  listDisputedCampaigns(): number[] {
    return this.listCampaigns().filter(id => this.platform.getCampaign(id).disputed);
  }

  getTokenTotals(token: Address): TokenTotals {
    const totals: TokenTotals = {
      token,
      campaigns: 0,
      totalDonations: 0n,
      withdrawableBalance: 0n,
      feeOutstanding: 0n,
      feesCollected: this.platform.getCollectedFees(token),
      totalRefunded: 0n,
      totalWithdrawn: 0n
    };

    for (const id of this.platform.getCampaignsByToken(token)) {
      const info = this.platform.getCampaignInfo(id);
      totals.campaigns++;
      totals.totalDonations += info.balance.totalDonations;
      totals.withdrawableBalance += info.balance.withdrawableBalance;
      totals.feeOutstanding += info.feeOutstanding;
      totals.totalRefunded += info.balance.totalRefunded;
      totals.totalWithdrawn += info.balance.totalWithdrawn;
    }
    return totals;
  }

  getDashboardStats(): DashboardStats {
    const stats: DashboardStats = {
      totalCampaigns: 0,
      activeCampaigns: 0,
      successfulCampaigns: 0,
      failedCampaigns: 0,
      deletedCampaigns: 0,
      disputedCampaigns: 0,
      platformFeeBps: this.platform.getPlatformFeeRate(),
      tokens: []
    };
    const tokens = new Set<Address>();

    for (const id of this.listCampaigns()) {
      const info = this.platform.getCampaignInfo(id);
      stats.totalCampaigns++;
      if (info.campaign.disputed) stats.disputedCampaigns++;
      tokens.add(info.campaign.token);

      switch (info.effectiveStatus) {
        case "active":
          stats.activeCampaigns++;
          break;
        case "successful":
          stats.successfulCampaigns++;
          break;
        case "failed":
          stats.failedCampaigns++;
          break;
        case "deleted":
          stats.deletedCampaigns++;
          break;
      }
    }

    stats.tokens = Array.from(tokens, token => this.getTokenTotals(token));
    return stats;
  }
}
