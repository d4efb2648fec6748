import { describe, expect, it } from "vitest";
import { AdminDashboard } from "../../src/admin/dashboard.js";
import { END, setupPlatform } from "../helpers/fixtures.js";

describe("admin dashboard", () => {
  function populated() {
    const fixture = setupPlatform();
    const { platform, createCampaign, creator, donorA, donorB, admin, otherToken } = fixture;

    const funded = createCampaign();
    const underfunded = createCampaign();
    const cancelled = createCampaign();
    const disputed = createCampaign({ token: otherToken, fundingModel: "keep_what_you_raise" });

    platform.donate(donorA, funded, 600n);
    platform.donate(donorB, funded, 400n);
    platform.donate(donorA, underfunded, 200n);
    platform.cancelCampaign(creator, cancelled);
    platform.donate(donorB, disputed, 500n);
    platform.flagCampaignAsDisputed(admin, disputed);

    return { ...fixture, funded, underfunded, cancelled, disputed, dashboard: new AdminDashboard(platform) };
  }

  it("lists every campaign in creation order", () => {
    const { dashboard } = populated();
    expect(dashboard.listCampaigns()).toEqual([1, 2, 3, 4]);
  });

  it("summarises a single campaign", () => {
    const { dashboard, funded, creator, token } = populated();
    expect(dashboard.getCampaignSummary(funded)).toEqual({
      id: funded,
      name: "Community garden",
      creator,
      token,
      fundingModel: "all_or_nothing",
      status: "successful",
      effectiveStatus: "successful",
      disputed: false,
      fundingGoal: 1_000n,
      totalDonations: 1_000n,
      fundingProgress: 100n,
      donorCount: 2,
      withdrawableBalance: 990n,
      feeOutstanding: 10n
    });
  });

  it("groups campaigns by effective status", () => {
    const { dashboard, clock, funded, underfunded, cancelled, disputed } = populated();

    expect(dashboard.listCampaignsByStatus("active")).toEqual([underfunded, disputed]);
    clock.set(END + 1);
    expect(dashboard.listCampaignsByStatus("failed")).toEqual([underfunded]);
    expect(dashboard.listCampaignsByStatus("successful")).toEqual([funded]);
    expect(dashboard.listCampaignsByStatus("deleted")).toEqual([cancelled]);
    expect(dashboard.listDisputedCampaigns()).toEqual([disputed]);
  });

  it("aggregates platform statistics per token", () => {
    const { dashboard, platform, admin, token, otherToken } = populated();
    platform.collectPlatformFees(admin, token);

    const stats = dashboard.getDashboardStats();
    expect(stats).toMatchObject({
      totalCampaigns: 4,
      activeCampaigns: 2,
      successfulCampaigns: 1,
      failedCampaigns: 0,
      deletedCampaigns: 1,
      disputedCampaigns: 1,
      platformFeeBps: 100
    });
    expect(stats.tokens).toEqual([
      {
        token,
        campaigns: 3,
        totalDonations: 1_200n,
        withdrawableBalance: 1_188n,
        feeOutstanding: 0n,
        feesCollected: 12n,
        totalRefunded: 0n,
        totalWithdrawn: 0n
      },
      {
        token: otherToken,
        campaigns: 1,
        totalDonations: 500n,
        withdrawableBalance: 495n,
        feeOutstanding: 5n,
        feesCollected: 0n,
        totalRefunded: 0n,
        totalWithdrawn: 0n
      }
    ]);
  });
});
