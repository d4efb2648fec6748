import type { Address, CampaignStatus } from "./types.js";

export type CampaignEvent =
  | { type: "campaign_created"; campaignId: number; creator: Address; token: Address; fundingGoal: bigint; platformFeeBps: number }
  | { type: "campaign_updated"; campaignId: number }
  | { type: "end_time_changed"; campaignId: number; previousEndTime: number; endTime: number }
  | { type: "campaign_cancelled"; campaignId: number }
  | { type: "donation_received"; campaignId: number; donor: Address; amount: bigint; fee: bigint }
  | { type: "status_changed"; campaignId: number; from: CampaignStatus; to: CampaignStatus }
  | { type: "goal_reached"; campaignId: number; totalDonations: bigint }
  | { type: "refund_claimed"; campaignId: number; donor: Address; amount: bigint }
  | { type: "funds_withdrawn"; campaignId: number; creator: Address; amount: bigint }
  | { type: "campaign_disputed"; campaignId: number }
  | { type: "dispute_resolved"; campaignId: number; favorCreator: boolean }
  | { type: "platform_fee_rate_changed"; previousRateBps: number; rateBps: number }
  | { type: "platform_fees_collected"; token: Address; amount: bigint; recipient: Address }
  | { type: "emergency_withdrawal"; token: Address; amount: bigint; recipient: Address };

export type CampaignEventListener = (event: CampaignEvent) => void;

function formatField(value: unknown): string {
  return typeof value === "bigint" ? value.toString() : String(value);
}

/** Writes each event as one line, e.g. `[crowdfunding] donation_received campaignId=1 amount=600` */
export const consoleEventLogger: CampaignEventListener = (event) => {
  const fields = Object.entries(event)
    .filter(([key]) => key !== "type")
    .map(([key, value]) => `${key}=${formatField(value)}`)
    .join(" ");
  console.log(`[crowdfunding] ${event.type} ${fields}`);
};
