/** Base58 public key of a wallet, program or token mint */
export type Address = string;

export interface Clock {
  now(): number;
}

export type FundingModel = "all_or_nothing" | "keep_what_you_raise";

export type CampaignStatus = "active" | "successful" | "failed" | "deleted";

export interface CampaignDetails {
  name: string;
  description: string;
  url: string;
  imageUrl: string;
}

export interface CreateCampaignInput extends CampaignDetails {
  startTime: number;
  endTime: number;
  fundingGoal: bigint;
  fundingModel: FundingModel;
  token: Address;
}

export interface Campaign extends CampaignDetails {
  id: number;
  creator: Address;
  /** Fee rate captured when the campaign was created; later rate changes never touch it */
  platformFeeBps: number;
  disputed: boolean;
  startTime: number;
  endTime: number;
  fundingGoal: bigint;
  fundingModel: FundingModel;
  token: Address;
  status: CampaignStatus;
}

export interface BalanceLedger {
  /** Gross amount ever donated */
  totalDonations: bigint;
  /** Fees computed at donation time */
  feeAccrued: bigint;
  /** Fees already swept by an admin */
  feeCollected: bigint;
  /** Net amount still held for the creator or refund claimants */
  withdrawableBalance: bigint;
  totalRefunded: bigint;
  totalWithdrawn: bigint;
}

export interface DonorRecord {
  totalDonated: bigint;
  refundClaimed: bigint;
}

export interface PlatformConfig {
  minFundingPeriod: number;
  maxFundingPeriod: number;
  minFundingGoal: bigint;
  defaultPlatformFeeBps: number;
  maxPlatformFeeBps: number;
  refundGracePeriod: number;
}

/** Consolidated view returned by `getCampaignInfo` */
export interface CampaignInfo {
  campaign: Campaign;
  balance: BalanceLedger;
  /** Status after evaluating time-based transitions at the current time */
  effectiveStatus: CampaignStatus;
  fundingProgress: bigint;
  donorCount: number;
  feeOutstanding: bigint;
}

/** Identity checks the ledger consults; role administration lives elsewhere */
export interface AccessControl {
  isAdmin(address: Address): boolean;
  isOwner(address: Address): boolean;
}

export interface PauseGate {
  isPaused(): boolean;
}

export interface TokenRegistry {
  /** True when the address is a deployed token, not a plain wallet */
  isContract(token: Address): boolean;
}

/**
 * Token movement between holders and the platform's custody.
 * Each call either moves the full amount or throws; there are no partial transfers.
 */
export interface TokenTransfers {
  pull(token: Address, from: Address, amount: bigint): void;
  push(token: Address, to: Address, amount: bigint): void;
}
