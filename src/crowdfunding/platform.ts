import { assertAddress } from "./address.js";
import { DEFAULT_PLATFORM_CONFIG, validatePlatformConfig } from "./config.js";
import {
  AuthorizationError,
  InvalidInputError,
  InvalidStateError,
  TemporalViolationError
} from "./errors.js";
import type { CampaignEvent, CampaignEventListener } from "./events.js";
import {
  emptyBalance,
  emptyDonorRecord,
  feeOutstanding,
  recordDonation,
  recordDonorContribution,
  recordDonorRefund,
  recordFeeCollection,
  recordRefund,
  recordWithdrawal,
  refundableAmount
} from "./ledger.js";
import { evaluateStatus, fundingProgress, hasEnded } from "./lifecycle.js";
import { assertBasisPoints, checkedAdd, checkedSub, feeOf } from "./math.js";
import type {
  AccessControl,
  Address,
  BalanceLedger,
  Campaign,
  CampaignDetails,
  CampaignInfo,
  CampaignStatus,
  Clock,
  CreateCampaignInput,
  DonorRecord,
  PauseGate,
  PlatformConfig,
  TokenRegistry,
  TokenTransfers
} from "./types.js";

export interface CrowdfundingPlatformOptions {
  clock: Clock;
  access: AccessControl;
  pause: PauseGate;
  tokenRegistry: TokenRegistry;
  transfers: TokenTransfers;
  config?: Partial<PlatformConfig>;
  listeners?: CampaignEventListener[];
}

const FUNDING_MODELS = new Set(["all_or_nothing", "keep_what_you_raise"]);

/**
 * Campaign ledger: lifecycle, balance accounting, donor records and fee sweeps.
 *
 * Every entry point validates and computes the next state into fresh values first, then
 * performs its one token movement, then commits. A throw before the commit leaves no trace.
 * Events are delivered to listeners only after the commit; a listener that throws is logged and cannot undo or fail the call.
 */
export class CrowdfundingPlatform {
  private readonly clock: Clock;
  private readonly access: AccessControl;
  private readonly pause: PauseGate;
  private readonly tokenRegistry: TokenRegistry;
  private readonly transfers: TokenTransfers;
  private readonly config: PlatformConfig;
  private readonly listeners: CampaignEventListener[];

  private readonly campaigns = new Map<number, Campaign>();
  private readonly balances = new Map<number, BalanceLedger>();
  private readonly donorRecords = new Map<number, Map<Address, DonorRecord>>();
  private readonly donors = new Map<number, Address[]>();
  private readonly createdBy = new Map<Address, number[]>();
  private readonly donatedBy = new Map<Address, number[]>();
  private readonly campaignsByToken = new Map<Address, number[]>();
  private readonly collectedFees = new Map<Address, bigint>();
  private latestCampaignId = 0;
  private platformFeeBps: number;

  constructor(options: CrowdfundingPlatformOptions) {
    this.clock = options.clock;
    this.access = options.access;
    this.pause = options.pause;
    this.tokenRegistry = options.tokenRegistry;
    this.transfers = options.transfers;
    this.config = validatePlatformConfig({ ...DEFAULT_PLATFORM_CONFIG, ...options.config });
    this.listeners = [...(options.listeners ?? [])];
    this.platformFeeBps = this.config.defaultPlatformFeeBps;
  }

  /** Returns a function that removes the listener */
  subscribe(listener: CampaignEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  // ---------------------------------------------------------------------------
  // Campaign creation and metadata
  // ---------------------------------------------------------------------------

  createCampaign(caller: Address, input: CreateCampaignInput): number {
    this.assertNotPaused();
    this.assertDuration(input.startTime, input.endTime);
    if (input.fundingGoal < this.config.minFundingGoal) {
      throw new InvalidInputError(`Funding goal must be at least ${this.config.minFundingGoal}`, {
        value: input.fundingGoal
      });
    }
    if (!FUNDING_MODELS.has(input.fundingModel)) {
      throw new InvalidInputError("Unknown funding model", { value: input.fundingModel });
    }
    const token = assertAddress(input.token, "Token");
    if (!this.tokenRegistry.isContract(token)) {
      throw new InvalidInputError("Token is not a deployed token contract", { value: token });
    }

    const id = this.latestCampaignId + 1;
    const campaign: Campaign = {
      id,
      creator: caller,
      platformFeeBps: this.platformFeeBps,
      disputed: false,
      startTime: input.startTime,
      endTime: input.endTime,
      name: input.name,
      description: input.description,
      url: input.url,
      imageUrl: input.imageUrl,
      fundingGoal: input.fundingGoal,
      fundingModel: input.fundingModel,
      token,
      status: "active"
    };

    this.latestCampaignId = id;
    this.campaigns.set(id, campaign);
    appendTo(this.createdBy, caller, id);
    appendTo(this.campaignsByToken, token, id);

    this.emit([
      {
        type: "campaign_created",
        campaignId: id,
        creator: caller,
        token,
        fundingGoal: input.fundingGoal,
        platformFeeBps: campaign.platformFeeBps
      }
    ]);
    return id;
  }

  updateCampaignDetails(caller: Address, campaignId: number, details: CampaignDetails): void {
    this.assertNotPaused();
    const campaign = this.requireEditable(caller, campaignId);

    campaign.name = details.name;
    campaign.description = details.description;
    campaign.url = details.url;
    campaign.imageUrl = details.imageUrl;

    this.emit([{ type: "campaign_updated", campaignId }]);
  }

  changeEndTime(caller: Address, campaignId: number, newEndTime: number): void {
    this.assertNotPaused();
    const campaign = this.requireEditable(caller, campaignId);
    if (!Number.isInteger(newEndTime) || newEndTime <= this.clock.now()) {
      throw new InvalidInputError("End time must be in the future", { campaignId, value: newEndTime });
    }
    this.assertDuration(campaign.startTime, newEndTime, campaignId);

    const previousEndTime = campaign.endTime;
    campaign.endTime = newEndTime;

    this.emit([{ type: "end_time_changed", campaignId, previousEndTime, endTime: newEndTime }]);
  }

  cancelCampaign(caller: Address, campaignId: number): void {
    this.assertNotPaused();
    const campaign = this.requireCampaign(campaignId);
    this.assertCreator(campaign, caller);
    this.assertActive(campaign, this.effectiveStatus(campaignId));
    if (this.balanceOf(campaignId).totalDonations !== 0n) {
      throw new InvalidStateError("Campaign has already received donations", { campaignId });
    }

    campaign.status = "deleted";

    this.emit([
      { type: "status_changed", campaignId, from: "active", to: "deleted" },
      { type: "campaign_cancelled", campaignId }
    ]);
  }

  // ---------------------------------------------------------------------------
  // Funds
  // ---------------------------------------------------------------------------

  donate(caller: Address, campaignId: number, amount: bigint): void {
    this.assertNotPaused();
    const campaign = this.requireCampaign(campaignId);
    this.assertNotDisputed(campaign);
    if (amount <= 0n) {
      throw new InvalidInputError("Donation must be > 0", { campaignId, value: amount });
    }
    this.assertActive(campaign);
    const now = this.clock.now();
    if (now < campaign.startTime) {
      throw new TemporalViolationError("Campaign has not started", { campaignId, value: now });
    }
    if (hasEnded(campaign, now)) {
      throw new TemporalViolationError("Campaign has ended", { campaignId, value: now });
    }

    const fee = feeOf(amount, campaign.platformFeeBps);
    const balance = recordDonation(this.balanceOf(campaignId), amount, fee, campaignId);
    const previous = this.donorRecordOf(campaignId, caller);
    const record = recordDonorContribution(previous, amount);
    const status = evaluateStatus(campaign, balance, now);

    this.transfers.pull(campaign.token, caller, amount);

    this.balances.set(campaignId, balance);
    this.setDonorRecord(campaignId, caller, record);
    if (previous.totalDonated === 0n) {
      appendTo(this.donors, campaignId, caller);
      appendTo(this.donatedBy, caller, campaignId);
    }

    const events: CampaignEvent[] = [{ type: "donation_received", campaignId, donor: caller, amount, fee }];
    if (status !== campaign.status) {
      events.push({ type: "status_changed", campaignId, from: campaign.status, to: status });
      campaign.status = status;
      if (status === "successful") {
        events.push({ type: "goal_reached", campaignId, totalDonations: balance.totalDonations });
      }
    }
    this.emit(events);
  }

  /** Refunds the caller's net donation on a failed all-or-nothing campaign and returns the amount */
  claimRefund(caller: Address, campaignId: number): bigint {
    this.assertNotPaused();
    const campaign = this.requireCampaign(campaignId);
    this.assertNotDisputed(campaign);

    const now = this.clock.now();
    const current = this.balanceOf(campaignId);
    const status = evaluateStatus(campaign, current, now);
    if (status !== "failed") {
      throw new InvalidStateError("No refund available", { campaignId });
    }
    if (campaign.fundingModel !== "all_or_nothing") {
      throw new InvalidStateError("Keep-what-you-raise campaigns do not refund", { campaignId });
    }

    const record = this.donorRecordOf(campaignId, caller);
    if (record.totalDonated === 0n) {
      throw new InvalidStateError("Caller has no donation to refund", { campaignId });
    }
    const refundDeadline = campaign.endTime + this.config.refundGracePeriod;
    if (now > refundDeadline) {
      throw new TemporalViolationError("Refund window has expired", { campaignId, value: refundDeadline });
    }
    const refundable = refundableAmount(record, campaign.platformFeeBps);
    if (refundable === 0n) {
      throw new InvalidStateError("Donation has already been refunded", { campaignId });
    }

    const balance = recordRefund(current, refundable, campaignId);
    const nextRecord = recordDonorRefund(record, refundable);

    this.transfers.push(campaign.token, caller, refundable);

    this.balances.set(campaignId, balance);
    this.setDonorRecord(campaignId, caller, nextRecord);

    const events: CampaignEvent[] = [];
    if (status !== campaign.status) {
      events.push({ type: "status_changed", campaignId, from: campaign.status, to: status });
      campaign.status = status;
    }
    events.push({ type: "refund_claimed", campaignId, donor: caller, amount: refundable });
    this.emit(events);
    return refundable;
  }

  /** Drains the whole withdrawable balance to the creator and returns the amount */
  withdrawFunds(caller: Address, campaignId: number): bigint {
    this.assertNotPaused();
    const campaign = this.requireCampaign(campaignId);
    this.assertCreator(campaign, caller);
    this.assertNotDisputed(campaign);

    const now = this.clock.now();
    const current = this.balanceOf(campaignId);
    const status = evaluateStatus(campaign, current, now);
    const ended = hasEnded(campaign, now);
    const authorized =
      status === "successful" ||
      (campaign.fundingModel === "keep_what_you_raise" && status === "active" && ended);

    if (!authorized) {
      if (status === "deleted") {
        throw new InvalidStateError("Campaign was cancelled", { campaignId });
      }
      if (!ended) {
        throw new TemporalViolationError("Deadline not reached", { campaignId, value: campaign.endTime });
      }
      if (campaign.fundingModel === "all_or_nothing") {
        throw new InvalidStateError("Funding goal not reached", { campaignId, value: current.totalDonations });
      }
      throw new InvalidStateError("Campaign has failed", { campaignId });
    }

    const amount = current.withdrawableBalance;
    if (amount === 0n) {
      throw new InvalidStateError("No funds to withdraw", { campaignId });
    }
    const balance = recordWithdrawal(current, amount, campaignId);

    this.transfers.push(campaign.token, caller, amount);

    this.balances.set(campaignId, balance);
    this.emit([{ type: "funds_withdrawn", campaignId, creator: caller, amount }]);
    return amount;
  }

  /** Commits any time-based transition that is due and returns the resulting status */
  evaluateStatus(campaignId: number): CampaignStatus {
    this.assertNotPaused();
    const campaign = this.requireCampaign(campaignId);
    const status = evaluateStatus(campaign, this.balanceOf(campaignId), this.clock.now());
    if (status !== campaign.status) {
      const from = campaign.status;
      campaign.status = status;
      this.emit([{ type: "status_changed", campaignId, from, to: status }]);
    }
    return status;
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  flagCampaignAsDisputed(caller: Address, campaignId: number): void {
    this.assertAdmin(caller);
    const campaign = this.requireCampaign(campaignId);
    if (campaign.disputed) return;

    campaign.disputed = true;
    this.emit([{ type: "campaign_disputed", campaignId }]);
  }

  /** Clears the dispute flag; a ruling against the creator fails a still-active campaign */
  resolveDispute(caller: Address, campaignId: number, favorCreator: boolean): void {
    this.assertAdmin(caller);
    const campaign = this.requireCampaign(campaignId);
    if (!campaign.disputed) return;

    campaign.disputed = false;
    const events: CampaignEvent[] = [{ type: "dispute_resolved", campaignId, favorCreator }];
    if (!favorCreator && campaign.status === "active") {
      campaign.status = "failed";
      events.push({ type: "status_changed", campaignId, from: "active", to: "failed" });
    }
    this.emit(events);
  }

  setPlatformFeeRate(caller: Address, rateBps: number): void {
    if (!this.access.isOwner(caller)) {
      throw new AuthorizationError("Caller is not the owner");
    }
    assertBasisPoints(rateBps, this.config.maxPlatformFeeBps);

    const previousRateBps = this.platformFeeBps;
    this.platformFeeBps = rateBps;
    this.emit([{ type: "platform_fee_rate_changed", previousRateBps, rateBps }]);
  }

  /**
   * Sweeps every outstanding fee on campaigns using `token` to the calling admin.
   * Linear in the number of campaigns for that token. Returns 0n without a transfer when nothing is owed.
   */
  collectPlatformFees(caller: Address, token: Address): bigint {
    this.assertAdmin(caller);

    const swept = new Map<number, BalanceLedger>();
    let total = 0n;
    for (const campaignId of this.campaignsByToken.get(token) ?? []) {
      const current = this.balanceOf(campaignId);
      const outstanding = feeOutstanding(current);
      if (outstanding === 0n) continue;
      total = checkedAdd(total, outstanding);
      swept.set(campaignId, recordFeeCollection(current, campaignId));
    }
    if (total === 0n) return 0n;
    const collected = checkedAdd(this.collectedFees.get(token) ?? 0n, total);

    this.transfers.push(token, caller, total);

    for (const [campaignId, balance] of swept) {
      this.balances.set(campaignId, balance);
    }
    this.collectedFees.set(token, collected);
    this.emit([{ type: "platform_fees_collected", token, amount: total, recipient: caller }]);
    return total;
  }

  /** Moves tokens out of custody while paused without touching any campaign ledger */
  emergencyWithdraw(caller: Address, token: Address, amount: bigint): void {
    this.assertAdmin(caller);
    if (!this.pause.isPaused()) {
      throw new InvalidStateError("Emergency withdrawal requires the system to be paused");
    }
    if (amount <= 0n) {
      throw new InvalidInputError("Withdrawal amount must be > 0", { value: amount });
    }

    this.transfers.push(token, caller, amount);
    this.emit([{ type: "emergency_withdrawal", token, amount, recipient: caller }]);
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getCampaign(campaignId: number): Campaign {
    return { ...this.requireCampaign(campaignId) };
  }

  getBalance(campaignId: number): BalanceLedger {
    this.requireCampaign(campaignId);
    return { ...this.balanceOf(campaignId) };
  }

  getFundingProgress(campaignId: number): bigint {
    return fundingProgress(this.requireCampaign(campaignId), this.balanceOf(campaignId));
  }

  getCreatorCampaigns(creator: Address): number[] {
    return [...(this.createdBy.get(creator) ?? [])];
  }

  getDonorCampaigns(donor: Address): number[] {
    return [...(this.donatedBy.get(donor) ?? [])];
  }

  getDonorDetails(campaignId: number, donor: Address): DonorRecord {
    this.requireCampaign(campaignId);
    return { ...this.donorRecordOf(campaignId, donor) };
  }

  getDonors(campaignId: number): Address[] {
    this.requireCampaign(campaignId);
    return [...(this.donors.get(campaignId) ?? [])];
  }

  getCampaignsByToken(token: Address): number[] {
    return [...(this.campaignsByToken.get(token) ?? [])];
  }

  isCampaignSuccessful(campaignId: number): boolean {
    return this.effectiveStatus(campaignId) === "successful";
  }

  isCampaignFailed(campaignId: number): boolean {
    return this.effectiveStatus(campaignId) === "failed";
  }

  getCampaignInfo(campaignId: number): CampaignInfo {
    const campaign = this.requireCampaign(campaignId);
    const balance = this.balanceOf(campaignId);
    return {
      campaign: { ...campaign },
      balance: { ...balance },
      effectiveStatus: evaluateStatus(campaign, balance, this.clock.now()),
      fundingProgress: fundingProgress(campaign, balance),
      donorCount: this.donors.get(campaignId)?.length ?? 0,
      feeOutstanding: feeOutstanding(balance)
    };
  }

  getLatestCampaignId(): number {
    return this.latestCampaignId;
  }

  getPlatformFeeRate(): number {
    return this.platformFeeBps;
  }

  getCollectedFees(token: Address): bigint {
    return this.collectedFees.get(token) ?? 0n;
  }

  getConfig(): PlatformConfig {
    return { ...this.config };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private effectiveStatus(campaignId: number): CampaignStatus {
    return evaluateStatus(this.requireCampaign(campaignId), this.balanceOf(campaignId), this.clock.now());
  }

  private requireCampaign(campaignId: number): Campaign {
    const campaign = this.campaigns.get(campaignId);
    if (!campaign) {
      throw new InvalidInputError("Campaign not found", { campaignId });
    }
    return campaign;
  }

  private requireEditable(caller: Address, campaignId: number): Campaign {
    const campaign = this.requireCampaign(campaignId);
    this.assertCreator(campaign, caller);
    this.assertActive(campaign, this.effectiveStatus(campaignId));
    this.assertNotDisputed(campaign);
    return campaign;
  }

  private balanceOf(campaignId: number): BalanceLedger {
    return this.balances.get(campaignId) ?? emptyBalance();
  }

  private donorRecordOf(campaignId: number, donor: Address): DonorRecord {
    return this.donorRecords.get(campaignId)?.get(donor) ?? emptyDonorRecord();
  }

  private setDonorRecord(campaignId: number, donor: Address, record: DonorRecord): void {
    let records = this.donorRecords.get(campaignId);
    if (!records) {
      records = new Map();
      this.donorRecords.set(campaignId, records);
    }
    records.set(donor, record);
  }

  private assertDuration(startTime: number, endTime: number, campaignId?: number): void {
    if (!Number.isInteger(startTime) || !Number.isInteger(endTime) || startTime >= endTime) {
      throw new InvalidInputError("Start time must be before end time", { campaignId, value: endTime });
    }
    const duration = checkedSub(BigInt(endTime), BigInt(startTime));
    if (duration < BigInt(this.config.minFundingPeriod) || duration > BigInt(this.config.maxFundingPeriod)) {
      throw new InvalidInputError(
        `Funding period must be between ${this.config.minFundingPeriod} and ${this.config.maxFundingPeriod} seconds`,
        { campaignId, value: duration }
      );
    }
  }

  private assertNotPaused(): void {
    if (this.pause.isPaused()) {
      throw new InvalidStateError("System is paused");
    }
  }

  private assertAdmin(caller: Address): void {
    if (!this.access.isAdmin(caller)) {
      throw new AuthorizationError("Caller is not an admin");
    }
  }

  private assertCreator(campaign: Campaign, caller: Address): void {
    if (campaign.creator !== caller) {
      throw new AuthorizationError("Caller is not the campaign creator", { campaignId: campaign.id });
    }
  }

  /** `status` defaults to the stored one; pass the effective status where a lapsed deadline must count */
  private assertActive(campaign: Campaign, status: CampaignStatus = campaign.status): void {
    if (status !== "active") {
      throw new InvalidStateError(`Campaign is ${status}`, { campaignId: campaign.id, value: status });
    }
  }

  private assertNotDisputed(campaign: Campaign): void {
    if (campaign.disputed) {
      throw new InvalidStateError("Campaign is disputed", { campaignId: campaign.id });
    }
  }

  /** Runs after the commit, so a faulty listener is reported and cannot fail the call */
  private emit(events: CampaignEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          console.error(`Event listener failed on ${event.type}:`, err);
        }
      }
    }
  }
}

function appendTo<K, V>(index: Map<K, V[]>, key: K, value: V): void {
  const list = index.get(key);
  if (list) {
    list.push(value);
  } else {
    index.set(key, [value]);
  }
}
