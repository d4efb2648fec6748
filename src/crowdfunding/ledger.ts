import { ConservationViolationError } from "./errors.js";
import { checkedAdd, checkedSub, feeOf } from "./math.js";
import type { BalanceLedger, DonorRecord } from "./types.js";

export function emptyBalance(): BalanceLedger {
  return {
    totalDonations: 0n,
    feeAccrued: 0n,
    feeCollected: 0n,
    withdrawableBalance: 0n,
    totalRefunded: 0n,
    totalWithdrawn: 0n
  };
}

export function emptyDonorRecord(): DonorRecord {
  return { totalDonated: 0n, refundClaimed: 0n };
}

export function feeOutstanding(ledger: BalanceLedger): bigint {
  return checkedSub(ledger.feeAccrued, ledger.feeCollected);
}

/**
 * Every unit ever donated is either still withdrawable, owed to or taken by the platform,
 * refunded, or withdrawn by the creator.
 */
export function assertConserved(ledger: BalanceLedger, campaignId?: number): BalanceLedger {
  const accounted = [
    ledger.withdrawableBalance,
    ledger.feeCollected,
    feeOutstanding(ledger),
    ledger.totalRefunded,
    ledger.totalWithdrawn
  ].reduce((sum, part) => checkedAdd(sum, part), 0n);

  if (accounted !== ledger.totalDonations) {
    throw new ConservationViolationError(
      `Ledger does not balance: donated ${ledger.totalDonations}, accounted ${accounted}`,
      { campaignId, value: accounted }
    );
  }
  return ledger;
}

export function recordDonation(ledger: BalanceLedger, amount: bigint, fee: bigint, campaignId?: number): BalanceLedger {
  return assertConserved(
    {
      ...ledger,
      totalDonations: checkedAdd(ledger.totalDonations, amount),
      feeAccrued: checkedAdd(ledger.feeAccrued, fee),
      withdrawableBalance: checkedAdd(ledger.withdrawableBalance, checkedSub(amount, fee))
    },
    campaignId
  );
}

export function recordRefund(ledger: BalanceLedger, amount: bigint, campaignId?: number): BalanceLedger {
  return assertConserved(
    {
      ...ledger,
      withdrawableBalance: checkedSub(ledger.withdrawableBalance, amount),
      totalRefunded: checkedAdd(ledger.totalRefunded, amount)
    },
    campaignId
  );
}

export function recordWithdrawal(ledger: BalanceLedger, amount: bigint, campaignId?: number): BalanceLedger {
  return assertConserved(
    {
      ...ledger,
      withdrawableBalance: checkedSub(ledger.withdrawableBalance, amount),
      totalWithdrawn: checkedAdd(ledger.totalWithdrawn, amount)
    },
    campaignId
  );
}

/** Marks all outstanding fees as collected */
export function recordFeeCollection(ledger: BalanceLedger, campaignId?: number): BalanceLedger {
  return assertConserved({ ...ledger, feeCollected: ledger.feeAccrued }, campaignId);
}

export function recordDonorContribution(record: DonorRecord, amount: bigint): DonorRecord {
  return { ...record, totalDonated: checkedAdd(record.totalDonated, amount) };
}

/** Gross donation minus its fee share at the campaign's frozen rate, minus what was already refunded */
export function refundableAmount(record: DonorRecord, feeBps: number): bigint {
  const net = checkedSub(record.totalDonated, feeOf(record.totalDonated, feeBps));
  return checkedSub(net, record.refundClaimed);
}

export function recordDonorRefund(record: DonorRecord, amount: bigint): DonorRecord {
  return { ...record, refundClaimed: checkedAdd(record.refundClaimed, amount) };
}
