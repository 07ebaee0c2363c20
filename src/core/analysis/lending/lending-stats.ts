import { LENDING_CURRENCIES, SECONDS_PER_DAY } from '../../../config/constants';
import {
  LendingHistory,
  LendingSide,
  LendingStats,
  LendingTransaction,
  RawLendingTransaction,
  RawLendingUser,
} from '../../../types/lending';

const WAD = 1e18;

function toNumber(value: string | number | null | undefined): number {
  if (value === undefined || value === null || value === '') return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}

export function lendingSide(side: string | number | undefined): LendingSide {
  return side === 0 || side === '0' ? 'lend' : 'borrow';
}

/**
 * Annualized rate implied by a zero-coupon execution price:
 * (1 - price) * 365 / daysToMaturity, in percent. Zero when undefined.
 */
export function impliedApr(price: number, daysToMaturity: number): number {
  if (price <= 0 || daysToMaturity <= 0) return 0;
  return ((1 - price) * 365 * 100) / daysToMaturity;
}

function parseTimestamp(value: string | number | undefined): number | null {
  if (value === undefined || value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? Math.floor(parsed) : null;
}

/** Null when the record has no usable `createdAt`. */
export function normalizeLendingTransaction(raw: RawLendingTransaction): LendingTransaction | null {
  const timestamp = parseTimestamp(raw.createdAt);
  if (timestamp === null) return null;
  const maturity = toNumber(raw.maturity);
  const executionPrice = toNumber(raw.executionPrice) / WAD;
  const daysToMaturity = maturity > timestamp ? (maturity - timestamp) / SECONDS_PER_DAY : 0;

  return {
    timestamp,
    side: lendingSide(raw.side),
    futureValue: toNumber(raw.futureValue) / WAD,
    executionPrice,
    maturity,
    daysToMaturity,
    apr: impliedApr(executionPrice, daysToMaturity),
  };
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function computeLendingStats(transactions: readonly LendingTransaction[]): LendingStats {
  const lends = transactions.filter((tx) => tx.side === 'lend');
  const borrows = transactions.filter((tx) => tx.side === 'borrow');
  const totalLendVolume = lends.reduce((sum, tx) => sum + tx.futureValue, 0);
  const totalBorrowVolume = borrows.reduce((sum, tx) => sum + tx.futureValue, 0);

  return {
    lendTxCount: lends.length,
    borrowTxCount: borrows.length,
    totalLendVolume,
    totalBorrowVolume,
    avgLendApr: mean(lends.map((tx) => tx.apr)),
    avgBorrowApr: mean(borrows.map((tx) => tx.apr)),
    netPosition: totalLendVolume - totalBorrowVolume,
  };
}

export const EMPTY_LENDING_HISTORY: LendingHistory = {
  hasActivity: false,
  transactions: [],
  orders: [],
  stats: computeLendingStats([]),
  totalTxCount: 0,
  totalOrderCount: 0,
};

/** Keeps only transactions in `currency` (bytes32 id) and summarizes them. */
export function buildLendingHistory(
  user: RawLendingUser | null,
  currency: string = LENDING_CURRENCIES.USDFC,
): LendingHistory {
  if (!user) return EMPTY_LENDING_HISTORY;

  const wanted = currency.toLowerCase();
  const transactions = (user.transactions ?? [])
    .filter((tx) => (tx.currency ?? '').toLowerCase() === wanted)
    .map(normalizeLendingTransaction)
    .filter((tx): tx is LendingTransaction => tx !== null);

  return {
    hasActivity: true,
    transactions,
    orders: (user.orders ?? []).filter((order) => (order.currency ?? '').toLowerCase() === wanted),
    stats: computeLendingStats(transactions),
    totalTxCount: toNumber(user.transactionCount),
    totalOrderCount: toNumber(user.orderCount),
  };
}
