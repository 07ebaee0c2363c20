import { BalanceCandle, LookbackLabel, PriceCandle, ResolutionLabel, VolumeCandle } from '../../types/charts';
import { LendingTransaction } from '../../types/lending';
import { TransferEvent } from '../../types/transfer';
import { signedAmount } from '../analysis/balance/balance-reconstructor';
import { alignToResolution, enumerateBuckets, lookbackCutoff } from './resolution';

export interface CandleWindow {
  resolution: ResolutionLabel;
  lookback: LookbackLabel;
  now: number;
  utcOffsetMinutes?: number;
}

export interface BalanceCandleOptions extends CandleWindow {
  /** Balance before the first in-window event. Defaults to 0. */
  openingBalance?: number;
  /**
   * Known balance after the last in-window event. When set, the opening
   * balance is derived from it and `openingBalance` is ignored.
   */
  closingBalance?: number;
}

/** With `align`, the cutoff moves back to the start of its bucket so the oldest candle is never partial. */
function withinLookback<T>(
  items: readonly T[],
  timeOf: (item: T) => number,
  lookback: LookbackLabel,
  now: number,
  align?: (ts: number) => number,
): T[] {
  const raw = lookbackCutoff(lookback, now);
  if (raw === null) return [...items];
  const cutoff = align ? align(raw) : raw;
  return items.filter((item) => timeOf(item) >= cutoff);
}

function chronological<T>(items: T[], timeOf: (item: T) => number): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => timeOf(a.item) - timeOf(b.item) || a.index - b.index)
    .map(({ item }) => item);
}

function groupByBucket<T>(items: readonly T[], bucketOf: (item: T) => number): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const item of items) {
    const bucket = bucketOf(item);
    const group = groups.get(bucket);
    if (group) group.push(item);
    else groups.set(bucket, [item]);
  }
  return groups;
}

/**
 * Gap-filled OHLC candles of the running reference-token balance. Empty
 * buckets carry the previous close; OHLC never drop below zero while
 * `netChange` uses the unclamped running values.
 */
export function buildBalanceCandles(events: readonly TransferEvent[], options: BalanceCandleOptions): BalanceCandle[] {
  const { resolution, lookback, now, utcOffsetMinutes = 0 } = options;
  const align = (ts: number) => alignToResolution(ts, resolution, utcOffsetMinutes);
  const inWindow = chronological(
    withinLookback(events, (e) => e.timestamp, lookback, now, align),
    (e) => e.timestamp,
  );
  if (inWindow.length === 0) return [];

  const netFlow = inWindow.reduce((sum, event) => sum + signedAmount(event), 0);
  let running = options.closingBalance !== undefined ? options.closingBalance - netFlow : options.openingBalance ?? 0;

  const byBucket = groupByBucket(inWindow, (e) => align(e.timestamp));
  const firstBucket = align(inWindow[0].timestamp);
  const lastBucket = Math.max(align(inWindow[inWindow.length - 1].timestamp), align(now));

  return enumerateBuckets(firstBucket, lastBucket, resolution, utcOffsetMinutes).map((time) => {
    const open = running;
    let high = open;
    let low = open;
    let volume = 0;
    const bucketEvents = byBucket.get(time) ?? [];

    for (const event of bucketEvents) {
      running += signedAmount(event);
      high = Math.max(high, running);
      low = Math.min(low, running);
      volume += event.amount;
    }

    return {
      time,
      open: Math.max(0, open),
      high: Math.max(0, high),
      low: Math.max(0, low),
      close: Math.max(0, running),
      volume,
      txCount: bucketEvents.length,
      netChange: running - open,
    };
  });
}

/** Lend/borrow activity per bucket; buckets without activity are omitted. */
export function buildVolumeCandles(transactions: readonly LendingTransaction[], options: CandleWindow): VolumeCandle[] {
  const { resolution, lookback, now, utcOffsetMinutes = 0 } = options;
  const align = (ts: number) => alignToResolution(ts, resolution, utcOffsetMinutes);
  const inWindow = withinLookback(transactions, (tx) => tx.timestamp, lookback, now, align);
  const byBucket = groupByBucket(inWindow, (tx) => align(tx.timestamp));

  return [...byBucket.entries()]
    .sort(([a], [b]) => a - b)
    .map(([time, txs]) => {
      let lendVolume = 0;
      let borrowVolume = 0;
      let lendCount = 0;
      let borrowCount = 0;
      for (const tx of txs) {
        if (tx.side === 'lend') {
          lendVolume += tx.futureValue;
          lendCount += 1;
        } else {
          borrowVolume += tx.futureValue;
          borrowCount += 1;
        }
      }
      return {
        time,
        lendVolume,
        borrowVolume,
        lendCount,
        borrowCount,
        netFlow: lendVolume - borrowVolume,
        totalVolume: lendVolume + borrowVolume,
      };
    });
}

/** Upstream price candles inside the lookback, oldest first. */
export function buildPriceCandles(
  rows: readonly PriceCandle[],
  options: Pick<CandleWindow, 'lookback' | 'now'>,
): PriceCandle[] {
  return chronological(
    withinLookback(rows, (row) => row.time, options.lookback, options.now),
    (row) => row.time,
  );
}
