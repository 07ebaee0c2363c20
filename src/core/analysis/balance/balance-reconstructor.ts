import { BALANCE_RECONSTRUCTION_CONFIG, SECONDS_PER_DAY } from '../../../config/constants';
import { BalanceHistory, BalancePoint, HoldingInterval } from '../../../types/balance';
import { TransferEvent } from '../../../types/transfer';
import { createLogger } from '../../utils/logger';

const logger = createLogger('BalanceReconstructor');

const { NEGATIVE_BALANCE_TOLERANCE, CURRENT_EVENT_LABEL } = BALANCE_RECONSTRUCTION_CONFIG;

/** Balance effect of one event on the subject: +in, -out, 0 for pass-through. */
export function signedAmount(event: Pick<TransferEvent, 'direction' | 'amount'>): number {
  switch (event.direction) {
    case 'in':
      return event.amount;
    case 'out':
      return -event.amount;
    case 'internal':
      return 0;
  }
}

/** Applies events forward from `start`, in the order given. */
export function replayBalance(start: number, events: readonly TransferEvent[]): number {
  return events.reduce((balance, event) => balance + signedAmount(event), start);
}

function pointLabel(event: TransferEvent): string {
  return `${event.direction === 'out' ? 'sent' : 'received'} ${event.amount.toFixed(2)}`;
}

export function computeHoldingIntervals(
  points: readonly BalancePoint[],
  now: number,
): { intervals: HoldingInterval[]; totalHoldingDays: number; currentHoldingDays: number } {
  const intervals: HoldingInterval[] = [];
  let openedAt: number | null = null;

  for (const point of points) {
    if (openedAt === null && point.balance > 0) {
      openedAt = point.timestamp;
    } else if (openedAt !== null && point.balance === 0) {
      intervals.push({ start: openedAt, end: point.timestamp, durationDays: (point.timestamp - openedAt) / SECONDS_PER_DAY });
      openedAt = null;
    }
  }

  let currentHoldingDays = 0;
  if (openedAt !== null) {
    currentHoldingDays = Math.max(0, now - openedAt) / SECONDS_PER_DAY;
    intervals.push({ start: openedAt, durationDays: currentHoldingDays });
  }

  const totalHoldingDays = intervals.reduce((sum, interval) => sum + interval.durationDays, 0);
  return { intervals, totalHoldingDays, currentHoldingDays };
}

/**
 * Rebuilds the reference-token balance timeline by walking events backwards
 * from the known current balance. Each event point carries the balance held
 * just before that event; the final point is the current balance at `now`.
 */
export function reconstructBalanceHistory(
  currentBalance: number,
  events: readonly TransferEvent[],
  isComplete: boolean,
  now: number,
): BalanceHistory {
  const effective = events.filter((event) => event.direction !== 'internal');
  if (effective.length === 0) {
    const point: BalancePoint = {
      timestamp: now,
      balance: Math.max(0, currentBalance),
      eventLabel: CURRENT_EVENT_LABEL,
      dataComplete: isComplete,
    };
    return { points: [point], intervals: [], totalHoldingDays: 0, currentHoldingDays: 0, dataComplete: isComplete };
  }

  const newestFirst = effective
    .map((event, index) => ({ event, index }))
    .sort((a, b) => b.event.timestamp - a.event.timestamp || a.index - b.index)
    .map(({ event }) => event);

  let running = currentBalance;
  let lowest = running;
  const reversed: BalancePoint[] = [
    {
      timestamp: now,
      balance: Math.max(0, running),
      eventLabel: CURRENT_EVENT_LABEL,
      dataComplete: running >= -NEGATIVE_BALANCE_TOLERANCE && isComplete,
    },
  ];

  for (const event of newestFirst) {
    running -= signedAmount(event);
    lowest = Math.min(lowest, running);
    reversed.push({
      timestamp: event.timestamp,
      balance: Math.max(0, running),
      eventLabel: pointLabel(event),
      dataComplete: running >= -NEGATIVE_BALANCE_TOLERANCE && isComplete,
    });
  }

  if (lowest < -NEGATIVE_BALANCE_TOLERANCE) {
    logger.warn(`Reconstructed balance went negative (${lowest.toFixed(4)}); history is missing inflows`);
  }

  const points = reversed.reverse();
  const holding = computeHoldingIntervals(points, now);

  return {
    points,
    ...holding,
    dataComplete: points.every((point) => point.dataComplete),
  };
}
