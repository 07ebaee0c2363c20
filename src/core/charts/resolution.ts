import { SECONDS_PER_DAY } from '../../config/constants';
import {
  LOOKBACK_LABELS,
  LookbackLabel,
  RESOLUTION_LABELS,
  ResolutionLabel,
  ResolutionSpec,
} from '../../types/charts';

const SECONDS_PER_MINUTE = 60;

export const RESOLUTIONS: Readonly<Record<ResolutionLabel, ResolutionSpec>> = {
  '1m': { label: '1m', minutes: 1, tvCode: '1', gecko: { timeframe: 'minute', aggregate: 1 } },
  '5m': { label: '5m', minutes: 5, tvCode: '5', gecko: { timeframe: 'minute', aggregate: 5 } },
  '15m': { label: '15m', minutes: 15, tvCode: '15', gecko: { timeframe: 'minute', aggregate: 15 } },
  '30m': { label: '30m', minutes: 30, tvCode: '30', gecko: { timeframe: 'minute', aggregate: 30 } },
  '1h': { label: '1h', minutes: 60, tvCode: '60', gecko: { timeframe: 'hour', aggregate: 1 } },
  '4h': { label: '4h', minutes: 240, tvCode: '240', gecko: { timeframe: 'hour', aggregate: 4 } },
  '12h': { label: '12h', minutes: 720, tvCode: '720', gecko: { timeframe: 'hour', aggregate: 12 } },
  '1d': { label: '1d', minutes: 1440, tvCode: 'D', gecko: { timeframe: 'day', aggregate: 1 } },
  '1w': { label: '1w', minutes: 10080, tvCode: 'W', gecko: { timeframe: 'day', aggregate: 7 } },
};

// null disables the cutoff
export const LOOKBACK_MINUTES: Readonly<Record<LookbackLabel, number | null>> = {
  '1h': 60,
  '4h': 240,
  '12h': 720,
  '1d': 1440,
  '3d': 4320,
  '1w': 10080,
  '2w': 20160,
  '1m': 43200,
  '3m': 129600,
  all: null,
};

export function isResolutionLabel(value: string): value is ResolutionLabel {
  return RESOLUTION_LABELS.some((label) => label === value);
}

export function isLookbackLabel(value: string): value is LookbackLabel {
  return LOOKBACK_LABELS.some((label) => label === value);
}

export function parseResolution(value: string): ResolutionLabel {
  if (!isResolutionLabel(value)) {
    throw new RangeError(`Unknown resolution "${value}"; expected one of ${RESOLUTION_LABELS.join(', ')}`);
  }
  return value;
}

export function parseLookback(value: string): LookbackLabel {
  if (!isLookbackLabel(value)) {
    throw new RangeError(`Unknown lookback "${value}"; expected one of ${LOOKBACK_LABELS.join(', ')}`);
  }
  return value;
}

function floorTo(value: number, step: number): number {
  return Math.floor(value / step) * step;
}

/**
 * Start of the bucket containing `timestamp`, in the local time given by
 * `utcOffsetMinutes`. Weekly buckets start on Monday midnight.
 */
export function alignToResolution(timestamp: number, resolution: ResolutionLabel, utcOffsetMinutes = 0): number {
  const { minutes } = RESOLUTIONS[resolution];
  const offset = utcOffsetMinutes * SECONDS_PER_MINUTE;
  const local = timestamp + offset;

  let aligned: number;
  if (minutes < SECONDS_PER_DAY / SECONDS_PER_MINUTE) {
    // sub-hour and hourly steps both divide a day evenly
    aligned = floorTo(local, minutes * SECONDS_PER_MINUTE);
  } else if (minutes === SECONDS_PER_DAY / SECONDS_PER_MINUTE) {
    aligned = floorTo(local, SECONDS_PER_DAY);
  } else {
    const dayStart = floorTo(local, SECONDS_PER_DAY);
    const daysSinceEpoch = dayStart / SECONDS_PER_DAY;
    // 1970-01-01 was a Thursday
    const daysSinceMonday = (((daysSinceEpoch + 3) % 7) + 7) % 7;
    aligned = dayStart - daysSinceMonday * SECONDS_PER_DAY;
  }

  return aligned - offset;
}

/** Every bucket start from `first` to `last`, both ends included after alignment. */
export function enumerateBuckets(
  first: number,
  last: number,
  resolution: ResolutionLabel,
  utcOffsetMinutes = 0,
): number[] {
  const step = RESOLUTIONS[resolution].minutes * SECONDS_PER_MINUTE;
  const end = alignToResolution(last, resolution, utcOffsetMinutes);
  const buckets: number[] = [];
  for (let bucket = alignToResolution(first, resolution, utcOffsetMinutes); bucket <= end; bucket += step) {
    buckets.push(bucket);
  }
  return buckets;
}

const MAX_PRICE_ROWS = 1000;
const PRICE_ROW_MARGIN = 10;

/** Price rows to request so the series covers the whole lookback. */
export function priceRequestLimit(resolution: ResolutionLabel, lookback: LookbackLabel): number {
  const minutes = LOOKBACK_MINUTES[lookback];
  if (minutes === null) return MAX_PRICE_ROWS;
  return Math.min(MAX_PRICE_ROWS, Math.floor(minutes / RESOLUTIONS[resolution].minutes) + PRICE_ROW_MARGIN);
}

export function lookbackCutoff(lookback: LookbackLabel, now: number): number | null {
  const minutes = LOOKBACK_MINUTES[lookback];
  return minutes === null ? null : now - minutes * SECONDS_PER_MINUTE;
}
