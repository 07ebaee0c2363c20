import { expect } from 'chai';
import {
  RESOLUTIONS,
  alignToResolution,
  enumerateBuckets,
  lookbackCutoff,
  parseLookback,
  parseResolution,
  priceRequestLimit,
} from '../src/core/charts/resolution';
import { BASE_TS, DAY, HOUR } from './helpers/fixtures';

// Wednesday 2024-01-03 15:20:00 UTC
const WEDNESDAY = 1704295200;

describe('Resolution alignment', () => {
  it('should align sub-hour buckets to the minute grid', () => {
    expect(alignToResolution(WEDNESDAY + 59, '1m')).to.equal(WEDNESDAY);
    expect(alignToResolution(WEDNESDAY, '15m')).to.equal(1704294900);
    expect(alignToResolution(WEDNESDAY, '30m')).to.equal(1704294000);
  });

  it('should align hourly buckets to multiples of N hours within the day', () => {
    expect(alignToResolution(WEDNESDAY, '1h')).to.equal(1704294000);
    expect(alignToResolution(WEDNESDAY, '4h')).to.equal(1704283200);
    expect(alignToResolution(WEDNESDAY, '12h')).to.equal(1704283200);
  });

  it('should align daily buckets to midnight and weekly buckets to Monday', () => {
    expect(alignToResolution(WEDNESDAY, '1d')).to.equal(1704240000);
    expect(alignToResolution(WEDNESDAY, '1w')).to.equal(BASE_TS);
    expect(alignToResolution(BASE_TS, '1w')).to.equal(BASE_TS);
    expect(alignToResolution(BASE_TS + 7 * DAY - 1, '1w')).to.equal(BASE_TS);
  });

  it('should align in the configured local time', () => {
    expect(alignToResolution(WEDNESDAY, '1d', 120)).to.equal(1704232800);
    expect(alignToResolution(WEDNESDAY, '4h', 120)).to.equal(1704290400);
    // Monday 03:00 UTC is still Sunday at UTC-5
    expect(alignToResolution(BASE_TS + 3 * HOUR, '1w', -300)).to.equal(1703480400);
  });

  it('should enumerate every bucket between two timestamps inclusively', () => {
    expect(enumerateBuckets(BASE_TS + 10, BASE_TS + 2 * HOUR + 5, '1h')).to.deep.equal([
      BASE_TS,
      BASE_TS + HOUR,
      BASE_TS + 2 * HOUR,
    ]);
    expect(enumerateBuckets(BASE_TS, BASE_TS, '1d')).to.deep.equal([BASE_TS]);
  });
});

describe('Resolution and lookback tables', () => {
  it('should map resolutions to chart codes and price request parameters', () => {
    expect(RESOLUTIONS['1d']).to.deep.equal({
      label: '1d',
      minutes: 1440,
      tvCode: 'D',
      gecko: { timeframe: 'day', aggregate: 1 },
    });
    expect(RESOLUTIONS['1w'].gecko).to.deep.equal({ timeframe: 'day', aggregate: 7 });
    expect(RESOLUTIONS['4h'].tvCode).to.equal('240');
  });

  it('should request enough price rows for the lookback, capped at 1000', () => {
    expect(priceRequestLimit('1h', '1w')).to.equal(178);
    expect(priceRequestLimit('1d', '3m')).to.equal(100);
    expect(priceRequestLimit('1h', '3m')).to.equal(1000);
    expect(priceRequestLimit('1m', 'all')).to.equal(1000);
  });

  it('should compute lookback cutoffs, with none for all', () => {
    const now = BASE_TS + 100 * DAY;
    expect(lookbackCutoff('1d', now)).to.equal(now - DAY);
    expect(lookbackCutoff('3m', now)).to.equal(now - 90 * DAY);
    expect(lookbackCutoff('all', now)).to.equal(null);
  });

  it('should reject unknown labels', () => {
    expect(parseResolution('4h')).to.equal('4h');
    expect(() => parseResolution('2h')).to.throw(RangeError, 'Unknown resolution "2h"');
    expect(() => parseLookback('5y')).to.throw(RangeError, 'Unknown lookback "5y"');
  });
});
