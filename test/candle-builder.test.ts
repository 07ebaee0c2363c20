import { expect } from 'chai';
import { buildBalanceCandles, buildPriceCandles, buildVolumeCandles } from '../src/core/charts/candle-builder';
import { LendingTransaction } from '../src/types/lending';
import { BASE_TS, DAY, HOUR, OTHER, transfer, usdfcIn, usdfcOut } from './helpers/fixtures';

describe('Balance candles', () => {
  // 09:15 +10, 11:30 -4, evaluated at 11:45
  const events = [usdfcIn(10, 1704100500), usdfcOut(4, 1704108600)];
  const now = 1704109500;

  it('should gap-fill hourly buckets and carry the close through empty ones', () => {
    const candles = buildBalanceCandles(events, { resolution: '1h', lookback: '1d', now });
    expect(candles).to.deep.equal([
      { time: 1704099600, open: 0, high: 10, low: 0, close: 10, volume: 10, txCount: 1, netChange: 10 },
      { time: 1704103200, open: 10, high: 10, low: 10, close: 10, volume: 0, txCount: 0, netChange: 0 },
      { time: 1704106800, open: 10, high: 10, low: 6, close: 6, volume: 4, txCount: 1, netChange: -4 },
    ]);
  });

  it('should derive the opening balance from a closing anchor', () => {
    const anchored = buildBalanceCandles(events, { resolution: '1h', lookback: '1d', now, closingBalance: 6 });
    const opened = buildBalanceCandles(events, { resolution: '1h', lookback: '1d', now, openingBalance: 0 });
    expect(anchored).to.deep.equal(opened);
  });

  it('should extend the last bucket to the one containing now', () => {
    const candles = buildBalanceCandles([usdfcIn(10, 1704100500)], { resolution: '1h', lookback: '1d', now });
    expect(candles.map((c) => [c.time, c.close])).to.deep.equal([
      [1704099600, 10],
      [1704103200, 10],
      [1704106800, 10],
    ]);
  });

  it('should return no candles without in-window events', () => {
    expect(buildBalanceCandles([], { resolution: '1h', lookback: '1d', now })).to.deep.equal([]);
    expect(buildBalanceCandles([usdfcIn(1, now - 2 * DAY)], { resolution: '1h', lookback: '1d', now })).to.deep.equal([]);
  });

  it('should leave in-window candles unchanged when the lookback widens', () => {
    const sundayNoon = BASE_TS + 6 * DAY + 12 * HOUR;
    const history = [usdfcIn(10, BASE_TS + HOUR), usdfcIn(5, sundayNoon - 2 * HOUR), usdfcOut(3, sundayNoon - HOUR)];
    const options = { resolution: '1d' as const, now: sundayNoon, closingBalance: 12 };

    const narrow = buildBalanceCandles(history, { ...options, lookback: '1d' });
    const wide = buildBalanceCandles(history, { ...options, lookback: '1w' });

    expect(narrow).to.deep.equal([
      { time: BASE_TS + 6 * DAY, open: 10, high: 15, low: 10, close: 12, volume: 8, txCount: 2, netChange: 2 },
    ]);
    expect(wide).to.have.length(7);
    expect(wide[0]).to.deep.equal({ time: BASE_TS, open: 0, high: 10, low: 0, close: 10, volume: 10, txCount: 1, netChange: 10 });
    expect(wide.slice(-narrow.length)).to.deep.equal(narrow);
  });

  it('should keep the whole oldest bucket when the cutoff falls inside it', () => {
    const history = [usdfcIn(10, BASE_TS + 6 * HOUR), usdfcOut(3, BASE_TS + 11 * HOUR + 1800)];
    const options = { resolution: '1d' as const, now: BASE_TS + 12 * HOUR, closingBalance: 7 };
    const expected = [{ time: BASE_TS, open: 0, high: 10, low: 0, close: 7, volume: 13, txCount: 2, netChange: 7 }];

    expect(buildBalanceCandles(history, { ...options, lookback: '1h' })).to.deep.equal(expected);
    expect(buildBalanceCandles(history, { ...options, lookback: '1d' })).to.deep.equal(expected);
  });

  it('should clamp OHLC at zero while netChange keeps the raw movement', () => {
    const [candle] = buildBalanceCandles([usdfcOut(5, BASE_TS + 60)], { resolution: '1h', lookback: 'all', now: BASE_TS + 120 });
    expect(candle).to.deep.equal({ time: BASE_TS, open: 0, high: 0, low: 0, close: 0, volume: 5, txCount: 1, netChange: -5 });
  });

  it('should count pass-through transfers without moving the balance', () => {
    const passThrough = transfer({ amount: 7, timestamp: BASE_TS + 60, direction: 'internal', from: OTHER, to: OTHER });
    const [candle] = buildBalanceCandles([passThrough], {
      resolution: '1h',
      lookback: 'all',
      now: BASE_TS + 120,
      openingBalance: 3,
    });
    expect(candle).to.include({ open: 3, close: 3, volume: 7, txCount: 1, netChange: 0 });
  });

  it('should be deterministic', () => {
    const options = { resolution: '15m' as const, lookback: 'all' as const, now };
    expect(buildBalanceCandles(events, options)).to.deep.equal(buildBalanceCandles([...events].reverse(), options));
  });
});

describe('Lending volume candles', () => {
  const lendingTx = (side: 'lend' | 'borrow', futureValue: number, timestamp: number): LendingTransaction => ({
    timestamp,
    side,
    futureValue,
    executionPrice: 0.95,
    maturity: timestamp + 90 * DAY,
    daysToMaturity: 90,
    apr: 0,
  });

  it('should sum lend and borrow activity per bucket and skip empty buckets', () => {
    const candles = buildVolumeCandles(
      [lendingTx('lend', 5, BASE_TS + 3 * HOUR), lendingTx('lend', 100, BASE_TS + 600), lendingTx('borrow', 40, BASE_TS + 1200)],
      { resolution: '1h', lookback: 'all', now: BASE_TS + DAY },
    );
    expect(candles).to.deep.equal([
      { time: BASE_TS, lendVolume: 100, borrowVolume: 40, lendCount: 1, borrowCount: 1, netFlow: 60, totalVolume: 140 },
      { time: BASE_TS + 3 * HOUR, lendVolume: 5, borrowVolume: 0, lendCount: 1, borrowCount: 0, netFlow: 5, totalVolume: 5 },
    ]);
  });

  it('should drop transactions before the lookback cutoff', () => {
    const candles = buildVolumeCandles([lendingTx('borrow', 9, BASE_TS)], {
      resolution: '1h',
      lookback: '1h',
      now: BASE_TS + DAY,
    });
    expect(candles).to.deep.equal([]);
  });
});

describe('Price candles', () => {
  it('should keep rows inside the lookback, oldest first', () => {
    const row = (time: number, close: number) => ({ time, open: close, high: close, low: close, close, volume: 1 });
    const now = BASE_TS + DAY;
    const candles = buildPriceCandles([row(BASE_TS + 2 * HOUR, 2), row(BASE_TS - HOUR, 9), row(BASE_TS + HOUR, 1)], {
      lookback: '1d',
      now,
    });
    expect(candles.map((c) => c.close)).to.deep.equal([1, 2]);
  });
});
