import { GeckoTimeframe, PriceCandle } from '../../types/charts';
import { HttpClientOptions, HttpJsonClient } from './http-json-client';
import { isRecord } from './response-guards';

interface OhlcvResponse {
  data: { attributes: { ohlcv_list: unknown[] } };
}

function isOhlcvResponse(body: unknown): body is OhlcvResponse {
  return (
    isRecord(body) &&
    isRecord(body.data) &&
    isRecord(body.data.attributes) &&
    Array.isArray(body.data.attributes.ohlcv_list)
  );
}

/** `[timestamp, open, high, low, close, volume]` rows; malformed rows are skipped. */
export function parseOhlcvRows(rows: unknown[]): PriceCandle[] {
  const candles: PriceCandle[] = [];
  for (const row of rows) {
    if (!Array.isArray(row) || row.length < 6) continue;
    const [time, open, high, low, close, volume] = row.slice(0, 6).map((v: unknown) => Number(v));
    if (![time, open, high, low, close, volume].every(Number.isFinite)) continue;
    candles.push({ time: Math.floor(time), open, high, low, close, volume });
  }
  return candles;
}

/** GeckoTerminal public API: pool OHLCV series. */
export class GeckoTerminalClient extends HttpJsonClient {
  constructor(
    options: HttpClientOptions,
    private readonly network: string,
  ) {
    super('GeckoTerminalClient', options);
  }

  async getPoolOhlcv(pool: string, timeframe: GeckoTimeframe, aggregate: number, limit: number): Promise<PriceCandle[]> {
    const body = await this.get(`/networks/${this.network}/pools/${pool}/ohlcv/${timeframe}`, isOhlcvResponse, {
      params: { aggregate, limit },
    });
    return parseOhlcvRows(body.data.attributes.ohlcv_list);
  }
}
