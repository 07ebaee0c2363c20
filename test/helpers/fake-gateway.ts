import { EMPTY_LENDING_HISTORY } from '../../src/core/analysis/lending/lending-stats';
import { BlockscoutInternalTransaction, BlockscoutTokenTransfer, BlockscoutTransaction } from '../../src/types/blockscout-api';
import { GeckoTimeframe, PriceCandle } from '../../src/types/charts';
import { DataSourceGateway, TransferPage } from '../../src/types/gateway';
import { LendingHistory } from '../../src/types/lending';
import { REFERENCE_ADDRESS } from './fixtures';

export interface RawTransferInput {
  hash: string;
  timestamp: number;
  from: string;
  to: string;
  amount: number;
  symbol?: string;
  token?: string;
}

export function isoTime(timestamp: number): string {
  return new Date(timestamp * 1000).toISOString();
}

/** Blockscout token-transfer record with an 18-decimal integer amount. */
export function rawTransfer(input: RawTransferInput): BlockscoutTokenTransfer {
  return {
    transaction_hash: input.hash,
    timestamp: isoTime(input.timestamp),
    block_number: 100,
    from: { hash: input.from },
    to: { hash: input.to },
    total: { value: (BigInt(input.amount) * 10n ** 18n).toString(), decimals: '18' },
    token: { symbol: input.symbol ?? 'USDFC', address_hash: input.token ?? REFERENCE_ADDRESS, decimals: '18' },
  };
}

type Source<T> = T | Error;

function resolve<T>(source: Source<T>): Promise<T> {
  return source instanceof Error ? Promise.reject(source) : Promise.resolve(source);
}

/**
 * Gateway backed by canned data. Pages are keyed by the token that requests
 * them; the first page uses the empty key.
 */
export class FakeGateway implements DataSourceGateway {
  pages = new Map<string, Source<TransferPage>>();
  balance: Source<number> = 0;
  internal: Source<BlockscoutInternalTransaction[]> = [];
  transactions: Source<BlockscoutTransaction[]> = [];
  lending: Source<LendingHistory> = EMPTY_LENDING_HISTORY;
  prices: Source<PriceCandle[]> = [];

  readonly pageRequests: Array<string | undefined> = [];
  readonly priceRequests: Array<[string, GeckoTimeframe, number, number]> = [];

  fetchTransferPage(_address: string, pageToken?: string): Promise<TransferPage> {
    this.pageRequests.push(pageToken);
    return resolve(this.pages.get(pageToken ?? '') ?? { items: [] });
  }

  fetchInternalTransactions(): Promise<BlockscoutInternalTransaction[]> {
    return resolve(this.internal);
  }

  fetchTransactions(): Promise<BlockscoutTransaction[]> {
    return resolve(this.transactions);
  }

  fetchLendingHistory(): Promise<LendingHistory> {
    return resolve(this.lending);
  }

  fetchPriceOHLCV(pool: string, timeframe: GeckoTimeframe, aggregate: number, limit: number): Promise<PriceCandle[]> {
    this.priceRequests.push([pool, timeframe, aggregate, limit]);
    return resolve(this.prices);
  }

  fetchReferenceBalance(): Promise<number> {
    return resolve(this.balance);
  }
}
