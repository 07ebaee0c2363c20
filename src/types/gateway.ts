import { BlockscoutInternalTransaction, BlockscoutTokenTransfer, BlockscoutTransaction } from './blockscout-api';
import { GeckoTimeframe, PriceCandle } from './charts';
import { LendingHistory } from './lending';

export interface TransferPage {
  items: BlockscoutTokenTransfer[];
  /** Opaque cursor for the next page; absent on the last page. */
  nextPageToken?: string;
}

/**
 * Upstream data access for one network. Implementations own transport,
 * retries and caching; the analysis core only sees the returned records.
 */
export interface DataSourceGateway {
  fetchTransferPage(address: string, pageToken?: string): Promise<TransferPage>;
  fetchInternalTransactions(address: string): Promise<BlockscoutInternalTransaction[]>;
  fetchTransactions(address: string, limit: number): Promise<BlockscoutTransaction[]>;
  fetchLendingHistory(address: string): Promise<LendingHistory>;
  fetchPriceOHLCV(pool: string, timeframe: GeckoTimeframe, aggregate: number, limit: number): Promise<PriceCandle[]>;
  /** Current reference-token balance in token units. */
  fetchReferenceBalance(address: string): Promise<number>;
}
