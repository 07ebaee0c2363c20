import { AppConfig } from '../../config/env';
import { LENDING_CURRENCIES } from '../../config/constants';
import { BlockscoutInternalTransaction, BlockscoutTransaction } from '../../types/blockscout-api';
import { GeckoTimeframe, PriceCandle } from '../../types/charts';
import { DataSourceGateway, TransferPage } from '../../types/gateway';
import { LendingHistory } from '../../types/lending';
import { buildLendingHistory } from '../analysis/lending/lending-stats';
import { BlockscoutApiClient, encodePageParams } from './blockscout-api-client';
import { GeckoTerminalClient } from './gecko-terminal-client';
import { HttpClientOptions } from './http-json-client';
import { RpcClient } from './rpc-client';
import { SubgraphClient } from './subgraph-client';

export interface GatewayClients {
  blockscout: BlockscoutApiClient;
  rpc: RpcClient;
  subgraph: SubgraphClient;
  gecko: GeckoTerminalClient;
}

/** Transport settings shared by every client; `baseUrl` comes from the config. */
export type SharedClientOptions = Omit<HttpClientOptions, 'baseUrl'>;

export function createGatewayClients(config: AppConfig, shared: SharedClientOptions = {}): GatewayClients {
  const options = (baseUrl: string): HttpClientOptions => ({
    timeoutMs: config.requestTimeoutMs,
    maxAttempts: config.maxRetries,
    cacheTtlMs: config.cacheTtlMs,
    ...shared,
    baseUrl,
  });

  return {
    blockscout: new BlockscoutApiClient(options(config.blockscoutRestUrl)),
    rpc: new RpcClient(options(config.rpcUrl)),
    subgraph: new SubgraphClient(options(config.subgraphUrl)),
    gecko: new GeckoTerminalClient(options(config.geckoTerminalUrl), config.geckoTerminalNetwork),
  };
}

export class HttpDataSourceGateway implements DataSourceGateway {
  constructor(
    private readonly config: AppConfig,
    private readonly clients: GatewayClients = createGatewayClients(config),
  ) {}

  async fetchTransferPage(address: string, pageToken?: string): Promise<TransferPage> {
    const page = await this.clients.blockscout.getTokenTransfers(address, pageToken);
    return { items: page.items ?? [], nextPageToken: encodePageParams(page.next_page_params) };
  }

  fetchInternalTransactions(address: string): Promise<BlockscoutInternalTransaction[]> {
    return this.clients.blockscout.getInternalTransactions(address);
  }

  async fetchTransactions(address: string, limit: number): Promise<BlockscoutTransaction[]> {
    const transactions = await this.clients.blockscout.getTransactions(address);
    return transactions.slice(0, limit);
  }

  async fetchLendingHistory(address: string): Promise<LendingHistory> {
    const user = await this.clients.subgraph.getLendingUser(address);
    return buildLendingHistory(user, LENDING_CURRENCIES.USDFC);
  }

  fetchPriceOHLCV(pool: string, timeframe: GeckoTimeframe, aggregate: number, limit: number): Promise<PriceCandle[]> {
    return this.clients.gecko.getPoolOhlcv(pool, timeframe, aggregate, limit);
  }

  fetchReferenceBalance(address: string): Promise<number> {
    const { address: token, decimals } = this.config.referenceToken;
    return this.clients.rpc.getTokenBalance(token, address, decimals);
  }
}
