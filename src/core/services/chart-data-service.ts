import pLimit from 'p-limit';
import { FETCH_CONFIG } from '../../config/constants';
import { AppConfig } from '../../config/env';
import { ChartData, ChartDataOptions } from '../../types/analysis';
import { BlockscoutTransaction } from '../../types/blockscout-api';
import { LookbackLabel, OperationMarkerSet, PriceCandle, ResolutionLabel } from '../../types/charts';
import { DataSourceGateway } from '../../types/gateway';
import { LendingHistory } from '../../types/lending';
import { buildBalanceCandles, buildPriceCandles, buildVolumeCandles } from '../charts/candle-builder';
import { buildOperationMarkers } from '../charts/operation-markers';
import { RESOLUTIONS, priceRequestLimit } from '../charts/resolution';
import { AddressRegistry } from '../normalization/address-registry';
import { normalizeTransactions } from '../normalization/transfer-normalizer';
import { createLogger } from '../utils/logger';
import { isReferenceEvent, optionalSource, ServiceOptions, systemClock } from './address-analysis-service';
import { fetchTransferHistory } from './transfer-history';

const EMPTY_MARKERS: OperationMarkerSet = { markers: [], count: 0, breakdown: {} };

/** Assembles the series behind the address chart: balance, price, lending volume and markers. */
export class ChartDataService {
  private readonly logger = createLogger('ChartDataService');
  private readonly registry: AddressRegistry;
  private readonly clock: () => number;

  constructor(
    private readonly gateway: DataSourceGateway,
    private readonly config: AppConfig,
    options: ServiceOptions = {},
  ) {
    this.registry = new AddressRegistry(config.pools, config.routers);
    this.clock = options.clock ?? systemClock;
  }

  async getChartData(
    address: string,
    resolution: ResolutionLabel,
    lookback: LookbackLabel,
    { includePrice = true, includeLending = true, includeOperations = true }: ChartDataOptions = {},
  ): Promise<ChartData> {
    const now = this.clock();
    const warnings: string[] = [];
    const limit = pLimit(this.config.maxConcurrentRequests);
    const { tvCode, gecko } = RESOLUTIONS[resolution];
    const window = { resolution, lookback, now, utcOffsetMinutes: this.config.chartUtcOffsetMinutes };

    const loadPrice = async (): Promise<PriceCandle[] | undefined> =>
      includePrice
        ? optionalSource(
            this.logger,
            warnings,
            'Price series',
            () =>
              this.gateway.fetchPriceOHLCV(
                this.config.pricePoolAddress,
                gecko.timeframe,
                gecko.aggregate,
                priceRequestLimit(resolution, lookback),
              ),
            [],
          )
        : undefined;
    const loadLending = async (): Promise<LendingHistory | undefined> =>
      includeLending
        ? optionalSource<LendingHistory | undefined>(
            this.logger,
            warnings,
            'Lending history',
            () => this.gateway.fetchLendingHistory(address),
            undefined,
          )
        : undefined;
    const loadTransactions = async (): Promise<BlockscoutTransaction[] | undefined> =>
      includeOperations
        ? optionalSource<BlockscoutTransaction[] | undefined>(
            this.logger,
            warnings,
            'Transactions',
            () => this.gateway.fetchTransactions(address, FETCH_CONFIG.TRANSACTION_HISTORY_LIMIT),
            undefined,
          )
        : undefined;

    const [currentBalance, history, priceRows, lending, rawTransactions] = await Promise.all([
      limit(() => this.gateway.fetchReferenceBalance(address)),
      limit(() => fetchTransferHistory(this.gateway, address, this.registry, this.config.maxTransferPages)),
      limit(loadPrice),
      limit(loadLending),
      limit(loadTransactions),
    ]);

    if (!history.isComplete) {
      warnings.push(`Transfer history truncated after ${history.pagesFetched} page(s)`);
    }

    const referenceEvents = history.events.filter((e) => isReferenceEvent(e, this.config.referenceToken.address));
    const balance = buildBalanceCandles(referenceEvents, { ...window, closingBalance: currentBalance });

    const chart: ChartData = {
      address,
      resolution,
      tvCode,
      lookback,
      generatedAt: now,
      dataComplete: history.isComplete && warnings.length === 0,
      warnings,
      balance,
    };

    if (includePrice) {
      chart.price = buildPriceCandles(priceRows ?? [], { lookback, now });
    }
    if (includeLending) {
      chart.lending = lending ? buildVolumeCandles(lending.transactions, window) : [];
    }
    if (includeOperations) {
      chart.operations = rawTransactions
        ? buildOperationMarkers(normalizeTransactions(rawTransactions), { lookback, now })
        : EMPTY_MARKERS;
    }

    this.logger.info(
      `Chart data for ${address} (${resolution}, ${lookback}): ${balance.length} balance candles (complete: ${chart.dataComplete})`,
    );
    return chart;
  }
}
