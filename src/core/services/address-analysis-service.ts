import pLimit from 'p-limit';
import { FETCH_CONFIG, VOLUME_WINDOWS_HOURS } from '../../config/constants';
import { AppConfig } from '../../config/env';
import { AddressAnalysis, TransferSummary } from '../../types/analysis';
import { DataSourceGateway } from '../../types/gateway';
import { LendingHistory } from '../../types/lending';
import { TransferEvent } from '../../types/transfer';
import { reconstructBalanceHistory } from '../analysis/balance/balance-reconstructor';
import { computeVolumeWindow } from '../analysis/balance/volume-windows';
import { classifyBehavior } from '../analysis/behavior/behavior-classifier';
import { EMPTY_LENDING_HISTORY } from '../analysis/lending/lending-stats';
import { classifySwaps, computeSwapStats } from '../analysis/swap/swap-classifier';
import { AddressRegistry } from '../normalization/address-registry';
import { detectRouterInteractions } from '../normalization/router-interactions';
import { normalizeInternalTransactions, normalizeTransactions } from '../normalization/transfer-normalizer';
import { errorMessage } from '../utils/errors';
import { AppLogger, createLogger } from '../utils/logger';
import { fetchTransferHistory } from './transfer-history';

export interface ServiceOptions {
  /** Unix-seconds clock; every derived timestamp is relative to it. */
  clock?: () => number;
}

export const systemClock = (): number => Math.floor(Date.now() / 1000);

/**
 * Resolves an optional upstream source, substituting `fallback` and
 * recording a warning when it fails.
 */
export async function optionalSource<T>(
  logger: AppLogger,
  warnings: string[],
  label: string,
  load: () => Promise<T>,
  fallback: T,
): Promise<T> {
  try {
    return await load();
  } catch (error) {
    const message = `${label} unavailable: ${errorMessage(error)}`;
    logger.warn(message);
    warnings.push(message);
    return fallback;
  }
}

export function isReferenceEvent(event: TransferEvent, referenceAddress: string): boolean {
  return event.tokenAddress.toLowerCase() === referenceAddress.toLowerCase();
}

export class AddressAnalysisService {
  private readonly logger = createLogger('AddressAnalysisService');
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

  /**
   * Fetches every source for `address` in parallel and runs the full
   * analysis. Fails only when the balance or the first transfer page
   * cannot be loaded.
   */
  async analyzeAddress(address: string): Promise<AddressAnalysis> {
    const startedAt = Date.now();
    const now = this.clock();
    const warnings: string[] = [];
    const limit = pLimit(this.config.maxConcurrentRequests);
    const { referenceToken } = this.config;

    this.logger.info(`Analyzing ${address}`);

    const [currentBalance, history, rawInternal, rawTransactions, lending] = await Promise.all([
      limit(() => this.gateway.fetchReferenceBalance(address)),
      limit(() => fetchTransferHistory(this.gateway, address, this.registry, this.config.maxTransferPages)),
      limit(() =>
        optionalSource(
          this.logger,
          warnings,
          'Internal transactions',
          () => this.gateway.fetchInternalTransactions(address),
          [],
        ),
      ),
      limit(() =>
        optionalSource(
          this.logger,
          warnings,
          'Transactions',
          () => this.gateway.fetchTransactions(address, FETCH_CONFIG.TRANSACTION_HISTORY_LIMIT),
          [],
        ),
      ),
      limit(() =>
        optionalSource<LendingHistory>(
          this.logger,
          warnings,
          'Lending history',
          () => this.gateway.fetchLendingHistory(address),
          EMPTY_LENDING_HISTORY,
        ),
      ),
    ]);

    if (!history.isComplete) {
      warnings.push(`Transfer history truncated after ${history.pagesFetched} page(s)`);
    }

    const events = history.events;
    const referenceEvents = events.filter((e) => isReferenceEvent(e, referenceToken.address));
    const routerInteractions = detectRouterInteractions(normalizeTransactions(rawTransactions), this.registry);
    const internalTransactions = normalizeInternalTransactions(rawInternal);

    const swaps = classifySwaps(events, routerInteractions, {
      referenceTokenAddress: referenceToken.address,
      baseAssetSymbol: this.config.baseAssetSymbol,
    });
    const swapStats = computeSwapStats(swaps, referenceToken.symbol);

    const balanceHistory = reconstructBalanceHistory(currentBalance, referenceEvents, history.isComplete, now);
    const balances = balanceHistory.points.map((p) => p.balance);

    const newestTransfer = events.reduce<number | undefined>(
      (newest, e) => (newest === undefined || e.timestamp > newest ? e.timestamp : newest),
      undefined,
    );

    const behavior = classifyBehavior({
      transferCount: events.length,
      uniqueTokenCount: new Set(events.map((e) => e.tokenSymbol)).size,
      swapCount: swaps.length,
      lendingTxCount: lending.stats.lendTxCount + lending.stats.borrowTxCount,
      routerInteractionCount: routerInteractions.length,
      routerNames: routerInteractions.map((r) => r.router),
      balanceSeriesLength: balanceHistory.points.length,
      currentBalance,
      ...(newestTransfer !== undefined ? { mostRecentTransferAgeSeconds: now - newestTransfer } : {}),
    });

    const transferSummary: TransferSummary = {
      totalTransfers: events.length,
      referenceTransfers: referenceEvents.length,
      otherTokenTransfers: events.length - referenceEvents.length,
      tokensUsed: [...new Set(events.map((e) => e.tokenSymbol))].sort(),
    };

    const dataComplete = history.isComplete && balanceHistory.dataComplete && warnings.length === 0;

    const analysis: AddressAnalysis = {
      address,
      generatedAt: now,
      fetchTimeMs: Date.now() - startedAt,
      dataComplete,
      warnings,
      currentBalance,
      isHolder: currentBalance > 0,
      transferSummary,
      balanceHistory: {
        ...balanceHistory,
        minBalance: Math.min(...balances),
        maxBalance: Math.max(...balances),
      },
      swaps,
      swapStats,
      routerInteractions,
      internalTransactionCount: internalTransactions.length,
      lending,
      volume: {
        '24h': computeVolumeWindow(referenceEvents, VOLUME_WINDOWS_HOURS['24h'], now),
        '7d': computeVolumeWindow(referenceEvents, VOLUME_WINDOWS_HOURS['7d'], now),
        '30d': computeVolumeWindow(referenceEvents, VOLUME_WINDOWS_HOURS['30d'], now),
      },
      behavior,
    };

    this.logger.info(
      `Analysis of ${address} done: ${events.length} transfers, ${swaps.length} swaps, tags [${behavior.tags.join(', ')}] (complete: ${dataComplete})`,
    );
    return analysis;
  }
}
