export * from './types/analysis';
export * from './types/balance';
export * from './types/behavior';
export * from './types/blockscout-api';
export * from './types/charts';
export * from './types/gateway';
export * from './types/lending';
export * from './types/swap';
export * from './types/transaction';
export * from './types/transfer';

export { loadConfig } from './config/env';
export type { AppConfig, ReferenceTokenConfig } from './config/env';
export { ConfigError, DataSourceError } from './core/utils/errors';
export { createLogger } from './core/utils/logger';

export { AddressRegistry } from './core/normalization/address-registry';
export {
  normalizeTransfer,
  normalizeTransfers,
  normalizeTransactions,
  normalizeInternalTransactions,
} from './core/normalization/transfer-normalizer';
export { detectRouterInteractions } from './core/normalization/router-interactions';

export { classifySwaps, computeSwapStats } from './core/analysis/swap/swap-classifier';
export {
  reconstructBalanceHistory,
  replayBalance,
  signedAmount,
} from './core/analysis/balance/balance-reconstructor';
export { computeVolumeWindow } from './core/analysis/balance/volume-windows';
export { buildLendingHistory, computeLendingStats } from './core/analysis/lending/lending-stats';
export { classifyBehavior } from './core/analysis/behavior/behavior-classifier';

export {
  RESOLUTIONS,
  LOOKBACK_MINUTES,
  alignToResolution,
  enumerateBuckets,
  lookbackCutoff,
  parseLookback,
  parseResolution,
  priceRequestLimit,
} from './core/charts/resolution';
export { buildBalanceCandles, buildPriceCandles, buildVolumeCandles } from './core/charts/candle-builder';
export { buildOperationMarkers, classifyOperation } from './core/charts/operation-markers';

export { HttpDataSourceGateway, createGatewayClients } from './core/services/http-data-source-gateway';
export { fetchTransferHistory } from './core/services/transfer-history';
export { AddressAnalysisService } from './core/services/address-analysis-service';
export { ChartDataService } from './core/services/chart-data-service';
