export const RESOLUTION_LABELS = ['1m', '5m', '15m', '30m', '1h', '4h', '12h', '1d', '1w'] as const;
export type ResolutionLabel = (typeof RESOLUTION_LABELS)[number];

export const LOOKBACK_LABELS = ['1h', '4h', '12h', '1d', '3d', '1w', '2w', '1m', '3m', 'all'] as const;
export type LookbackLabel = (typeof LOOKBACK_LABELS)[number];

export type GeckoTimeframe = 'minute' | 'hour' | 'day';

export interface ResolutionSpec {
  label: ResolutionLabel;
  minutes: number;
  tvCode: string;
  gecko: { timeframe: GeckoTimeframe; aggregate: number };
}

export interface BalanceCandle {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  txCount: number;
  netChange: number;
}

export interface VolumeCandle {
  time: number;
  lendVolume: number;
  borrowVolume: number;
  lendCount: number;
  borrowCount: number;
  netFlow: number;
  totalVolume: number;
}

export interface PriceCandle {
  time: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type OperationType =
  | 'OpenTrove'
  | 'AdjustTrove'
  | 'CloseTrove'
  | 'ClaimCollateral'
  | 'ProvideSP'
  | 'WithdrawSP'
  | 'Swap'
  | 'Bridge'
  | 'Approve'
  | 'Transfer'
  | 'Mint'
  | 'Redeem'
  | 'Liquidate'
  | 'Lend'
  | 'Borrow'
  | 'Unknown';

export interface OperationMarker {
  time: number;
  operation: OperationType;
  amount: number;
  txHash: string;
  label: string;
  color: string;
}

export interface OperationMarkerSet {
  markers: OperationMarker[];
  count: number;
  breakdown: Partial<Record<OperationType, number>>;
}
