import { BalanceHistory, VolumeWindow } from './balance';
import { BehaviorProfile } from './behavior';
import {
  BalanceCandle,
  LookbackLabel,
  OperationMarkerSet,
  PriceCandle,
  ResolutionLabel,
  VolumeCandle,
} from './charts';
import { LendingHistory } from './lending';
import { RouterInteraction, SwapEvent, SwapStats } from './swap';

export interface TransferSummary {
  totalTransfers: number;
  referenceTransfers: number;
  otherTokenTransfers: number;
  tokensUsed: string[];
}

export interface AddressAnalysis {
  address: string;
  generatedAt: number;
  fetchTimeMs: number;
  /** False when any upstream source was truncated or unavailable. */
  dataComplete: boolean;
  warnings: string[];
  currentBalance: number;
  isHolder: boolean;
  transferSummary: TransferSummary;
  balanceHistory: BalanceHistory & { minBalance: number; maxBalance: number };
  swaps: SwapEvent[];
  swapStats: SwapStats;
  routerInteractions: RouterInteraction[];
  internalTransactionCount: number;
  lending: LendingHistory;
  volume: Record<'24h' | '7d' | '30d', VolumeWindow>;
  behavior: BehaviorProfile;
}

export interface ChartDataOptions {
  includePrice?: boolean;
  includeLending?: boolean;
  includeOperations?: boolean;
}

export interface ChartData {
  address: string;
  resolution: ResolutionLabel;
  tvCode: string;
  lookback: LookbackLabel;
  generatedAt: number;
  dataComplete: boolean;
  warnings: string[];
  balance: BalanceCandle[];
  price?: PriceCandle[];
  lending?: VolumeCandle[];
  operations?: OperationMarkerSet;
}
