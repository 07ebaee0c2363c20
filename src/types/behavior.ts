/**
 * Inputs to the behavior classifier, aggregated from the other analysis stages.
 */
export interface BehaviorFeatures {
  transferCount: number;
  uniqueTokenCount: number;
  swapCount: number;
  lendingTxCount: number;
  routerInteractionCount: number;
  routerNames: string[];
  balanceSeriesLength: number;
  currentBalance: number;
  /** Seconds since the newest transfer; absent when the address has none. */
  mostRecentTransferAgeSeconds?: number;
}

export interface BehaviorScores {
  traderScore: number;
  holderScore: number;
  defiScore: number;
  whaleScore: number;
  activityScore: number;
  diversityScore: number;
}

export type BehaviorTag =
  | 'Active Trader'
  | 'Trader'
  | 'DeFi Power User'
  | 'Active DeFi User'
  | 'DeFi User'
  | 'Long-term User'
  | 'Current Holder'
  | 'Whale'
  | 'Large Holder'
  | 'Recently Active'
  | 'Inactive'
  | 'Multi-Token User'
  | 'Cross-Chain User'
  | 'Casual User';

export interface BehaviorProfile {
  scores: BehaviorScores;
  tags: BehaviorTag[];
}
