import { BehaviorTag } from '../../../types/behavior';

/**
 * Behavior score ladders.
 *
 * Every rung is a strict `>` threshold except the activity ladder, which
 * compares elapsed whole days with `<`. A rung without a tag only moves the score.
 */

export const TRADER_THRESHOLDS_SWAPS = {
  ACTIVE_TRADER: 20, // >20 swaps
  TRADER: 10,
  OCCASIONAL: 5,
  ANY: 0,
} as const;

export const DEFI_THRESHOLDS = {
  POWER_USER: { LENDING_TXS: 10, ROUTER_INTERACTIONS: 5 },
  ACTIVE: { LENDING_TXS: 5, ROUTER_INTERACTIONS: 2 },
  ANY: { LENDING_TXS: 0, ROUTER_INTERACTIONS: 0 },
} as const;

export const HOLDER_THRESHOLDS_POINTS = {
  LONG_TERM: 50, // balance series length
  ESTABLISHED: 20,
} as const;

export const WHALE_THRESHOLDS_BALANCE = {
  WHALE: 50_000,
  LARGE_HOLDER: 10_000,
  MEDIUM: 1_000,
} as const;

export const ACTIVITY_THRESHOLDS_DAYS = {
  RECENT: 7,
  MONTH: 30,
  QUARTER: 90,
} as const;

export const DIVERSITY_THRESHOLDS_TOKENS = {
  MULTI_TOKEN: 5,
  SEVERAL: 3,
  PAIR: 1,
} as const;

export const FALLBACK_TAG: BehaviorTag = 'Casual User';

export interface LadderRung {
  score: number;
  tag?: BehaviorTag;
}

const NO_SCORE: LadderRung = { score: 0 };

export function classifyTrader(swapCount: number): LadderRung {
  if (swapCount > TRADER_THRESHOLDS_SWAPS.ACTIVE_TRADER) {
    return { score: 100, tag: 'Active Trader' };
  } else if (swapCount > TRADER_THRESHOLDS_SWAPS.TRADER) {
    return { score: 70, tag: 'Trader' };
  } else if (swapCount > TRADER_THRESHOLDS_SWAPS.OCCASIONAL) {
    return { score: 40 };
  } else if (swapCount > TRADER_THRESHOLDS_SWAPS.ANY) {
    return { score: 20 };
  }
  return NO_SCORE;
}

export function classifyDefi(lendingTxCount: number, routerInteractionCount: number): LadderRung {
  const { POWER_USER, ACTIVE, ANY } = DEFI_THRESHOLDS;
  if (lendingTxCount > POWER_USER.LENDING_TXS || routerInteractionCount > POWER_USER.ROUTER_INTERACTIONS) {
    return { score: 100, tag: 'DeFi Power User' };
  } else if (lendingTxCount > ACTIVE.LENDING_TXS || routerInteractionCount > ACTIVE.ROUTER_INTERACTIONS) {
    return { score: 70, tag: 'Active DeFi User' };
  } else if (lendingTxCount > ANY.LENDING_TXS || routerInteractionCount > ANY.ROUTER_INTERACTIONS) {
    return { score: 40, tag: 'DeFi User' };
  }
  return NO_SCORE;
}

export function classifyHolder(balanceSeriesLength: number): LadderRung {
  if (balanceSeriesLength > HOLDER_THRESHOLDS_POINTS.LONG_TERM) {
    return { score: 80, tag: 'Long-term User' };
  } else if (balanceSeriesLength > HOLDER_THRESHOLDS_POINTS.ESTABLISHED) {
    return { score: 50 };
  }
  return NO_SCORE;
}

export function classifyWhale(currentBalance: number): LadderRung {
  if (currentBalance > WHALE_THRESHOLDS_BALANCE.WHALE) {
    return { score: 100, tag: 'Whale' };
  } else if (currentBalance > WHALE_THRESHOLDS_BALANCE.LARGE_HOLDER) {
    return { score: 70, tag: 'Large Holder' };
  } else if (currentBalance > WHALE_THRESHOLDS_BALANCE.MEDIUM) {
    return { score: 40 };
  }
  return NO_SCORE;
}

/** `daysSinceLastTransfer` is undefined when the address never transferred. */
export function classifyActivity(daysSinceLastTransfer: number | undefined): LadderRung {
  if (daysSinceLastTransfer === undefined) {
    return NO_SCORE;
  } else if (daysSinceLastTransfer < ACTIVITY_THRESHOLDS_DAYS.RECENT) {
    return { score: 100, tag: 'Recently Active' };
  } else if (daysSinceLastTransfer < ACTIVITY_THRESHOLDS_DAYS.MONTH) {
    return { score: 70 };
  } else if (daysSinceLastTransfer < ACTIVITY_THRESHOLDS_DAYS.QUARTER) {
    return { score: 40 };
  }
  return { score: 0, tag: 'Inactive' };
}

export function classifyDiversity(uniqueTokenCount: number): LadderRung {
  if (uniqueTokenCount > DIVERSITY_THRESHOLDS_TOKENS.MULTI_TOKEN) {
    return { score: 100, tag: 'Multi-Token User' };
  } else if (uniqueTokenCount > DIVERSITY_THRESHOLDS_TOKENS.SEVERAL) {
    return { score: 70 };
  } else if (uniqueTokenCount > DIVERSITY_THRESHOLDS_TOKENS.PAIR) {
    return { score: 40 };
  }
  return NO_SCORE;
}
