/**
 * Raw lending-protocol records as returned by the subgraph `user` query.
 * Numeric fields arrive as decimal strings; `side` as 0/1 or "0"/"1".
 */
export interface RawLendingTransaction {
  id?: string;
  createdAt?: string | number;
  side?: string | number;
  currency?: string;
  maturity?: string | number;
  futureValue?: string | number;
  executionPrice?: string | number | null;
}

export interface RawLendingOrder {
  id?: string;
  status?: string;
  side?: string | number;
  currency?: string;
  maturity?: string | number;
  createdAt?: string | number;
  inputAmount?: string;
  filledAmount?: string;
}

export interface RawLendingUser {
  id?: string;
  createdAt?: string;
  transactionCount?: string | number;
  orderCount?: string | number;
  transactions?: RawLendingTransaction[];
  orders?: RawLendingOrder[];
}

export type LendingSide = 'lend' | 'borrow';

export interface LendingTransaction {
  timestamp: number;
  side: LendingSide;
  futureValue: number;
  executionPrice: number;
  maturity: number;
  daysToMaturity: number;
  apr: number;
}

export interface LendingStats {
  lendTxCount: number;
  borrowTxCount: number;
  totalLendVolume: number;
  totalBorrowVolume: number;
  avgLendApr: number;
  avgBorrowApr: number;
  netPosition: number;
}

export interface LendingHistory {
  hasActivity: boolean;
  transactions: LendingTransaction[];
  orders: RawLendingOrder[];
  stats: LendingStats;
  totalTxCount: number;
  totalOrderCount: number;
}
