export type TransferDirection = 'in' | 'out' | 'internal';

export type CounterpartyTag = 'none' | `pool:${string}` | `router:${string}`;

/**
 * One token transfer touching the subject address, in token units.
 * Direction is relative to the subject; `amount` is never negative.
 */
export interface TransferEvent {
  readonly timestamp: number; // unix seconds
  readonly from: string;
  readonly to: string;
  readonly amount: number;
  readonly tokenSymbol: string;
  readonly tokenAddress: string;
  readonly txHash: string;
  readonly blockNumber: number | null;
  readonly direction: TransferDirection;
  readonly counterpartyTag: CounterpartyTag;
}

/** Result of walking the paginated transfer endpoint. */
export interface TransferHistory {
  events: TransferEvent[];
  /** False when the walk stopped before the upstream ran out of pages. */
  isComplete: boolean;
  pagesFetched: number;
  droppedRecords: number;
}
