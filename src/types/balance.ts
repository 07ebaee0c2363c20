export interface BalancePoint {
  timestamp: number;
  balance: number;
  eventLabel: string; // "sent 12.50", "received 3.00" or "current"
  dataComplete: boolean;
}

export interface HoldingInterval {
  start: number;
  end?: number; // absent for the interval still open at evaluation time
  durationDays: number;
}

export interface BalanceHistory {
  points: BalancePoint[];
  intervals: HoldingInterval[];
  totalHoldingDays: number;
  currentHoldingDays: number;
  dataComplete: boolean;
}

export interface VolumeWindow {
  inVolume: number;
  outVolume: number;
  totalVolume: number;
  txCount: number;
  hours: number;
}
