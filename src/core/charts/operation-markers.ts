import { LookbackLabel, OperationMarker, OperationMarkerSet, OperationType } from '../../types/charts';
import { AddressTransaction } from '../../types/transaction';
import { lookbackCutoff } from './resolution';

interface OperationRule {
  patterns: readonly string[];
  type: OperationType;
  label: string;
  color: string;
}

// First matching rule wins, so specific method names come before generic ones.
const OPERATION_RULES: readonly OperationRule[] = [
  { patterns: ['opentrove'], type: 'OpenTrove', label: 'Open', color: '#22c55e' },
  { patterns: ['adjusttrove'], type: 'AdjustTrove', label: 'Adjust', color: '#3b82f6' },
  { patterns: ['closetrove'], type: 'CloseTrove', label: 'Close', color: '#ef4444' },
  { patterns: ['claimcollateral'], type: 'ClaimCollateral', label: 'Claim', color: '#f59e0b' },
  { patterns: ['providetosp', 'providetostabilitypool'], type: 'ProvideSP', label: 'SP+', color: '#22c55e' },
  { patterns: ['withdrawfromsp', 'withdrawfromstabilitypool'], type: 'WithdrawSP', label: 'SP-', color: '#ef4444' },
  { patterns: ['swap', 'snwap'], type: 'Swap', label: 'Swap', color: '#8b5cf6' },
  { patterns: ['bridge'], type: 'Bridge', label: 'Bridge', color: '#06b6d4' },
  { patterns: ['approve'], type: 'Approve', label: 'Approve', color: '#6b7280' },
  { patterns: ['transfer'], type: 'Transfer', label: 'Transfer', color: '#6b7280' },
  { patterns: ['mint'], type: 'Mint', label: 'Mint', color: '#22c55e' },
  { patterns: ['redeem'], type: 'Redeem', label: 'Redeem', color: '#ef4444' },
  { patterns: ['liquidate'], type: 'Liquidate', label: 'Liq!', color: '#dc2626' },
  { patterns: ['lend', 'deposit'], type: 'Lend', label: 'Lend', color: '#22c55e' },
  { patterns: ['borrow'], type: 'Borrow', label: 'Borrow', color: '#f97316' },
];

const UNKNOWN_OPERATION = { type: 'Unknown', label: '?', color: '#6b7280' } as const;

export function classifyOperation(method: string): Pick<OperationMarker, 'operation' | 'label' | 'color'> {
  const lowered = method.toLowerCase();
  const rule = OPERATION_RULES.find((r) => r.patterns.some((pattern) => lowered.includes(pattern)));
  const { type, label, color } = rule ?? UNKNOWN_OPERATION;
  return { operation: type, label, color };
}

export function buildOperationMarkers(
  transactions: readonly AddressTransaction[],
  options: { lookback: LookbackLabel; now: number },
): OperationMarkerSet {
  const cutoff = lookbackCutoff(options.lookback, options.now);
  const markers: OperationMarker[] = [];
  const breakdown: Partial<Record<OperationType, number>> = {};

  for (const tx of transactions) {
    if (cutoff !== null && tx.timestamp < cutoff) continue;
    const classified = classifyOperation(tx.method || 'unknown');
    breakdown[classified.operation] = (breakdown[classified.operation] ?? 0) + 1;
    markers.push({ time: tx.timestamp, amount: tx.value, txHash: tx.hash, ...classified });
  }

  return { markers, count: markers.length, breakdown };
}
