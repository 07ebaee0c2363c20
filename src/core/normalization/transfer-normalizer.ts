import { KNOWN_TOKENS } from '../../config/constants';
import { createLogger } from '../utils/logger';
import {
  BlockscoutInternalTransaction,
  BlockscoutTokenTransfer,
  BlockscoutTransaction,
} from '../../types/blockscout-api';
import { AddressTransaction, InternalTransaction } from '../../types/transaction';
import { TransferDirection, TransferEvent } from '../../types/transfer';
import { AddressRegistry } from './address-registry';

const logger = createLogger('TransferNormalizer');

const DEFAULT_DECIMALS = 18;
const NATIVE_DECIMALS = 18;

/** ISO-8601 (or numeric seconds) to whole unix seconds; null when unparsable. */
export function parseTimestamp(value: string | number | undefined | null): number | null {
  if (value === undefined || value === null || value === '') return null;
  if (typeof value === 'number') return Number.isFinite(value) ? Math.floor(value) : null;
  if (/^\d+$/.test(value)) return Number(value);
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : Math.floor(ms / 1000);
}

/** Raw integer string scaled by `10^decimals`; null when not numeric. */
export function scaleAmount(raw: string | number | undefined | null, decimals: number): number | null {
  if (raw === undefined || raw === null || raw === '') return null;
  const value = Number(raw);
  if (!Number.isFinite(value)) return null;
  return value / 10 ** decimals;
}

function parseDecimals(...candidates: Array<string | null | undefined>): number {
  for (const candidate of candidates) {
    if (candidate === undefined || candidate === null || candidate === '') continue;
    const parsed = Number(candidate);
    if (Number.isInteger(parsed) && parsed >= 0) return parsed;
  }
  return DEFAULT_DECIMALS;
}

const KNOWN_SYMBOLS = new Map(Object.entries(KNOWN_TOKENS).map(([symbol, address]) => [address.toLowerCase(), symbol]));

/** Upstream symbol, else the known-token table, else UNKNOWN. */
export function tokenSymbolFor(symbol: string | null | undefined, tokenAddress: string): string {
  return symbol || KNOWN_SYMBOLS.get(tokenAddress.toLowerCase()) || 'UNKNOWN';
}

export function directionFor(subject: string, from: string, to: string): TransferDirection {
  const self = subject.toLowerCase();
  if (to.toLowerCase() === self) return 'in';
  if (from.toLowerCase() === self) return 'out';
  return 'internal';
}

/**
 * Maps one Blockscout token-transfer record onto a TransferEvent relative to
 * `subject`. Returns null for records missing a timestamp, hash or amount.
 */
export function normalizeTransfer(
  raw: BlockscoutTokenTransfer,
  subject: string,
  registry: AddressRegistry,
): TransferEvent | null {
  const txHash = raw.transaction_hash;
  const timestamp = parseTimestamp(raw.timestamp);
  const decimals = parseDecimals(raw.token?.decimals, raw.total?.decimals);
  const amount = scaleAmount(raw.total?.value, decimals);

  if (!txHash || timestamp === null || amount === null) {
    return null;
  }

  const from = raw.from?.hash ?? '';
  const to = raw.to?.hash ?? '';
  const tokenAddress = raw.token?.address_hash ?? raw.token?.address ?? '';

  return {
    timestamp,
    from,
    to,
    amount: Math.abs(amount),
    tokenSymbol: tokenSymbolFor(raw.token?.symbol, tokenAddress),
    tokenAddress,
    txHash,
    blockNumber: typeof raw.block_number === 'number' ? raw.block_number : null,
    direction: directionFor(subject, from, to),
    counterpartyTag: registry.tagCounterparty(from, to),
  };
}

export interface NormalizedBatch<T> {
  events: T[];
  dropped: number;
}

export function normalizeTransfers(
  records: BlockscoutTokenTransfer[],
  subject: string,
  registry: AddressRegistry,
): NormalizedBatch<TransferEvent> {
  const events: TransferEvent[] = [];
  for (const record of records) {
    const event = normalizeTransfer(record, subject, registry);
    if (event) events.push(event);
  }
  const dropped = records.length - events.length;
  if (dropped > 0) {
    logger.debug(`Dropped ${dropped} malformed transfer record(s) of ${records.length}`);
  }
  return { events, dropped };
}

export function normalizeTransaction(raw: BlockscoutTransaction): AddressTransaction | null {
  const timestamp = parseTimestamp(raw.timestamp);
  if (!raw.hash || timestamp === null) return null;
  return {
    hash: raw.hash,
    timestamp,
    to: raw.to?.hash ?? '',
    method: raw.method ?? '',
    contractName: raw.to?.name ?? '',
    value: scaleAmount(raw.value, NATIVE_DECIMALS) ?? 0,
  };
}

export function normalizeTransactions(records: BlockscoutTransaction[]): AddressTransaction[] {
  const transactions = records
    .map(normalizeTransaction)
    .filter((tx): tx is AddressTransaction => tx !== null);
  if (transactions.length < records.length) {
    logger.debug(`Dropped ${records.length - transactions.length} malformed transaction record(s)`);
  }
  return transactions;
}

export function normalizeInternalTransactions(records: BlockscoutInternalTransaction[]): InternalTransaction[] {
  const result: InternalTransaction[] = [];
  for (const raw of records) {
    const timestamp = parseTimestamp(raw.timestamp);
    if (!raw.transaction_hash || timestamp === null) continue;
    result.push({
      txHash: raw.transaction_hash,
      timestamp,
      type: raw.type ?? 'call',
      from: raw.from?.hash ?? '',
      to: raw.to?.hash ?? '',
      value: scaleAmount(raw.value, NATIVE_DECIMALS) ?? 0,
    });
  }
  return result;
}
