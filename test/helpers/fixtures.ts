import { AppConfig, loadConfig } from '../../src/config/env';
import { TransferEvent } from '../../src/types/transfer';

export const SUBJECT = '0x1111111111111111111111111111111111111111';
export const OTHER = '0x2222222222222222222222222222222222222222';
export const REFERENCE_ADDRESS = '0x80B98d3aa09ffff255c3ba4A241111Ff1262F045';
export const WFIL_ADDRESS = '0x60E1773636CF5E4A227d9AC24F20fEca034ee25A';
export const POOL_ADDRESS = '0x4e07447bd38e60b94176764133788be1a0736b30';
export const SQUID_ROUTER = '0xce16F69375520ab01377ce7B88f5BA8C48F8D666';

/** 2024-01-01T00:00:00Z, a Monday. */
export const BASE_TS = 1704067200;
export const HOUR = 3600;
export const DAY = 86400;

let hashCounter = 0;

export function transfer(overrides: Partial<TransferEvent> = {}): TransferEvent {
  hashCounter++;
  return {
    timestamp: BASE_TS,
    from: OTHER,
    to: SUBJECT,
    amount: 1,
    tokenSymbol: 'USDFC',
    tokenAddress: REFERENCE_ADDRESS,
    txHash: `0xhash${hashCounter}`,
    blockNumber: 1000 + hashCounter,
    direction: 'in',
    counterpartyTag: 'none',
    ...overrides,
  };
}

export function usdfcIn(amount: number, timestamp: number, txHash?: string): TransferEvent {
  return transfer({ amount, timestamp, direction: 'in', ...(txHash ? { txHash } : {}) });
}

export function usdfcOut(amount: number, timestamp: number, txHash?: string): TransferEvent {
  return transfer({ amount, timestamp, direction: 'out', from: SUBJECT, to: OTHER, ...(txHash ? { txHash } : {}) });
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig({}), maxTransferPages: 3, ...overrides };
}
