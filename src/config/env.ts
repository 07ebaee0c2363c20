import { ConfigError } from '../core/utils/errors';
import {
  DEFAULT_BASE_ASSET_SYMBOL,
  DEFAULT_REFERENCE_TOKEN,
  DEX_POOLS,
  DEX_ROUTERS,
  FETCH_CONFIG,
  HTTP_CONFIG,
} from './constants';

export interface ReferenceTokenConfig {
  address: string;
  symbol: string;
  decimals: number;
}

export interface AppConfig {
  blockscoutRestUrl: string;
  rpcUrl: string;
  subgraphUrl: string;
  geckoTerminalUrl: string;
  geckoTerminalNetwork: string;
  referenceToken: ReferenceTokenConfig;
  baseAssetSymbol: string;
  /** Pool whose OHLCV series backs the price chart. */
  pricePoolAddress: string;
  pools: Readonly<Record<string, string>>;
  routers: Readonly<Record<string, string>>;
  maxConcurrentRequests: number;
  requestTimeoutMs: number;
  maxRetries: number;
  cacheTtlMs: number;
  maxTransferPages: number;
  chartUtcOffsetMinutes: number;
}

type Env = Readonly<Record<string, string | undefined>>;

const EVM_ADDRESS = /^0x[a-fA-F0-9]{40}$/;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readUrl(env: Env, key: string, fallback: string): string {
  const value = readString(env, key, fallback);
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${key} is not a valid URL: "${value}"`);
  }
  return value.replace(/\/+$/, '');
}

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function readAddress(env: Env, key: string, fallback: string): string {
  const value = readString(env, key, fallback);
  if (!EVM_ADDRESS.test(value)) {
    throw new ConfigError(`${key} must be a 0x-prefixed 20-byte address, got "${value}"`);
  }
  return value;
}

/**
 * Builds the typed application config from environment variables.
 * Call `dotenv.config()` first when running from a script.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const offset = env.CHART_UTC_OFFSET_MINUTES?.trim();
  const chartUtcOffsetMinutes = offset ? Number(offset) : 0;
  if (!Number.isInteger(chartUtcOffsetMinutes) || Math.abs(chartUtcOffsetMinutes) > 14 * 60) {
    throw new ConfigError(`CHART_UTC_OFFSET_MINUTES must be an integer within +/-840, got "${offset}"`);
  }

  return {
    blockscoutRestUrl: readUrl(env, 'BLOCKSCOUT_REST_URL', 'https://filecoin.blockscout.com/api/v2'),
    rpcUrl: readUrl(env, 'RPC_URL', 'https://api.node.glif.io/rpc/v1'),
    subgraphUrl: readUrl(
      env,
      'SUBGRAPH_URL',
      'https://api.goldsky.com/api/public/project_cm8i6ca9k24d601wy45zzbsrq/subgraphs/sf-filecoin-mainnet/latest/gn',
    ),
    geckoTerminalUrl: readUrl(env, 'GECKOTERMINAL_URL', 'https://api.geckoterminal.com/api/v2'),
    geckoTerminalNetwork: readString(env, 'GECKOTERMINAL_NETWORK', 'filecoin'),
    referenceToken: {
      address: readAddress(env, 'REFERENCE_TOKEN_ADDRESS', DEFAULT_REFERENCE_TOKEN.address),
      symbol: readString(env, 'REFERENCE_TOKEN_SYMBOL', DEFAULT_REFERENCE_TOKEN.symbol),
      decimals: readInt(env, 'REFERENCE_TOKEN_DECIMALS', DEFAULT_REFERENCE_TOKEN.decimals, 0),
    },
    baseAssetSymbol: readString(env, 'BASE_ASSET_SYMBOL', DEFAULT_BASE_ASSET_SYMBOL),
    pricePoolAddress: readAddress(env, 'PRICE_POOL_ADDRESS', DEX_POOLS.usdfc_wfil),
    pools: DEX_POOLS,
    routers: DEX_ROUTERS,
    maxConcurrentRequests: readInt(env, 'MAX_CONCURRENT_REQUESTS', HTTP_CONFIG.DEFAULT_MAX_CONCURRENT, 1),
    requestTimeoutMs: readInt(env, 'REQUEST_TIMEOUT_MS', HTTP_CONFIG.DEFAULT_TIMEOUT_MS, 1),
    maxRetries: readInt(env, 'MAX_RETRIES', HTTP_CONFIG.DEFAULT_MAX_RETRIES, 1),
    cacheTtlMs: readInt(env, 'CACHE_TTL_MS', HTTP_CONFIG.DEFAULT_CACHE_TTL_MS, 0),
    maxTransferPages: readInt(env, 'MAX_TRANSFER_PAGES', FETCH_CONFIG.DEFAULT_MAX_TRANSFER_PAGES, 1),
    chartUtcOffsetMinutes,
  };
}
