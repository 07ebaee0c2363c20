// Reference token: balance series and buy/sell direction are judged against it
export const DEFAULT_REFERENCE_TOKEN = {
  symbol: 'USDFC',
  address: '0x80B98d3aa09ffff255c3ba4A241111Ff1262F045',
  decimals: 18,
} as const;

// Counter-asset placeholder for single-leg pool swaps
export const DEFAULT_BASE_ASSET_SYMBOL = 'WFIL';

// Known tokens on the network; fills in symbols missing from upstream records
export const KNOWN_TOKENS: Readonly<Record<string, string>> = {
  USDFC: '0x80B98d3aa09ffff255c3ba4A241111Ff1262F045',
  WFIL: '0x60E1773636CF5E4A227d9AC24F20fEca034ee25A',
  axlUSDC: '0xEB466342C4d449BC9f53A865D5Cb90586f405215',
  wpFIL: '0x57E3BB9F790185Cfe70Cc2C15Ed5d6B84dCf4aDb',
  iFIL: '0x690908f7fa93afC040CFbD9fE1dDd2C2668Aa0e0',
};

// DEX pools, name -> address
export const DEX_POOLS: Readonly<Record<string, string>> = {
  usdfc_wfil: '0x4e07447bd38e60b94176764133788be1a0736b30',
};

// DEX routers and aggregators, name -> address
export const DEX_ROUTERS: Readonly<Record<string, string>> = {
  squid_router_proxy: '0xce16F69375520ab01377ce7B88f5BA8C48F8D666',
  red_snwapper: '0xAC4c6e212A361AA761D2BA4f96f4e0bb4c9b1A13',
  sushiswap_router: '0x1b02dA8Cb0d097eB8D57A175b88c7D8b47997506',
};

// Contract-name fragments that mark a transaction target as swap-capable
export const ROUTER_NAME_HINTS = ['router', 'swap', 'squid', 'snwap'] as const;

// Router names containing this marker are bridge aggregators
export const BRIDGE_AGGREGATOR_MARKER = 'squid';

// Lending subgraph currency identifiers (bytes32-encoded symbols)
export const LENDING_CURRENCIES = {
  USDFC: '0x5553444643000000000000000000000000000000000000000000000000000000',
  FIL: '0x46494c0000000000000000000000000000000000000000000000000000000000',
} as const;

export const SECONDS_PER_DAY = 86400;

export const BALANCE_RECONSTRUCTION_CONFIG = {
  // Negative excursion beyond this (token units) means an event is missing upstream
  NEGATIVE_BALANCE_TOLERANCE: 0.01,
  CURRENT_EVENT_LABEL: 'current',
} as const;

// Time windows reported in address analyses, in hours
export const VOLUME_WINDOWS_HOURS = {
  '24h': 24,
  '7d': 168,
  '30d': 720,
} as const;

export const FETCH_CONFIG = {
  DEFAULT_MAX_TRANSFER_PAGES: 20,
  TRANSACTION_HISTORY_LIMIT: 50,
  LENDING_TRANSACTIONS_FIRST: 500,
  LENDING_ORDERS_FIRST: 200,
} as const;

export const HTTP_CONFIG = {
  DEFAULT_TIMEOUT_MS: 30000,
  DEFAULT_MAX_RETRIES: 3,
  INITIAL_BACKOFF_MS: 1000,
  DEFAULT_CACHE_TTL_MS: 60000,
  DEFAULT_MAX_CONCURRENT: 10,
  RETRYABLE_STATUS_CODES: [429, 500, 502, 503, 504],
} as const;

// ERC-20 balanceOf(address) selector
export const ERC20_BALANCE_OF_SELECTOR = '0x70a08231';
