/**
 * Subset of the Blockscout REST v2 payloads the clients read.
 * Every field is optional: upstream records are validated during normalization.
 */

export interface BlockscoutAddressRef {
  hash?: string;
  name?: string | null;
}

export interface BlockscoutTokenRef {
  symbol?: string | null;
  address?: string;
  address_hash?: string;
  decimals?: string | null;
}

export interface BlockscoutTokenTransfer {
  transaction_hash?: string;
  timestamp?: string;
  block_number?: number | null;
  from?: BlockscoutAddressRef;
  to?: BlockscoutAddressRef;
  total?: { value?: string; decimals?: string | null };
  token?: BlockscoutTokenRef;
}

export interface BlockscoutInternalTransaction {
  transaction_hash?: string;
  timestamp?: string;
  type?: string;
  from?: BlockscoutAddressRef;
  to?: BlockscoutAddressRef | null;
  value?: string;
}

export interface BlockscoutTransaction {
  hash?: string;
  timestamp?: string;
  method?: string | null;
  value?: string;
  to?: BlockscoutAddressRef | null;
}

export interface BlockscoutPage<T> {
  items?: T[];
  next_page_params?: Record<string, string | number | null> | null;
}
