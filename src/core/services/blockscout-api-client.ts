import {
  BlockscoutInternalTransaction,
  BlockscoutPage,
  BlockscoutTokenTransfer,
  BlockscoutTransaction,
} from '../../types/blockscout-api';
import { HttpClientOptions, HttpJsonClient } from './http-json-client';
import { isOptionalArray, isRecord } from './response-guards';

function isPage(body: unknown): body is BlockscoutPage<never> {
  return isRecord(body) && isOptionalArray(body.items) && (body.next_page_params == null || isRecord(body.next_page_params));
}

// Item fields are validated during normalization, so the page check is the contract here.
const isTransferPage = (body: unknown): body is BlockscoutPage<BlockscoutTokenTransfer> => isPage(body);
const isInternalPage = (body: unknown): body is BlockscoutPage<BlockscoutInternalTransaction> => isPage(body);
const isTransactionPage = (body: unknown): body is BlockscoutPage<BlockscoutTransaction> => isPage(body);

/** Serializes Blockscout's `next_page_params` into an opaque query-string cursor. */
export function encodePageParams(params: BlockscoutPage<unknown>['next_page_params']): string | undefined {
  if (!params) return undefined;
  const query = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== null && value !== undefined) query.append(key, String(value));
  }
  const encoded = query.toString();
  return encoded === '' ? undefined : encoded;
}

export function decodePageParams(pageToken: string | undefined): Record<string, string> {
  return pageToken ? Object.fromEntries(new URLSearchParams(pageToken)) : {};
}

/** Blockscout REST v2 address endpoints. */
export class BlockscoutApiClient extends HttpJsonClient {
  constructor(options: HttpClientOptions) {
    super('BlockscoutApiClient', options);
  }

  async getTokenTransfers(address: string, pageToken?: string): Promise<BlockscoutPage<BlockscoutTokenTransfer>> {
    return this.get(`/addresses/${address}/token-transfers`, isTransferPage, {
      params: { type: 'ERC-20', ...decodePageParams(pageToken) },
    });
  }

  async getInternalTransactions(address: string): Promise<BlockscoutInternalTransaction[]> {
    const page = await this.get(`/addresses/${address}/internal-transactions`, isInternalPage);
    return page.items ?? [];
  }

  async getTransactions(address: string): Promise<BlockscoutTransaction[]> {
    const page = await this.get(`/addresses/${address}/transactions`, isTransactionPage);
    return page.items ?? [];
  }
}
