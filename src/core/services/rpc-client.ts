import { ERC20_BALANCE_OF_SELECTOR } from '../../config/constants';
import { DataSourceError } from '../utils/errors';
import { HttpClientOptions, HttpJsonClient } from './http-json-client';
import { isRecord } from './response-guards';

interface JsonRpcResponse {
  result?: unknown;
  error?: { code?: number; message?: string };
}

function isJsonRpcResponse(body: unknown): body is JsonRpcResponse {
  return isRecord(body) && ('result' in body || isRecord(body.error));
}

/** Hex quantity (e.g. an eth_call return) scaled by `10^decimals`. */
export function hexToDecimal(hex: string, decimals: number): number {
  if (!hex || hex === '0x') return 0;
  let quantity: bigint;
  try {
    quantity = BigInt(hex);
  } catch (error) {
    throw new DataSourceError(`RpcClient returned a malformed quantity "${hex}"`, 'RpcClient', 'eth_call', undefined, {
      cause: error,
    });
  }
  return Number(quantity) / 10 ** decimals;
}

export function encodeBalanceOf(holder: string): string {
  return `${ERC20_BALANCE_OF_SELECTOR}${holder.replace(/^0x/i, '').toLowerCase().padStart(64, '0')}`;
}

/** Ethereum JSON-RPC over HTTP. */
export class RpcClient extends HttpJsonClient {
  constructor(options: HttpClientOptions) {
    super('RpcClient', options);
  }

  async call(method: string, params: unknown[]): Promise<unknown> {
    const response = await this.post('', { jsonrpc: '2.0', method, params, id: 1 }, isJsonRpcResponse);
    if (response.error) {
      throw new DataSourceError(
        `RPC ${method} returned error ${response.error.code ?? ''}: ${response.error.message ?? 'unknown'}`.trim(),
        'RpcClient',
        method,
      );
    }
    return response.result;
  }

  async ethCall(to: string, data: string): Promise<string> {
    const result = await this.call('eth_call', [{ to, data }, 'latest']);
    if (typeof result !== 'string') {
      throw new DataSourceError('eth_call returned a non-string result', 'RpcClient', 'eth_call');
    }
    return result;
  }

  async getTokenBalance(token: string, holder: string, decimals: number): Promise<number> {
    return hexToDecimal(await this.ethCall(token, encodeBalanceOf(holder)), decimals);
  }
}
