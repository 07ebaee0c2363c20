import { expect } from 'chai';
import { DataSourceError } from '../src/core/utils/errors';
import {
  BlockscoutApiClient,
  decodePageParams,
  encodePageParams,
} from '../src/core/services/blockscout-api-client';
import { GeckoTerminalClient } from '../src/core/services/gecko-terminal-client';
import { RpcClient, encodeBalanceOf, hexToDecimal } from '../src/core/services/rpc-client';
import { SubgraphClient } from '../src/core/services/subgraph-client';
import { FakeReply, RecordedRequest, captureError, fakeAdapter } from './helpers/fake-http';
import { REFERENCE_ADDRESS, SUBJECT } from './helpers/fixtures';

const BASE_URL = 'https://upstream.test/api';

function options(handler: (request: RecordedRequest, index: number) => FakeReply, clock?: () => number) {
  const fake = fakeAdapter(handler);
  return {
    requests: fake.requests,
    options: { baseUrl: BASE_URL, adapter: fake.adapter, initialBackoffMs: 0, maxAttempts: 3, ...(clock ? { clock } : {}) },
  };
}

const PAGE = { items: [{ transaction_hash: '0xabc' }], next_page_params: { block_number: 10, index: 2 } };

describe('HTTP client retry and caching', () => {
  it('should retry server errors and return the eventual response', async () => {
    const { requests, options: opts } = options((_req, index) => (index === 0 ? { status: 503 } : { status: 200, body: PAGE }));
    const client = new BlockscoutApiClient(opts);

    const page = await client.getTokenTransfers(SUBJECT);

    expect(requests).to.have.length(2);
    expect(page.items).to.deep.equal(PAGE.items);
  });

  it('should not retry client errors', async () => {
    const { requests, options: opts } = options(() => ({ status: 404 }));
    const error = await captureError(new BlockscoutApiClient(opts).getTransactions(SUBJECT));

    expect(requests).to.have.length(1);
    expect(error).to.be.instanceOf(DataSourceError);
    expect(error).to.include({ source: 'BlockscoutApiClient', status: 404 });
  });

  it('should give up on network errors after the configured attempts', async () => {
    const { requests, options: opts } = options(() => ({ networkError: 'socket hang up' }));
    const error = await captureError(new BlockscoutApiClient(opts).getTransactions(SUBJECT));

    expect(requests).to.have.length(3);
    expect(error.message).to.equal('BlockscoutApiClient request failed: socket hang up');
    expect(error instanceof DataSourceError && error.status).to.equal(undefined);
  });

  it('should reject bodies of the wrong shape', async () => {
    const { options: opts } = options(() => ({ status: 200, body: ['not', 'a', 'page'] }));
    const error = await captureError(new BlockscoutApiClient(opts).getInternalTransactions(SUBJECT));
    expect(error.message).to.equal('BlockscoutApiClient returned an unexpected response shape');
  });

  it('should serve repeated requests from the cache until the entry expires', async () => {
    let now = 1_000;
    const { requests, options: opts } = options(() => ({ status: 200, body: { items: [] } }), () => now);
    const client = new BlockscoutApiClient({ ...opts, cacheTtlMs: 500 });

    await client.getTransactions(SUBJECT);
    await client.getTransactions(SUBJECT);
    expect(requests).to.have.length(1);

    now += 500;
    await client.getTransactions(SUBJECT);
    expect(requests).to.have.length(2);

    client.clearCache();
    await client.getTransactions(SUBJECT);
    expect(requests).to.have.length(3);
  });

  it('should evict expired entries instead of keeping them', async () => {
    let now = 1_000;
    const { options: opts } = options(() => ({ status: 200, body: { items: [] } }), () => now);
    const client = new BlockscoutApiClient({ ...opts, cacheTtlMs: 500 });

    await client.getTransactions(SUBJECT);
    await client.getInternalTransactions(SUBJECT);
    expect(client.cacheSize).to.equal(2);

    now += 500;
    await client.getTransactions(SUBJECT);
    expect(client.cacheSize).to.equal(1);
  });
});

describe('Blockscout pagination cursor', () => {
  it('should serialize next_page_params and skip null values', () => {
    expect(encodePageParams({ block_number: 10, index: 2, items_count: 50, extra: null })).to.equal(
      'block_number=10&index=2&items_count=50',
    );
    expect(encodePageParams(null)).to.equal(undefined);
    expect(encodePageParams({})).to.equal(undefined);
    expect(decodePageParams(undefined)).to.deep.equal({});
  });

  it('should send the decoded cursor with the next page request', async () => {
    const { requests, options: opts } = options(() => ({ status: 200, body: { items: [] } }));
    await new BlockscoutApiClient(opts).getTokenTransfers(SUBJECT, 'block_number=10&index=2');

    expect(requests[0].url).to.equal(`/addresses/${SUBJECT}/token-transfers`);
    expect(requests[0].params).to.deep.equal({ type: 'ERC-20', block_number: '10', index: '2' });
  });
});

describe('RpcClient', () => {
  it('should encode balanceOf and scale the result', async () => {
    const { requests, options: opts } = options(() => ({
      status: 200,
      body: { jsonrpc: '2.0', id: 1, result: '0x4563918244f40000' },
    }));

    const balance = await new RpcClient(opts).getTokenBalance(REFERENCE_ADDRESS, SUBJECT, 18);

    expect(balance).to.equal(5);
    expect(requests[0].method).to.equal('post');
    expect(requests[0].data).to.deep.equal({
      jsonrpc: '2.0',
      method: 'eth_call',
      params: [{ to: REFERENCE_ADDRESS, data: encodeBalanceOf(SUBJECT) }, 'latest'],
      id: 1,
    });
  });

  it('should pad the holder address into the call data', () => {
    expect(encodeBalanceOf('0xABCDEF0000000000000000000000000000000001')).to.equal(
      '0x70a08231000000000000000000000000abcdef0000000000000000000000000000000001',
    );
    expect(hexToDecimal('0x', 18)).to.equal(0);
  });

  it('should reject a malformed balance quantity as a data source error', async () => {
    expect(() => hexToDecimal('0xzz', 18)).to.throw(DataSourceError, 'RpcClient returned a malformed quantity "0xzz"');

    const { options: opts } = options(() => ({ status: 200, body: { jsonrpc: '2.0', id: 1, result: 'not-hex' } }));
    const error = await captureError(new RpcClient(opts).getTokenBalance(REFERENCE_ADDRESS, SUBJECT, 18));
    expect(error).to.be.instanceOf(DataSourceError);
    expect(error).to.include({ source: 'RpcClient', url: 'eth_call' });
  });

  it('should surface JSON-RPC errors', async () => {
    const { options: opts } = options(() => ({
      status: 200,
      body: { jsonrpc: '2.0', id: 1, error: { code: -32000, message: 'execution reverted' } },
    }));
    const error = await captureError(new RpcClient(opts).ethCall(REFERENCE_ADDRESS, '0x'));
    expect(error.message).to.equal('RPC eth_call returned error -32000: execution reverted');
  });
});

describe('SubgraphClient', () => {
  it('should query the lending user by lowercased id', async () => {
    const { requests, options: opts } = options(() => ({ status: 200, body: { data: { user: null } } }));
    const user = await new SubgraphClient(opts).getLendingUser(REFERENCE_ADDRESS);

    expect(user).to.equal(null);
    expect(requests[0].data).to.have.nested.property('variables.id', REFERENCE_ADDRESS.toLowerCase());
  });

  it('should turn GraphQL errors into data source errors', async () => {
    const { options: opts } = options(() => ({
      status: 200,
      body: { data: null, errors: [{ message: 'bad field' }, {}] },
    }));
    const error = await captureError(new SubgraphClient(opts).getLendingUser(SUBJECT));
    expect(error.message).to.equal('GraphQL errors: bad field; unknown error');
  });
});

describe('GeckoTerminalClient', () => {
  it('should request pool OHLCV and parse well-formed rows', async () => {
    const { requests, options: opts } = options(() => ({
      status: 200,
      body: {
        data: {
          attributes: {
            ohlcv_list: [
              [1704067200, '1.01', 1.02, 0.99, 1.0, 1500],
              ['broken'],
              [1704070800, 1, 1, 1, 'NaN', 10],
            ],
          },
        },
      },
    }));

    const candles = await new GeckoTerminalClient(opts, 'filecoin').getPoolOhlcv('0xpool', 'hour', 4, 180);

    expect(requests[0].url).to.equal('/networks/filecoin/pools/0xpool/ohlcv/hour');
    expect(requests[0].params).to.deep.equal({ aggregate: 4, limit: 180 });
    expect(candles).to.deep.equal([{ time: 1704067200, open: 1.01, high: 1.02, low: 0.99, close: 1, volume: 1500 }]);
  });
});
