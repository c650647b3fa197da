import { DeribitClient } from './DeribitClient';
import { FetchLike } from './BaseRpcClient';
import { positionAggregatePolicy } from './greeksPolicy';

// ============================================================================
// HELPERS
// ============================================================================

const NOW_MS = 1_700_000_000_000;

interface RecordedRequest {
  method: string;
  id: number;
  params?: Record<string, unknown>;
  authorization: string | null;
}

type FakeReply =
  | { result: unknown }
  | { error: { code: number; message: string } }
  | { status: number; body: string }
  | { throws: Error };

// Helper to create a fake fetch that answers JSON-RPC calls by method
function createFakeFetch(handler: (request: RecordedRequest, callIndex: number) => FakeReply) {
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (_input, init) => {
    const parsed: { method: string; id: number; params?: Record<string, unknown> } =
      JSON.parse(typeof init.body === 'string' ? init.body : '{}');
    const request: RecordedRequest = { ...parsed, authorization: new Headers(init.headers).get('Authorization') };
    requests.push(request);

    const reply = handler(request, requests.length - 1);
    if ('throws' in reply) throw reply.throws;
    if ('status' in reply) return new Response(reply.body, { status: reply.status });
    return new Response(JSON.stringify({ jsonrpc: '2.0', id: request.id, ...reply }), { status: 200 });
  };

  return { fetchImpl, requests };
}

const authReply = (token = 'test-token'): FakeReply => ({
  result: { access_token: token, expires_in: 900, token_type: 'bearer' },
});

function abortError(): Error {
  const error = new Error('This operation was aborted');
  error.name = 'AbortError';
  return error;
}

// Helper to create a client with recorded backoff delays
function createClient(fetchImpl: FetchLike, overrides: Partial<ConstructorParameters<typeof DeribitClient>[0]> = {}) {
  const delays: number[] = [];
  const client = new DeribitClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    fetch: fetchImpl,
    sleep: async ms => {
      delays.push(ms);
    },
    now: () => NOW_MS,
    ...overrides,
  });
  return { client, delays };
}

beforeEach(() => {
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ============================================================================
// CALL MACHINERY
// ============================================================================

describe('DeribitClient.call', () => {
  it('authenticates once, then gives up after the configured attempts', async () => {
    const { fetchImpl, requests } = createFakeFetch(request =>
      request.method === 'public/auth' ? authReply() : { throws: abortError() }
    );
    const { client, delays } = createClient(fetchImpl);
    const errors: Error[] = [];
    client.on<Error>('error', error => errors.push(error));

    const positions = await client.getAccountOptionPositions('BTC');

    expect(positions).toEqual([]);
    expect(requests.map(r => r.method)).toEqual([
      'public/auth',
      'private/get_positions',
      'private/get_positions',
      'private/get_positions',
    ]);
    expect(delays).toEqual([1000, 2000]);
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe(
      'private/get_positions failed: timeout failure after 3 attempts: This operation was aborted'
    );
  });

  it('sends the bearer token and reuses the request id across retries', async () => {
    const { fetchImpl, requests } = createFakeFetch((request, index) => {
      if (request.method === 'public/auth') return authReply();
      return index === 1 ? { status: 502, body: 'bad gateway' } : { result: [] };
    });
    const { client, delays } = createClient(fetchImpl);

    await client.getAccountOptionPositions('ETH');

    expect(requests).toHaveLength(3);
    expect(requests[1].authorization).toBe('Bearer test-token');
    expect(requests[1].id).toBe(requests[2].id);
    expect(requests[1].params).toEqual({ currency: 'ETH', kind: 'option' });
    expect(delays).toEqual([1000]);
  });

  it('numbers requests in the order they are sent', async () => {
    const { fetchImpl, requests } = createFakeFetch(request =>
      request.method === 'public/auth' ? authReply() : { result: [] }
    );
    const { client } = createClient(fetchImpl);

    await client.getAccountOptionPositions('BTC');
    await client.getVolatilityIndex('BTC');

    expect(requests.map(r => [r.method, r.id])).toEqual([
      ['public/auth', 1],
      ['private/get_positions', 2],
      ['public/get_volatility_index_data', 3],
    ]);
  });

  it('times out a stalled response body and retries it', async () => {
    const ids: number[] = [];
    const fetchImpl: FetchLike = async (_input, init) => {
      const request: { id: number } = JSON.parse(typeof init.body === 'string' ? init.body : '{}');
      ids.push(request.id);
      if (ids.length > 1) {
        return new Response(JSON.stringify({ jsonrpc: '2.0', id: request.id, result: 'pong' }), { status: 200 });
      }

      // headers arrive, the body never does
      const signal = init.signal;
      return Object.assign(new Response(null, { status: 200 }), {
        text: () =>
          new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(abortError()));
          }),
      });
    };
    const { client, delays } = createClient(fetchImpl, { readTimeoutMs: 10 });
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const outcome = await client.call('public/test');

    expect(outcome).toEqual({ ok: true, result: 'pong' });
    expect(ids).toEqual([1, 1]);
    expect(delays).toEqual([1000]);
    expect(warnSpy).toHaveBeenCalledWith(
      '[Deribit] public/test timeout failure (attempt 1/3): This operation was aborted'
    );
  });

  it('backs off exponentially while the body keeps stalling', async () => {
    const fetchImpl: FetchLike = async (_input, init) => {
      const signal = init.signal;
      return Object.assign(new Response(null, { status: 200 }), {
        text: () =>
          new Promise<string>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(abortError()));
          }),
      });
    };
    const { client, delays } = createClient(fetchImpl, { readTimeoutMs: 10 });

    const outcome = await client.call('public/test');

    expect(outcome).toEqual({ ok: false, reason: 'timeout failure after 3 attempts: This operation was aborted' });
    expect(delays).toEqual([1000, 2000]);
  });

  it('re-authenticates once when the token is rejected', async () => {
    let tokens = 0;
    const { fetchImpl, requests } = createFakeFetch(request => {
      if (request.method === 'public/auth') {
        tokens += 1;
        return authReply(`test-token-${tokens}`);
      }
      return request.authorization === 'Bearer test-token-1'
        ? { error: { code: 13009, message: 'unauthorized' } }
        : { result: [] };
    });
    const { client } = createClient(fetchImpl);

    const positions = await client.getAccountOptionPositions('BTC');

    expect(positions).toEqual([]);
    expect(requests.map(r => r.method)).toEqual([
      'public/auth',
      'private/get_positions',
      'public/auth',
      'private/get_positions',
    ]);
    expect(requests[3].authorization).toBe('Bearer test-token-2');
    expect(client.session.accessToken).toBe('test-token-2');
  });

  it('does not retry API errors', async () => {
    const { fetchImpl, requests } = createFakeFetch(() => ({ error: { code: 10001, message: 'error' } }));
    const { client, delays } = createClient(fetchImpl);

    const outcome = await client.call('public/get_order_book', { instrument_name: 'BTC-PERPETUAL' });

    expect(outcome).toEqual({ ok: false, reason: 'API error [10001]: error' });
    expect(requests).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('does not retry undecodable bodies', async () => {
    const { fetchImpl, requests } = createFakeFetch(() => ({ status: 200, body: 'not json' }));
    const { client } = createClient(fetchImpl);

    const outcome = await client.call('public/test');

    expect(outcome.ok).toBe(false);
    expect(requests).toHaveLength(1);
  });

  it('waits longer after handshake failures', async () => {
    const tlsError = new TypeError('fetch failed', {
      cause: Object.assign(new Error('wrong version'), { code: 'ERR_SSL_WRONG_VERSION_NUMBER' }),
    });
    const { fetchImpl } = createFakeFetch(() => ({ throws: tlsError }));
    const { client, delays } = createClient(fetchImpl);

    await client.call('public/test');

    expect(delays).toEqual([4000, 5000]);
  });

  it('fails private calls when authentication is refused', async () => {
    const { fetchImpl, requests } = createFakeFetch(() => ({ error: { code: 13004, message: 'invalid_credentials' } }));
    const { client } = createClient(fetchImpl);

    const outcome = await client.call('private/get_positions', { currency: 'BTC' });

    expect(outcome).toEqual({ ok: false, reason: 'authentication failed' });
    expect(requests.map(r => r.method)).toEqual(['public/auth']);
  });

  it('emits authenticated with the refresh time', async () => {
    const { fetchImpl } = createFakeFetch(() => authReply());
    const { client } = createClient(fetchImpl);
    const events: number[] = [];
    client.on<{ expiresAt: number }>('authenticated', event => events.push(event.expiresAt));

    expect(await client.authenticate()).toBe(true);
    expect(events).toEqual([NOW_MS / 1000 + 900 - 60]);
  });
});

// ============================================================================
// QUERIES
// ============================================================================

const positionRecords = [
  {
    instrument_name: 'BTC-27DEC24-60000-C',
    kind: 'option',
    size: -2,
    mark_iv: 55,
    gamma: 0.0001,
    vega: 5,
    delta: -0.3,
    theta: 1,
  },
  { instrument_name: 'BTC-27DEC24-50000-P', kind: 'option', size: 0, gamma: 0.5 },
  {
    instrument_name: 'BTC-27DEC24-40000-P',
    size: 1,
    mark_iv: 70,
    gamma: 0,
    vega: 0,
    delta: 0,
    theta: 0,
    greeks: { gamma: 0.0003, vega: 7, delta: 0.1, theta: -2 },
  },
];

describe('DeribitClient.getAccountOptionPositions', () => {
  it('multiplies order-book Greeks by the signed size', async () => {
    const { fetchImpl, requests } = createFakeFetch(request => {
      if (request.method === 'public/auth') return authReply();
      if (request.method === 'private/get_positions') return { result: positionRecords };
      if (request.params?.instrument_name === 'BTC-27DEC24-60000-C') {
        return { result: { instrument_name: 'BTC-27DEC24-60000-C', greeks: { gamma: 0.0004, vega: 12, delta: -0.2, theta: -3 } } };
      }
      return { result: { instrument_name: 'BTC-27DEC24-40000-P' } };
    });
    const { client } = createClient(fetchImpl);

    const positions = await client.getAccountOptionPositions('BTC');

    expect(positions).toHaveLength(2);

    const [call, put] = positions;
    expect(call.instrumentName).toBe('BTC-27DEC24-60000-C');
    expect(call.direction).toBe('sell');
    expect(call.size).toBe(2);
    expect(call.gamma).toBeCloseTo(-0.0008, 10);
    expect(call.vega).toBe(-24);
    expect(call.delta).toBe(-0.3);
    expect(call.markIv).toBe(55);

    // no order-book greeks: nested position greeks are used
    expect(put.direction).toBe('buy');
    expect(put.kind).toBe('option');
    expect(put.gamma).toBe(0.0003);
    expect(put.vega).toBe(7);
    expect(put.theta).toBe(-2);

    expect(requests.filter(r => r.method === 'public/get_order_book').map(r => r.params)).toEqual([
      { instrument_name: 'BTC-27DEC24-60000-C', depth: 1 },
      { instrument_name: 'BTC-27DEC24-40000-P', depth: 1 },
    ]);
  });

  it('uses position aggregates without querying the order book', async () => {
    const { fetchImpl, requests } = createFakeFetch(request =>
      request.method === 'public/auth' ? authReply() : { result: positionRecords }
    );
    const { client } = createClient(fetchImpl, { greeksPolicy: positionAggregatePolicy });

    const positions = await client.getAccountOptionPositions('BTC');

    expect(positions.map(p => p.gamma)).toEqual([0.0001, 0.0003]);
    expect(positions.map(p => p.vega)).toEqual([5, 7]);
    expect(requests.map(r => r.method)).toEqual(['public/auth', 'private/get_positions']);
  });

  it('skips malformed records', async () => {
    const { fetchImpl } = createFakeFetch(request =>
      request.method === 'public/auth' ? authReply() : { result: ['oops', positionRecords[0]] }
    );
    const { client } = createClient(fetchImpl, { greeksPolicy: positionAggregatePolicy });

    const positions = await client.getAccountOptionPositions('BTC');

    expect(positions.map(p => p.instrumentName)).toEqual(['BTC-27DEC24-60000-C']);
  });
});

describe('DeribitClient.getOpenOrders', () => {
  it('normalizes orders and filters by kind', async () => {
    const { fetchImpl, requests } = createFakeFetch(request => {
      if (request.method === 'public/auth') return authReply();
      return {
        result: [
          {
            order_id: '123',
            instrument_name: 'BTC-27DEC24-60000-C',
            direction: 'sell',
            price: '0.05',
            amount: 3,
            filled_amount: 1,
            order_type: 'limit',
            order_state: 'open',
            time_in_force: 'good_til_cancelled',
            kind: 'option',
            creation_timestamp: 1_699_990_000_000,
            last_update_timestamp: 1_699_995_000_000,
          },
          { order_id: '124', instrument_name: 'BTC-PERPETUAL', amount: 10, kind: 'future' },
        ],
      };
    });
    const { client } = createClient(fetchImpl);

    const orders = await client.getOpenOrders('BTC', 'option');

    expect(requests[1].params).toEqual({ currency: 'BTC' });
    expect(orders).toEqual([
      {
        orderId: '123',
        instrumentName: 'BTC-27DEC24-60000-C',
        direction: 'sell',
        price: 0.05,
        amount: 3,
        filled: 1,
        remaining: 2,
        orderType: 'limit',
        orderState: 'open',
        timeInForce: 'good_til_cancelled',
        kind: 'option',
        creationTimestamp: 1_699_990_000_000,
        lastUpdateTimestamp: 1_699_995_000_000,
      },
    ]);
  });
});

describe('DeribitClient.getVolatilityIndex', () => {
  it('returns the close of the latest bucket', async () => {
    const { fetchImpl, requests } = createFakeFetch(() => ({
      result: {
        data: [
          [1_699_995_600_000, 50, 52, 49, 51],
          [1_699_999_200_000, 51, 56, 50, '55.5'],
        ],
        continuation: null,
      },
    }));
    const { client } = createClient(fetchImpl);

    const dvol = await client.getVolatilityIndex('BTC');

    expect(dvol).toEqual({ value: 55.5, timestamp: 1_699_999_200 });
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe('public/get_volatility_index_data');
    expect(requests[0].params).toEqual({
      currency: 'BTC',
      start_timestamp: NOW_MS - 2 * 24 * 60 * 60 * 1000,
      end_timestamp: NOW_MS,
      resolution: '3600',
    });
    expect(requests[0].authorization).toBeNull();
  });

  it('returns null for empty or short buckets', async () => {
    const empty = createClient(createFakeFetch(() => ({ result: { data: [] } })).fetchImpl).client;
    expect(await empty.getVolatilityIndex('BTC')).toBeNull();

    const short = createClient(createFakeFetch(() => ({ result: { data: [[1_699_999_200_000, 51]] } })).fetchImpl).client;
    expect(await short.getVolatilityIndex('BTC')).toBeNull();
  });
});
