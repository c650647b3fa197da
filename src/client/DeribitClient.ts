import { OpenOrder, OrderBookGreeks, Position, VolatilityObservation } from '../types';
import { toNumber, truncate } from '../utils/coerce';
import { BaseRpcClient, BaseRpcClientOptions, AuthenticatedEvent } from './BaseRpcClient';
import {
  AttemptOutcome,
  CallPolicy,
  CallState,
  Transition,
  classifyTransportError,
  transition,
} from './callMachine';
import {
  AuthResultSchema,
  JSONRPC_VERSION,
  OrderBookSchema,
  PRIVATE_PREFIX,
  RawOrderSchema,
  RawPositionSchema,
  RpcRequest,
  VolatilityIndexDataSchema,
  asRecordList,
  classifyResponseBody,
} from './envelope';
import { GreeksPolicy, orderBookPerContractPolicy } from './greeksPolicy';
import {
  Credentials,
  DEFAULT_TOKEN_TTL_SECONDS,
  Session,
  applyAuthResult,
  createSession,
  nextRequestId,
  shouldRefreshSession,
} from './session';

/** Sizes and Greeks below this magnitude are treated as zero */
export const SIZE_EPSILON = 1e-8;

/** Window queried for the latest volatility-index bucket */
const VOLATILITY_LOOKBACK_MS = 2 * 24 * 60 * 60 * 1000;

/** One-hour buckets */
const VOLATILITY_RESOLUTION = '3600';

/**
 * Result of {@link DeribitClient.call}
 */
export type CallOutcome =
  | { ok: true; result: unknown }
  | { ok: false; reason: string };

/**
 * Deribit client configuration options
 */
export interface DeribitClientOptions extends BaseRpcClientOptions {
  /** API client id (required for private methods) */
  clientId: string;
  /** API client secret (required for private methods) */
  clientSecret: string;
  /** API host (default: https://www.deribit.com) */
  baseUrl?: string;
  /** How position gamma/vega are sourced (default: order book per contract × size) */
  greeksPolicy?: GreeksPolicy;
  /** Existing session to share (default: a fresh unauthenticated session) */
  session?: Session;
}

/**
 * DeribitClient issues JSON-RPC calls against the Deribit v2 HTTP API.
 *
 * @remarks
 * Read-only: it authenticates, queries positions, open orders, order books and
 * the DVOL index, and never places or cancels orders.
 *
 * Every call runs through the retry state machine in `callMachine`:
 * - private calls authenticate first when the session has no valid token
 * - transport failures and non-2xx statuses are retried with exponential backoff
 * - a stale-token error triggers one re-authentication and a retry
 * - other API errors and undecodable payloads fail immediately
 *
 * Nothing here throws to the caller: failures resolve to an empty result and
 * are reported through the `error` event.
 *
 * @example
 * ```typescript
 * const client = new DeribitClient({
 *   clientId: process.env.DERIBIT_CLIENT_ID ?? '',
 *   clientSecret: process.env.DERIBIT_CLIENT_SECRET ?? '',
 * });
 *
 * const positions = await client.getAccountOptionPositions('BTC');
 * const dvol = await client.getVolatilityIndex('BTC');
 * ```
 */
export class DeribitClient extends BaseRpcClient {
  protected readonly clientName = 'Deribit';

  /** Session shared by every private call */
  readonly session: Session;

  private readonly credentials: Credentials;

  /** JSON-RPC endpoint */
  private readonly apiUrl: string;

  private readonly greeksPolicy: GreeksPolicy;

  constructor(options: DeribitClientOptions) {
    super(options);
    this.credentials = { clientId: options.clientId, clientSecret: options.clientSecret };
    this.apiUrl = `${(options.baseUrl ?? 'https://www.deribit.com').replace(/\/+$/, '')}/api/v2`;
    this.greeksPolicy = options.greeksPolicy ?? orderBookPerContractPolicy;
    this.session = options.session ?? createSession();
  }

  // ==================== Public API ====================

  /**
   * Issues a JSON-RPC call.
   *
   * @param method - Method name, e.g. `private/get_positions`
   * @param params - Method parameters
   * @param retryTimes - Transmission attempts (default: client setting)
   */
  async call(method: string, params?: Record<string, unknown>, retryTimes: number = this.retryTimes): Promise<CallOutcome> {
    const isPrivate = method.startsWith(PRIVATE_PREFIX);
    const policy: CallPolicy = { retryTimes: Math.max(1, retryTimes), isPrivate };
    // Allocated on the first transmission so a preceding auth call gets the lower id
    let request: RpcRequest | undefined;

    let step: Transition = transition(
      { status: 'idle' },
      { type: 'start', needsAuth: isPrivate && shouldRefreshSession(this.nowSeconds(), this.session) },
      policy
    );

    for (;;) {
      if (step.delayMs > 0) {
        this.log(`Waiting ${step.delayMs / 1000}s before retrying ${method}`);
        await this.sleep(step.delayMs);
      }

      const state: CallState = step.state;
      switch (state.status) {
        case 'authenticating': {
          if (state.reauthenticated) {
            this.warn('Token expired or invalid, re-authenticating');
          }
          const authenticated = await this.authenticate();
          step = transition(state, { type: authenticated ? 'authSucceeded' : 'authFailed' }, policy);
          break;
        }
        case 'attempting': {
          request ??= {
            jsonrpc: JSONRPC_VERSION,
            method,
            id: nextRequestId(this.session),
            ...(params ? { params } : {}),
          };
          const outcome = await this.attempt(request, isPrivate);
          if (outcome.type === 'transportFailure') {
            this.warn(`${method} ${outcome.kind} failure (attempt ${state.attempt + 1}/${policy.retryTimes}): ${outcome.message}`);
          }
          step = transition(state, { type: 'attemptCompleted', outcome }, policy);
          break;
        }
        case 'succeeded':
          return { ok: true, result: state.result };
        case 'failed':
          console.error(`[${this.clientName}] ${method} failed: ${state.reason}`);
          this.emit('error', new Error(`${method} failed: ${state.reason}`));
          return { ok: false, reason: state.reason };
        case 'idle':
          return { ok: false, reason: 'call never started' };
      }
    }
  }

  /**
   * Exchanges the credential pair for an access token.
   *
   * @returns Whether a token was obtained. Attempted once; callers decide on retries.
   */
  async authenticate(): Promise<boolean> {
    const outcome = await this.call(
      'public/auth',
      {
        grant_type: 'client_credentials',
        client_id: this.credentials.clientId,
        client_secret: this.credentials.clientSecret,
      },
      1
    );

    if (!outcome.ok) {
      console.error(`[${this.clientName}] Authentication failed, check client id and secret`);
      return false;
    }

    const parsed = AuthResultSchema.safeParse(outcome.result);
    if (!parsed.success) {
      console.error(`[${this.clientName}] Authentication returned no access token`);
      return false;
    }

    applyAuthResult(
      this.session,
      parsed.data.access_token,
      parsed.data.expires_in ?? DEFAULT_TOKEN_TTL_SECONDS,
      this.nowSeconds()
    );
    this.log('Authenticated');
    this.emit<AuthenticatedEvent>('authenticated', { expiresAt: this.session.expiresAt });
    return true;
  }

  /**
   * Fetches open positions with their Greeks.
   *
   * @param currency - Settlement currency, e.g. "BTC"
   * @param kind - Instrument kind (default: "option")
   * @returns Non-empty positions; an empty list when the call fails
   */
  async getAccountOptionPositions(currency: string = 'BTC', kind: string = 'option'): Promise<Position[]> {
    const outcome = await this.call('private/get_positions', { currency, kind });
    if (!outcome.ok) return [];

    const positions: Position[] = [];
    for (const record of asRecordList(outcome.result)) {
      const parsed = RawPositionSchema.safeParse(record);
      if (!parsed.success) {
        this.warn(`Skipping malformed position record: ${truncate(String(JSON.stringify(record)))}`);
        continue;
      }

      const raw = parsed.data;
      if (Math.abs(raw.size) < SIZE_EPSILON) continue;

      const fallback = raw.greeks;
      const pick = (top: number, nested: number | undefined): number =>
        Math.abs(top) < SIZE_EPSILON && nested !== undefined ? nested : top;

      const aggregate = {
        gamma: pick(raw.gamma, fallback?.gamma),
        vega: pick(raw.vega, fallback?.vega),
        delta: pick(raw.delta, fallback?.delta),
        theta: pick(raw.theta, fallback?.theta),
      };

      const orderBook = this.greeksPolicy.usesOrderBook ? await this.getOrderBook(raw.instrument_name) : null;
      const { gamma, vega } = this.greeksPolicy.resolve({
        signedSize: raw.size,
        position: { gamma: aggregate.gamma, vega: aggregate.vega },
        orderBook,
      });

      this.log(
        `${raw.instrument_name}: size=${raw.size.toFixed(4)}, gamma=${gamma.toFixed(8)} ` +
        `(${orderBook ? 'order book × size' : 'position aggregate'})`
      );

      positions.push({
        instrumentName: raw.instrument_name,
        kind: raw.kind || kind,
        direction: raw.size > 0 ? 'buy' : 'sell',
        size: Math.abs(raw.size),
        markIv: raw.mark_iv,
        gamma,
        delta: aggregate.delta,
        theta: aggregate.theta,
        vega,
      });
    }

    return positions;
  }

  /**
   * Fetches open orders for a currency.
   *
   * @param currency - Settlement currency
   * @param kind - Optional instrument kind to keep (filtered client-side)
   */
  async getOpenOrders(currency: string = 'BTC', kind?: string): Promise<OpenOrder[]> {
    const outcome = await this.call('private/get_open_orders_by_currency', { currency });
    if (!outcome.ok) return [];

    const records = asRecordList(outcome.result);
    const orders: OpenOrder[] = [];
    for (const record of records) {
      const parsed = RawOrderSchema.safeParse(record);
      if (!parsed.success) continue;

      const raw = parsed.data;
      if (kind && raw.kind !== kind) continue;

      orders.push({
        orderId: raw.order_id,
        instrumentName: raw.instrument_name,
        direction: raw.direction,
        price: raw.price,
        amount: raw.amount,
        filled: raw.filled_amount,
        remaining: raw.amount - raw.filled_amount,
        orderType: raw.order_type,
        orderState: raw.order_state,
        timeInForce: raw.time_in_force,
        kind: raw.kind,
        creationTimestamp: raw.creation_timestamp,
        lastUpdateTimestamp: raw.last_update_timestamp,
      });
    }

    this.log(`Fetched ${orders.length} open orders (${records.length} before filtering)`);
    return orders;
  }

  /**
   * Fetches per-contract Greeks from the top of the order book.
   *
   * @param instrumentName - Exchange instrument name
   * @returns Greeks, or null if the call failed or the book carries none
   */
  async getOrderBook(instrumentName: string): Promise<OrderBookGreeks | null> {
    const outcome = await this.call('public/get_order_book', { instrument_name: instrumentName, depth: 1 });
    if (!outcome.ok) return null;

    const parsed = OrderBookSchema.safeParse(outcome.result);
    if (!parsed.success || !parsed.data.greeks) return null;

    return {
      instrumentName: parsed.data.instrument_name || instrumentName,
      ...parsed.data.greeks,
    };
  }

  /**
   * Fetches the latest DVOL reading: the close of the most recent hourly bucket.
   *
   * @param currency - Index currency (default: "BTC")
   */
  async getVolatilityIndex(currency: string = 'BTC'): Promise<VolatilityObservation | null> {
    const endTimestamp = Math.floor(this.nowMs());
    const outcome = await this.call('public/get_volatility_index_data', {
      currency,
      start_timestamp: endTimestamp - VOLATILITY_LOOKBACK_MS,
      end_timestamp: endTimestamp,
      resolution: VOLATILITY_RESOLUTION,
    });

    if (!outcome.ok) {
      this.warn('Failed to fetch DVOL data');
      return null;
    }

    const parsed = VolatilityIndexDataSchema.safeParse(outcome.result);
    const buckets = parsed.success ? parsed.data.data : [];
    const latest = buckets[buckets.length - 1];
    if (!latest) {
      this.warn('DVOL data is empty');
      return null;
    }

    if (latest.length < 5) {
      console.error(`[${this.clientName}] Unexpected DVOL bucket, expected [ts, o, h, l, c]: ${JSON.stringify(latest)}`);
      return null;
    }

    const observation: VolatilityObservation = {
      value: toNumber(latest[4]),
      timestamp: toNumber(latest[0]) / 1000,
    };
    this.log(`DVOL ${observation.value.toFixed(2)} at ${new Date(observation.timestamp * 1000).toISOString()}`);
    return observation;
  }

  // ==================== Private Methods ====================

  /**
   * Performs one transmission and classifies the result.
   */
  private async attempt(request: RpcRequest, isPrivate: boolean): Promise<AttemptOutcome> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (isPrivate && this.session.accessToken) {
      headers['Authorization'] = `Bearer ${this.session.accessToken}`;
    }

    const controller = new AbortController();
    let timer = setTimeout(() => controller.abort(), this.connectTimeoutMs);
    try {
      const response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers,
        body: JSON.stringify(request),
        signal: controller.signal,
      });

      clearTimeout(timer);
      timer = setTimeout(() => controller.abort(), this.readTimeoutMs);
      const body = await response.text();

      if (!response.ok) {
        return { type: 'transportFailure', kind: 'http', message: `HTTP ${response.status}: ${truncate(body)}` };
      }
      return classifyResponseBody(body);
    } catch (error) {
      return {
        type: 'transportFailure',
        kind: classifyTransportError(error),
        message: error instanceof Error ? error.message : String(error),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
