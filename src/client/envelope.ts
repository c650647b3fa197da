import { z } from 'zod';
import { toNumber, toText, truncate } from '../utils/coerce';
import { AttemptOutcome } from './callMachine';

// ==================== Protocol Constants ====================

export const JSONRPC_VERSION = '2.0';

/** Methods under this prefix need a bearer token */
export const PRIVATE_PREFIX = 'private/';

/**
 * Error codes meaning the bearer token is missing, invalid or expired
 * (13009 `unauthorized`, 13000 `invalid_token`).
 */
export const STALE_TOKEN_CODES: ReadonlySet<number> = new Set([13000, 13009]);

/**
 * JSON-RPC request body
 */
export interface RpcRequest {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  id: number;
  params?: Record<string, unknown>;
}

// ==================== Field Helpers ====================

/** Any value, coerced to a number (missing or malformed → 0) */
const lenientNumber = z.unknown().transform(toNumber);

/** Any value, coerced to a string (missing or malformed → '') */
const lenientText = z.unknown().transform(toText);

// ==================== Envelope ====================

const RpcErrorSchema = z.object({
  code: z.number(),
  message: z.string().catch(''),
  data: z.unknown().optional(),
});

export const RpcEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: RpcErrorSchema.nullish(),
});

/**
 * Classifies a raw HTTP 2xx body into an attempt outcome.
 *
 * @param body - Response text
 */
export function classifyResponseBody(body: string): AttemptOutcome {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch (error) {
    return { type: 'decodeError', message: `invalid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const parsed = RpcEnvelopeSchema.safeParse(payload);
  if (!parsed.success) {
    return { type: 'decodeError', message: `unexpected envelope: ${truncate(body)}` };
  }

  const envelope = parsed.data;
  if (envelope.error) {
    const { code, message, data } = envelope.error;
    if (STALE_TOKEN_CODES.has(code)) {
      return { type: 'staleToken', code, message };
    }
    return { type: 'applicationError', code, message, data };
  }

  if (envelope.result === undefined) {
    return { type: 'decodeError', message: 'envelope carries neither result nor error' };
  }

  return { type: 'success', result: envelope.result };
}

// ==================== Result Records ====================

/**
 * `public/auth` result
 */
export const AuthResultSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.unknown().transform(value => {
    const seconds = toNumber(value);
    return seconds > 0 ? seconds : undefined;
  }),
});

/**
 * Nested `greeks` record some position payloads carry
 */
export const GreeksRecordSchema = z.object({
  gamma: lenientNumber,
  vega: lenientNumber,
  delta: lenientNumber,
  theta: lenientNumber,
});

/**
 * One element of `private/get_positions`
 */
export const RawPositionSchema = z.object({
  instrument_name: lenientText,
  kind: lenientText,
  size: lenientNumber,
  mark_iv: lenientNumber,
  gamma: lenientNumber,
  delta: lenientNumber,
  theta: lenientNumber,
  vega: lenientNumber,
  greeks: GreeksRecordSchema.optional().catch(undefined),
});

export type RawPosition = z.infer<typeof RawPositionSchema>;

/**
 * One element of `private/get_open_orders_by_currency`
 */
export const RawOrderSchema = z.object({
  order_id: lenientText,
  instrument_name: lenientText,
  direction: lenientText,
  price: lenientNumber,
  amount: lenientNumber,
  filled_amount: lenientNumber,
  order_type: lenientText,
  order_state: lenientText,
  time_in_force: lenientText,
  kind: lenientText,
  creation_timestamp: lenientNumber,
  last_update_timestamp: lenientNumber,
});

export type RawOrder = z.infer<typeof RawOrderSchema>;

/**
 * `public/get_order_book` result. Greeks count as present only when gamma is.
 */
export const OrderBookSchema = z.object({
  instrument_name: lenientText,
  greeks: z
    .object({
      gamma: z.union([z.number(), z.string()]).transform(toNumber),
      vega: lenientNumber,
      delta: lenientNumber,
      theta: lenientNumber,
    })
    .optional()
    .catch(undefined),
});

/**
 * `public/get_volatility_index_data` result: buckets of
 * `[timestamp_ms, open, high, low, close]`
 */
export const VolatilityIndexDataSchema = z.object({
  data: z.array(z.array(z.unknown())).catch([]),
  continuation: z.unknown().optional(),
});

/**
 * Normalizes a list-or-single result to a list.
 */
export function asRecordList(result: unknown): unknown[] {
  if (result === null || result === undefined) return [];
  return Array.isArray(result) ? result : [result];
}
