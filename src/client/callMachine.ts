/**
 * Retry and re-authentication state machine for a single RPC call.
 *
 * @remarks
 * The machine is pure: the client performs the side effect a state asks for
 * (authenticate, transmit, wait) and feeds the result back as an event.
 *
 * ```
 * idle ──start──► authenticating ──authSucceeded──► attempting(n)
 *   │                   │                              │   ▲
 *   └──start(no auth)───┼──────────────────────────────┘   │ transport failure (n+1 < retries)
 *                       │                              │   │
 *                  authFailed                          ├───┘
 *                       ▼                              ├── stale token (first time) ──► authenticating
 *                    failed ◄── app/decode error, ─────┤
 *                               exhaustion             └── success ──► succeeded
 * ```
 */

/**
 * Kind of transport-level failure, which selects the backoff curve
 */
export type TransportFailureKind = 'timeout' | 'tls' | 'network' | 'http';

/**
 * Classified result of one transmission attempt
 */
export type AttemptOutcome =
  | { type: 'success'; result: unknown }
  | { type: 'staleToken'; code: number; message: string }
  | { type: 'applicationError'; code: number; message: string; data?: unknown }
  | { type: 'decodeError'; message: string }
  | { type: 'transportFailure'; kind: TransportFailureKind; message: string };

export type CallState =
  | { status: 'idle' }
  | { status: 'authenticating'; nextAttempt: number; reauthenticated: boolean }
  | { status: 'attempting'; attempt: number; reauthenticated: boolean }
  | { status: 'succeeded'; result: unknown }
  | { status: 'failed'; reason: string };

export type CallEvent =
  | { type: 'start'; needsAuth: boolean }
  | { type: 'authSucceeded' }
  | { type: 'authFailed' }
  | { type: 'attemptCompleted'; outcome: AttemptOutcome };

export interface CallPolicy {
  /** Total transmission attempts allowed */
  retryTimes: number;
  /** Whether the method needs a session (only private calls re-authenticate) */
  isPrivate: boolean;
}

export interface Transition {
  state: CallState;
  /** Milliseconds to wait before acting on `state` */
  delayMs: number;
}

/**
 * Backoff before the attempt following `attempt` (zero-based).
 * Handshake failures wait `3 + 2^attempt` seconds, everything else `2^attempt`.
 */
export function backoffDelayMs(kind: TransportFailureKind, attempt: number): number {
  const base = Math.pow(2, attempt);
  return (kind === 'tls' ? 3 + base : base) * 1000;
}

/**
 * Whether the state ends the call.
 */
export function isTerminal(state: CallState): state is Extract<CallState, { status: 'succeeded' | 'failed' }> {
  return state.status === 'succeeded' || state.status === 'failed';
}

function settle(state: CallState, delayMs = 0): Transition {
  return { state, delayMs };
}

/**
 * Computes the next state of a call.
 */
export function transition(state: CallState, event: CallEvent, policy: CallPolicy): Transition {
  switch (state.status) {
    case 'idle':
      if (event.type !== 'start') break;
      return event.needsAuth
        ? settle({ status: 'authenticating', nextAttempt: 0, reauthenticated: false })
        : settle({ status: 'attempting', attempt: 0, reauthenticated: false });

    case 'authenticating':
      if (event.type === 'authFailed') {
        return settle({ status: 'failed', reason: 'authentication failed' });
      }
      if (event.type !== 'authSucceeded') break;
      if (state.nextAttempt >= policy.retryTimes) {
        return settle({ status: 'failed', reason: `re-authenticated but no attempts remain (${policy.retryTimes} used)` });
      }
      return settle({ status: 'attempting', attempt: state.nextAttempt, reauthenticated: state.reauthenticated });

    case 'attempting': {
      if (event.type !== 'attemptCompleted') break;
      const outcome = event.outcome;
      switch (outcome.type) {
        case 'success':
          return settle({ status: 'succeeded', result: outcome.result });
        case 'staleToken':
          if (policy.isPrivate && !state.reauthenticated) {
            return settle({ status: 'authenticating', nextAttempt: state.attempt + 1, reauthenticated: true });
          }
          return settle({ status: 'failed', reason: `API error [${outcome.code}]: ${outcome.message}` });
        case 'applicationError':
          return settle({ status: 'failed', reason: `API error [${outcome.code}]: ${outcome.message}` });
        case 'decodeError':
          return settle({ status: 'failed', reason: `undecodable response: ${outcome.message}` });
        case 'transportFailure': {
          const next = state.attempt + 1;
          if (next < policy.retryTimes) {
            return settle(
              { status: 'attempting', attempt: next, reauthenticated: state.reauthenticated },
              backoffDelayMs(outcome.kind, state.attempt)
            );
          }
          return settle({
            status: 'failed',
            reason: `${outcome.kind} failure after ${policy.retryTimes} attempts: ${outcome.message}`,
          });
        }
      }
      break;
    }

    case 'succeeded':
    case 'failed':
      return settle(state);
  }

  return settle({ status: 'failed', reason: `unexpected ${event.type} while ${state.status}` });
}

// ==================== Transport Error Classification ====================

const TLS_CODE_PATTERN = /^(ERR_TLS|ERR_SSL|CERT_|UNABLE_TO_VERIFY|UNABLE_TO_GET_ISSUER|SELF_SIGNED|DEPTH_ZERO|EPROTO)/;

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

function readString(value: unknown, field: 'code' | 'name'): string | undefined {
  if (typeof value === 'object' && value !== null && field in value) {
    const found: unknown = Reflect.get(value, field);
    return typeof found === 'string' ? found : undefined;
  }
  return undefined;
}

/**
 * Maps an error thrown by fetch (or by aborting it) to a failure kind.
 */
export function classifyTransportError(error: unknown): Exclude<TransportFailureKind, 'http'> {
  const name = readString(error, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') {
    return 'timeout';
  }

  const cause = typeof error === 'object' && error !== null && 'cause' in error ? error.cause : undefined;
  const codes = [readString(error, 'code'), readString(cause, 'code')].filter(
    (code): code is string => code !== undefined
  );

  if (codes.some(code => TIMEOUT_CODES.has(code))) return 'timeout';
  if (codes.some(code => TLS_CODE_PATTERN.test(code))) return 'tls';
  return 'network';
}
