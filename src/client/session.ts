/**
 * Authentication session state for the exchange API
 */

/**
 * Seconds subtracted from the nominal token lifetime so a token close to
 * expiry is refreshed before a call rather than failing during it.
 */
export const SESSION_SAFETY_MARGIN_SECONDS = 60;

/**
 * Lifetime assumed when the exchange omits `expires_in`
 */
export const DEFAULT_TOKEN_TTL_SECONDS = 3600;

/**
 * Client credential pair exchanged for an access token
 */
export interface Credentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Mutable session passed by reference into every private call
 */
export interface Session {
  /** Bearer token, or null before the first authentication */
  accessToken: string | null;
  /** Unix timestamp (seconds) at which the token is considered expired */
  expiresAt: number;
  /** Last request id handed out; ids are never reused */
  requestId: number;
}

/**
 * Creates an unauthenticated session.
 */
export function createSession(): Session {
  return { accessToken: null, expiresAt: 0, requestId: 0 };
}

/**
 * Decides whether a private call must authenticate first.
 *
 * @param now - Current Unix time in seconds
 * @param session - Session to inspect
 * @returns true when there is no token or it has expired
 */
export function shouldRefreshSession(now: number, session: Session): boolean {
  return session.accessToken === null || now >= session.expiresAt;
}

/**
 * Records a freshly issued token on the session.
 *
 * @param session - Session to update
 * @param accessToken - Token returned by the exchange
 * @param expiresIn - Token lifetime in seconds
 * @param now - Current Unix time in seconds
 */
export function applyAuthResult(session: Session, accessToken: string, expiresIn: number, now: number): void {
  session.accessToken = accessToken;
  session.expiresAt = now + expiresIn - SESSION_SAFETY_MARGIN_SECONDS;
}

/**
 * Hands out the next request id.
 */
export function nextRequestId(session: Session): number {
  session.requestId += 1;
  return session.requestId;
}
