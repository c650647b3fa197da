// ==================== Shared Types ====================

/**
 * Event types emitted by RPC clients
 */
export type RpcClientEventType = 'authenticated' | 'error';

/**
 * Event listener callback type
 */
export type RpcEventListener<T> = (data: T) => void;

/**
 * Payload of the `authenticated` event
 */
export interface AuthenticatedEvent {
  /** Unix timestamp (seconds) after which the token is refreshed */
  expiresAt: number;
}

/**
 * Minimal fetch signature used by the clients (the global `fetch` satisfies it)
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// ==================== Base Client Configuration ====================

/**
 * Base configuration options shared by all RPC clients
 */
export interface BaseRpcClientOptions {
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** Transmission attempts per call (default: 3) */
  retryTimes?: number;
  /** Milliseconds to wait for response headers (default: 30000) */
  connectTimeoutMs?: number;
  /** Milliseconds to wait for the response body once headers arrived (default: 60000) */
  readTimeoutMs?: number;
  /** HTTP implementation (default: global fetch) */
  fetch?: FetchLike;
  /** Delay implementation used for backoff (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;
}

/**
 * Abstract base class for request/response API clients.
 *
 * @remarks
 * Holds the transport knobs (timeouts, retry count, injectable fetch/sleep/clock),
 * event handling and logging shared by concrete exchange clients. Subclasses
 * implement the protocol envelope, authentication and typed queries.
 */
export abstract class BaseRpcClient {
  // ==================== Shared State ====================

  /** Event listeners */
  protected eventListeners: Map<RpcClientEventType, Set<RpcEventListener<unknown>>> = new Map();

  /** Transmission attempts per call */
  protected readonly retryTimes: number;

  /** Header wait bound per attempt, in ms */
  protected readonly connectTimeoutMs: number;

  /** Body read bound per attempt, in ms */
  protected readonly readTimeoutMs: number;

  /** Whether to log verbose debug information */
  protected readonly verbose: boolean;

  protected readonly fetchImpl: FetchLike;

  private readonly sleepImpl: (ms: number) => Promise<void>;

  private readonly clock: () => number;

  /** Client name for logging */
  protected abstract readonly clientName: string;

  // ==================== Constructor ====================

  constructor(options: BaseRpcClientOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.retryTimes = Math.max(1, options.retryTimes ?? 3);
    this.connectTimeoutMs = options.connectTimeoutMs ?? 30_000;
    this.readTimeoutMs = options.readTimeoutMs ?? 60_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleepImpl = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.clock = options.now ?? Date.now;

    this.eventListeners.set('authenticated', new Set());
    this.eventListeners.set('error', new Set());
  }

  // ==================== Concrete Public Methods ====================

  /**
   * Registers an event listener.
   * @param event - Event type to listen for
   * @param listener - Callback function
   */
  on<T>(event: RpcClientEventType, listener: RpcEventListener<T>): this {
    const listeners = this.eventListeners.get(event);
    if (listeners) {
      listeners.add(listener as RpcEventListener<unknown>);
    }
    return this;
  }

  /**
   * Removes an event listener.
   * @param event - Event type
   * @param listener - Callback function to remove
   */
  off<T>(event: RpcClientEventType, listener: RpcEventListener<T>): this {
    const listeners = this.eventListeners.get(event);
    if (listeners) {
      listeners.delete(listener as RpcEventListener<unknown>);
    }
    return this;
  }

  // ==================== Protected Helpers ====================

  /**
   * Emits an event to all registered listeners.
   */
  protected emit<T>(event: RpcClientEventType, data: T): void {
    const listeners = this.eventListeners.get(event);
    if (listeners) {
      listeners.forEach(listener => {
        try {
          listener(data);
        } catch (error) {
          console.error(`[${this.clientName}] Event listener error:`, error);
        }
      });
    }
  }

  /**
   * Current time in milliseconds.
   */
  protected nowMs(): number {
    return this.clock();
  }

  /**
   * Current time as a Unix timestamp in seconds.
   */
  protected nowSeconds(): number {
    return this.clock() / 1000;
  }

  /**
   * Sleep utility for retry backoff.
   */
  protected sleep(ms: number): Promise<void> {
    return this.sleepImpl(ms);
  }

  /**
   * Logs a message if verbose mode is enabled.
   */
  protected log(message: string): void {
    if (this.verbose) {
      console.log(`[${this.clientName}] ${message}`);
    }
  }

  /**
   * Logs a warning regardless of verbosity.
   */
  protected warn(message: string): void {
    console.warn(`[${this.clientName}] ${message}`);
  }
}
