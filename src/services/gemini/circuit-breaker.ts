/**
 * Circuit breaker in front of the generative metadata service.
 *
 * After `failureThreshold` server-side failures in a row the circuit opens
 * and calls fail fast. Once the recovery window has passed one probe call is
 * let through: success closes the circuit, failure reopens it with the window
 * doubled (at most 16x the base).
 */

import type { Logger } from '../../utils/logger.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const TRANSIENT_STATUS = /\b(429|500|502|503|504)\b/;
const TRANSIENT_TEXT =
  /rate.?limit|resource.?exhausted|ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|socket hang up|fetch failed|service.?unavailable|server.?(error|overloaded|unavailable)|internal.?server/i;

function numericStatus(error: Error): number | null {
  if ('status' in error && typeof error.status === 'number') return error.status;
  if ('code' in error && typeof error.code === 'number') return error.code;
  return null;
}

/**
 * True for 408, 429 and 5xx statuses and for network failures. Without a
 * numeric status the message and the cause's message and code are searched.
 */
export function isServerError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const status = numericStatus(error);
  if (status !== null) return status === 408 || status === 429 || status >= 500;

  const cause = error.cause;
  const parts = [error.message];
  if (cause instanceof Error) parts.push(cause.message);
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    parts.push(cause.code);
  }
  const text = parts.join(' ');
  return TRANSIENT_STATUS.test(text) || TRANSIENT_TEXT.test(text);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
}

const MAX_BACKOFF_EXPONENT = 4;
const MAX_RECOVERY_MS = 960_000;

export class CircuitBreakerOpenError extends Error {
  constructor(
    message: string,
    readonly timeToRecovery: number
  ) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
  }
}

export class CircuitBreaker {
  private current: CircuitState = CircuitState.CLOSED;
  private failures = 0;
  private trips = 0;
  private openedAt = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    private readonly logger?: Logger,
    private readonly clock: () => number = Date.now
  ) {
    this.config = { failureThreshold: 5, recoveryTimeMs: 60_000, ...config };
  }

  get state(): CircuitState {
    if (this.current === CircuitState.OPEN && this.remainingMs() === 0) {
      this.logger?.info(`Recovery window over, probing (trip #${this.trips})`);
      this.current = CircuitState.HALF_OPEN;
    }
    return this.current;
  }

  /** base * 2^(trips - 1), capped */
  get recoveryTimeMs(): number {
    const exponent = Math.min(Math.max(0, this.trips - 1), MAX_BACKOFF_EXPONENT);
    return Math.min(this.config.recoveryTimeMs * 2 ** exponent, MAX_RECOVERY_MS);
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      const remaining = this.remainingMs();
      throw new CircuitBreakerOpenError(
        `Circuit breaker is OPEN. Try again in ${Math.ceil(remaining / 1000)}s`,
        remaining
      );
    }

    let result: T;
    try {
      result = await fn();
    } catch (error) {
      if (isServerError(error)) {
        this.onServerFailure();
      } else {
        this.logger?.debug(`Not counted: ${error instanceof Error ? error.message : String(error)}`);
      }
      throw error;
    }

    if (this.current === CircuitState.HALF_OPEN) {
      this.logger?.info('Probe succeeded, circuit closed');
      this.trips = 0;
    }
    this.current = CircuitState.CLOSED;
    this.failures = 0;
    return result;
  }

  private onServerFailure(): void {
    this.failures++;
    if (this.current !== CircuitState.HALF_OPEN && this.failures < this.config.failureThreshold) return;

    this.trips++;
    this.current = CircuitState.OPEN;
    this.openedAt = this.clock();
    this.logger?.warn(
      `Circuit opened after ${this.failures} failure(s) (trip #${this.trips}, recovery ${this.recoveryTimeMs}ms)`
    );
  }

  private remainingMs(): number {
    return Math.max(0, this.recoveryTimeMs - (this.clock() - this.openedAt));
  }
}
