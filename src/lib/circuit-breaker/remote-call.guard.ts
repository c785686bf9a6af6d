/**
 * Remote Call Guard
 * Bounds every remote store call with a deadline and an opossum circuit breaker
 */

import CircuitBreakerLib from 'opossum';
import { classifyRemoteError, RemoteTimeoutError } from '../cache/cache.errors';
import {
  CircuitBreakerConfig,
  CircuitState,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  RemoteGuardStats,
} from './circuit-breaker.types';

type GuardedCall = () => Promise<void>;

/**
 * Longest delay a Node.js timer honours; longer ones fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function assertValidTimeout(timeoutMs: number): void {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new RangeError(`Timeout must be an integer between 1 and ${MAX_TIMER_DELAY_MS} ms, got ${timeoutMs}`);
  }
}

export class RemoteCallGuard {
  private breaker: CircuitBreakerLib<[GuardedCall], void>;
  private config: CircuitBreakerConfig;
  private calls: number = 0;
  private failures: number = 0;
  private timeouts: number = 0;
  private rejections: number = 0;
  private lastFailureTime?: number;

  constructor(config: Partial<CircuitBreakerConfig> = {}, name: string = 'remote-store') {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };

    // Deadlines are enforced per call below, so opossum's own timeout is off
    this.breaker = new CircuitBreakerLib((call: GuardedCall) => call(), {
      name,
      timeout: false,
      errorThresholdPercentage: this.config.errorThresholdPercentage,
      resetTimeout: this.config.resetTimeout,
      rollingCountTimeout: this.config.monitoringPeriod,
      rollingCountBuckets: 10,
      volumeThreshold: this.config.minimumRequests,
    });

    if (!this.config.enabled) {
      this.breaker.disable();
    }

    this.breaker.on('failure', () => {
      this.failures++;
      this.lastFailureTime = Date.now();
    });

    this.breaker.on('reject', () => {
      this.rejections++;
    });

    this.breaker.on('open', () => {
      console.warn(`[RemoteCallGuard] ${name}: circuit opened, remote calls will fail fast`);
    });

    this.breaker.on('halfOpen', () => {
      console.log(`[RemoteCallGuard] ${name}: circuit half-open, probing remote store`);
    });

    this.breaker.on('close', () => {
      console.log(`[RemoteCallGuard] ${name}: circuit closed`);
    });
  }

  /**
   * Run a remote call. Resolves with its result or rejects with a
   * RemoteTimeoutError / RemoteUnavailableError. Never retries.
   */
  async execute<T>(operation: string, call: () => Promise<T>, timeoutMs: number): Promise<T> {
    assertValidTimeout(timeoutMs);
    this.calls++;
    const holder: { result?: { value: T } } = {};

    try {
      await this.breaker.fire(async () => {
        holder.result = { value: await withDeadline(call(), timeoutMs, operation) };
      });
    } catch (error: unknown) {
      const classified = classifyRemoteError(error, operation, timeoutMs);
      if (classified instanceof RemoteTimeoutError) {
        this.timeouts++;
      }
      throw classified;
    }

    if (!holder.result) {
      throw classifyRemoteError(new Error('remote call produced no result'), operation, timeoutMs);
    }
    return holder.result.value;
  }

  /**
   * Get current state
   */
  getState(): CircuitState {
    if (!this.config.enabled) {
      return CircuitState.CLOSED;
    }

    return this.breaker.opened ? CircuitState.OPEN :
           this.breaker.halfOpen ? CircuitState.HALF_OPEN :
           CircuitState.CLOSED;
  }

  getStats(): RemoteGuardStats {
    return {
      state: this.getState(),
      enabled: this.config.enabled,
      calls: this.calls,
      failures: this.failures,
      timeouts: this.timeouts,
      rejections: this.rejections,
      lastFailureTime: this.lastFailureTime,
    };
  }

  /**
   * Manually open circuit
   */
  open(): void {
    this.breaker.open();
  }

  /**
   * Manually close circuit
   */
  close(): void {
    this.breaker.close();
  }

  /**
   * Stop the breaker's statistics timers
   */
  shutdown(): void {
    this.breaker.shutdown();
  }
}

/**
 * Reject with RemoteTimeoutError when the promise does not settle in time.
 * A late settlement of the original promise is ignored.
 */
export function withDeadline<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new RemoteTimeoutError(operation, timeoutMs));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
