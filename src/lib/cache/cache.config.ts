/**
 * Cache Configuration
 * Defaults and validation for the state manager
 */

import type { Env } from '../../config/env';
import { MAX_TIMER_DELAY_MS } from '../circuit-breaker/remote-call.guard';
import {
  CircuitBreakerConfig,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
} from '../circuit-breaker/circuit-breaker.types';
import { ConfigurationError } from './cache.errors';

export interface StateManagerConfig {
  maxEntries: number;
  defaultTtlMs: number;        // Used when a write or a remote record carries no TTL
  keyPrefix: string;           // Prepended to every remote key
  sweepIntervalMs: number;
  sweepBatchSize: number;
  remoteTimeoutMs: number;
  expiredScanWindow: number;
  autoStart: boolean;          // Start the reclamation loop on construction
  circuitBreaker: CircuitBreakerConfig;
}

export type StateManagerConfigInput = Partial<Omit<StateManagerConfig, 'circuitBreaker'>> & {
  circuitBreaker?: Partial<CircuitBreakerConfig>;
};

export const DEFAULT_STATE_MANAGER_CONFIG: StateManagerConfig = {
  maxEntries: 1000,
  defaultTtlMs: 300_000,
  keyPrefix: 'state:',
  sweepIntervalMs: 5000,
  sweepBatchSize: 500,
  remoteTimeoutMs: 1000,
  expiredScanWindow: 8,
  autoStart: true,
  circuitBreaker: DEFAULT_CIRCUIT_BREAKER_CONFIG,
};

/**
 * Apply defaults and reject values the manager cannot run with
 */
export function resolveStateManagerConfig(input: StateManagerConfigInput = {}): StateManagerConfig {
  const config: StateManagerConfig = {
    ...DEFAULT_STATE_MANAGER_CONFIG,
    ...input,
    circuitBreaker: { ...DEFAULT_STATE_MANAGER_CONFIG.circuitBreaker, ...input.circuitBreaker },
  };

  requirePositiveInteger('maxEntries', config.maxEntries);
  requirePositiveInteger('sweepBatchSize', config.sweepBatchSize);
  requirePositiveInteger('expiredScanWindow', config.expiredScanWindow);
  requireTimerDelay('sweepIntervalMs', config.sweepIntervalMs);
  requireTimerDelay('remoteTimeoutMs', config.remoteTimeoutMs);

  if (!Number.isFinite(config.defaultTtlMs) || config.defaultTtlMs < 0) {
    throw new ConfigurationError('defaultTtlMs', `must be a non-negative number, got ${config.defaultTtlMs}`);
  }

  const breaker = config.circuitBreaker;
  if (!(breaker.errorThresholdPercentage > 0 && breaker.errorThresholdPercentage <= 100)) {
    throw new ConfigurationError(
      'circuitBreaker.errorThresholdPercentage',
      `must be in (0, 100], got ${breaker.errorThresholdPercentage}`
    );
  }
  requireTimerDelay('circuitBreaker.resetTimeout', breaker.resetTimeout);
  requireTimerDelay('circuitBreaker.monitoringPeriod', breaker.monitoringPeriod);
  if (!Number.isInteger(breaker.minimumRequests) || breaker.minimumRequests < 0) {
    throw new ConfigurationError(
      'circuitBreaker.minimumRequests',
      `must be a non-negative integer, got ${breaker.minimumRequests}`
    );
  }

  return config;
}

/**
 * Manager settings from the process environment
 */
export function configFromEnv(source: Env): StateManagerConfigInput {
  return {
    maxEntries: source.CACHE_MAX_ENTRIES,
    defaultTtlMs: source.CACHE_TTL * 1000,
    keyPrefix: source.CACHE_KEY_PREFIX,
    sweepIntervalMs: source.CACHE_SWEEP_INTERVAL_MS,
    sweepBatchSize: source.CACHE_SWEEP_BATCH_SIZE,
    remoteTimeoutMs: source.REMOTE_TIMEOUT_MS,
    circuitBreaker: {
      enabled: source.CIRCUIT_BREAKER_ENABLED,
      errorThresholdPercentage: source.CIRCUIT_BREAKER_ERROR_THRESHOLD,
      resetTimeout: source.CIRCUIT_BREAKER_RESET_TIMEOUT,
      minimumRequests: source.CIRCUIT_BREAKER_MIN_REQUESTS,
    },
  };
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(field, `must be a positive integer, got ${value}`);
  }
}

function requireTimerDelay(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > MAX_TIMER_DELAY_MS) {
    throw new ConfigurationError(field, `must be an integer between 1 and ${MAX_TIMER_DELAY_MS} ms, got ${value}`);
  }
}
