/**
 * Circuit Breaker Types
 * Type definitions for the guard placed around remote store calls
 */

/**
 * Circuit breaker state enumeration
 */
export enum CircuitState {
  CLOSED = 'closed',      // Normal operation, calls pass through
  OPEN = 'open',          // Remote considered down, calls fail immediately
  HALF_OPEN = 'half_open', // Probing, the next call decides
}

/**
 * Circuit breaker configuration
 */
export interface CircuitBreakerConfig {
  enabled: boolean;
  errorThresholdPercentage: number;   // Error percentage that opens the circuit (0-100]
  resetTimeout: number;               // Time before attempting half-open (ms)
  monitoringPeriod: number;           // Rolling window for error statistics (ms)
  minimumRequests: number;            // Calls in the window before the circuit may open
}

/**
 * Remote call guard statistics
 */
export interface RemoteGuardStats {
  state: CircuitState;
  enabled: boolean;
  calls: number;
  failures: number;
  timeouts: number;
  rejections: number;     // Calls refused while the circuit was open
  lastFailureTime?: number;
}

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  errorThresholdPercentage: 50,
  resetTimeout: 30000,
  monitoringPeriod: 60000,
  minimumRequests: 5,
};
