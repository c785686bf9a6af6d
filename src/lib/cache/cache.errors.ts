/**
 * Cache Error Handling
 * Error taxonomy for the state cache and classification of remote failures
 */

export enum StateErrorCode {
  CONFIGURATION = 'CONFIGURATION',
  REMOTE_UNAVAILABLE = 'REMOTE_UNAVAILABLE',
  REMOTE_TIMEOUT = 'REMOTE_TIMEOUT',
  COMPUTE_FAILED = 'COMPUTE_FAILED',
}

/**
 * Base class for every error raised by the state cache
 */
export class StateError extends Error {
  readonly code: StateErrorCode;
  readonly retryable: boolean;

  constructor(code: StateErrorCode, message: string, options?: { cause?: unknown; retryable?: boolean }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StateError';
    this.code = code;
    this.retryable = options?.retryable ?? false;
  }
}

/**
 * Invalid construction parameters. Raised at construction, never at runtime.
 */
export class ConfigurationError extends StateError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(StateErrorCode.CONFIGURATION, `Invalid ${field}: ${message}`);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

/**
 * Any failure of the remote tier. Non-fatal: the local tier keeps serving.
 */
export class RemoteStoreError extends StateError {
  readonly operation: string;

  constructor(code: StateErrorCode, operation: string, message: string, cause?: unknown) {
    super(code, message, { cause, retryable: true });
    this.name = 'RemoteStoreError';
    this.operation = operation;
  }
}

export class RemoteUnavailableError extends RemoteStoreError {
  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(StateErrorCode.REMOTE_UNAVAILABLE, operation, `Remote store unavailable during ${operation}${detail}`, cause);
    this.name = 'RemoteUnavailableError';
  }
}

export class RemoteTimeoutError extends RemoteStoreError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(StateErrorCode.REMOTE_TIMEOUT, operation, `Remote ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'RemoteTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The compute function given to getOrCompute failed.
 * One instance is shared by every caller waiting on the same computation.
 */
export class ComputeError extends StateError {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(StateErrorCode.COMPUTE_FAILED, `Compute failed for ${key}: ${detail}`, { cause });
    this.name = 'ComputeError';
    this.key = key;
  }
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

/**
 * Map an arbitrary remote failure onto the remote error taxonomy
 */
export function classifyRemoteError(error: unknown, operation: string, timeoutMs: number): RemoteStoreError {
  if (error instanceof RemoteStoreError) {
    return error;
  }

  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  if ((code && TIMEOUT_CODES.has(code)) || message.toLowerCase().includes('timed out')) {
    return new RemoteTimeoutError(operation, timeoutMs);
  }

  // EOPENBREAKER, ECONNREFUSED, ECONNRESET, ENOTFOUND and the rest
  return new RemoteUnavailableError(operation, error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
