/**
 * Error Handler Tests
 */

import { ApiError, errorHandler, statusFor } from '../error-handler';
import {
  ComputeError,
  ConfigurationError,
  RemoteTimeoutError,
  RemoteUnavailableError,
  StateErrorCode,
} from '../../lib/cache/cache.errors';
import { asResponse, createMockRequest, createMockResponse } from '../../__tests__/helpers/mocks';

describe('statusFor', () => {
  it('should map errors to HTTP status codes', () => {
    expect(statusFor(new ApiError(404, 'missing'))).toBe(404);
    expect(statusFor(new RangeError('bad ttl'))).toBe(400);
    expect(statusFor(new ConfigurationError('maxEntries', 'bad'))).toBe(400);
    expect(statusFor(new RemoteUnavailableError('get'))).toBe(503);
    expect(statusFor(new RemoteTimeoutError('get', 10))).toBe(503);
    expect(statusFor(new ComputeError('k', new Error('x')))).toBe(502);
    expect(statusFor(new Error('unexpected'))).toBe(500);
  });
});

describe('errorHandler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should respond with the ApiError status and details', () => {
    const res = createMockResponse();

    errorHandler(
      new ApiError(404, 'State key not found', { remoteError: 'down' }),
      createMockRequest({ path: '/api/state/a/b' }),
      asResponse(res),
      jest.fn()
    );

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'State key not found', details: { remoteError: 'down' } });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('should include the state error code', () => {
    const res = createMockResponse();

    errorHandler(new RemoteUnavailableError('get'), createMockRequest(), asResponse(res), jest.fn());

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual({
      success: false,
      error: 'Remote store unavailable during get',
      code: StateErrorCode.REMOTE_UNAVAILABLE,
    });
    expect(console.error).toHaveBeenCalled();
  });

  it('should answer 500 for unexpected errors', () => {
    const res = createMockResponse();

    errorHandler(new Error('boom'), createMockRequest(), asResponse(res), jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ success: false, error: 'boom' });
  });
});
