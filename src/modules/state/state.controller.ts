/**
 * State Controller
 * HTTP request/response handling for state endpoints
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { WriteResult } from '../../lib/cache/cache.types';
import { StateManager } from '../../lib/cache/state.manager';
import {
  IGetStateResponse,
  IMetricsResponse,
  IPutStateRequest,
  IStatsResponse,
  IWriteStateResponse,
} from './state.types';

export class StateController {
  constructor(private readonly stateManager: StateManager<unknown>) {}

  /**
   * GET /api/state/:namespace/:key
   */
  getValue = asyncHandler(async (req: Request, res: Response) => {
    const { namespace, key } = req.params;

    const result = await this.stateManager.get(namespace, key);
    if (!result.found) {
      throw new ApiError(
        404,
        'State key not found',
        result.error ? { remoteError: result.error.message } : undefined
      );
    }

    const response: IGetStateResponse = {
      success: true,
      namespace,
      key,
      value: result.value,
      source: result.source,
    };

    res.json(response);
  });

  /**
   * PUT /api/state/:namespace/:key
   */
  putValue = asyncHandler(async (req: Request, res: Response) => {
    const { namespace, key } = req.params;
    const { value, ttlMs } = parsePutBody(req.body);

    const result = await this.stateManager.set(namespace, key, value, ttlMs);
    res.json(toWriteResponse(result));
  });

  /**
   * DELETE /api/state/:namespace/:key
   */
  deleteValue = asyncHandler(async (req: Request, res: Response) => {
    const { namespace, key } = req.params;

    const result = await this.stateManager.invalidate(namespace, key);
    res.json(toWriteResponse(result));
  });

  /**
   * GET /api/state/metrics
   */
  getMetrics = asyncHandler(async (_req: Request, res: Response) => {
    const response: IMetricsResponse = {
      success: true,
      metrics: this.stateManager.metrics(),
      namespaces: this.stateManager.namespaceMetrics(),
    };

    res.json(response);
  });

  /**
   * GET /api/state/stats
   */
  getStats = asyncHandler(async (_req: Request, res: Response) => {
    const response: IStatsResponse = {
      success: true,
      stats: this.stateManager.stats(),
    };

    res.json(response);
  });
}

function parsePutBody(body: unknown): IPutStateRequest {
  if (typeof body !== 'object' || body === null || !('value' in body) || body.value === undefined) {
    throw new ApiError(400, 'Body must contain a value');
  }

  if (!('ttlMs' in body) || body.ttlMs === undefined) {
    return { value: body.value };
  }

  const { ttlMs } = body;
  if (typeof ttlMs !== 'number' || !Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new ApiError(400, 'ttlMs must be a non-negative number');
  }
  return { value: body.value, ttlMs };
}

function toWriteResponse(result: WriteResult): IWriteStateResponse {
  return {
    success: true,
    local: result.local,
    remote: result.remote,
    ...(result.error ? { warning: result.error.message } : {}),
  };
}
