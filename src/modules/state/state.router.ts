/**
 * State Router
 * Route definitions for state endpoints
 */

import { Router } from 'express';
import { StateManager } from '../../lib/cache/state.manager';
import { StateController } from './state.controller';

export const createStateRouter = (stateManager: StateManager<unknown>): Router => {
  const router = Router();
  const controller = new StateController(stateManager);

  /**
   * @route   GET /api/state/metrics
   * @desc    Cache counters and per-namespace hit/miss breakdown
   * @access  Public
   */
  router.get('/metrics', controller.getMetrics);

  /**
   * @route   GET /api/state/stats
   * @desc    Local tier size, remote availability and circuit state
   * @access  Public
   */
  router.get('/stats', controller.getStats);

  /**
   * @route   GET /api/state/:namespace/:key
   * @desc    Read a value (local tier, then remote store)
   * @access  Public
   */
  router.get('/:namespace/:key', controller.getValue);

  /**
   * @route   PUT /api/state/:namespace/:key
   * @desc    Write a value through to the remote store
   * @access  Public
   */
  router.put('/:namespace/:key', controller.putValue);

  /**
   * @route   DELETE /api/state/:namespace/:key
   * @desc    Invalidate a value in both tiers
   * @access  Public
   */
  router.delete('/:namespace/:key', controller.deleteValue);

  return router;
};

export default createStateRouter;
