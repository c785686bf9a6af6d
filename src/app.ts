/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { StateManager } from './lib/cache/state.manager';
import { errorHandler } from './middleware/error-handler';
import { createStateRouter } from './modules/state/state.router';

export interface AppDependencies {
  stateManager: StateManager<unknown>;
  remoteHealthCheck?: () => Promise<boolean>;
}

export const createApp = ({ stateManager, remoteHealthCheck }: AppDependencies): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'PUT', 'DELETE'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  // ============================================================================
  // Routes
  // ============================================================================

  // Health check; a degraded remote store still leaves the local tier serving
  app.get('/health', async (_req: Request, res: Response) => {
    const stats = stateManager.stats();
    let remoteHealthy = stats.remoteAvailable;
    if (remoteHealthCheck) {
      try {
        remoteHealthy = await remoteHealthCheck();
      } catch (error: unknown) {
        console.error('[App] Remote health check failed:', error);
        remoteHealthy = false;
      }
    }

    res.json({
      success: true,
      status: remoteHealthy ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      remote: {
        store: stats.remoteStore,
        available: remoteHealthy,
        circuit: stats.remoteGuard.state,
      },
      localSize: stats.localSize,
    });
  });

  app.use('/api/state', createStateRouter(stateManager));

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
