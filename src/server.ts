/**
 * Server Entry Point
 * Wires the remote store, the state manager and the Express app together
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { configFromEnv } from './lib/cache/cache.config';
import { RedisConnection } from './lib/cache/redis.connection';
import { jsonCodec, RedisRemoteStore } from './lib/cache/redis.store';
import { InMemoryRemoteStore, RemoteStore } from './lib/cache/remote.store';
import { StateManager } from './lib/cache/state.manager';

interface RemoteTier {
  store: RemoteStore<unknown>;
  healthCheck?: () => Promise<boolean>;
}

const createRemoteTier = async (): Promise<RemoteTier> => {
  if (!env.REDIS_URL) {
    console.warn('⚠️  REDIS_URL not set, using in-memory remote store (state is not shared between instances)');
    return { store: new InMemoryRemoteStore<unknown>() };
  }

  console.log('📦 Initializing Redis connection...');
  const connection = new RedisConnection({
    url: env.REDIS_URL,
    password: env.REDIS_PASSWORD,
    db: env.REDIS_DB,
  });

  if (connection.getClient() === null) {
    // Wait a moment for connection to establish
    await new Promise((resolve) => setTimeout(resolve, 500));
  }

  if (await connection.healthCheck()) {
    console.log('✅ Redis connected and ready');
  } else {
    console.log('⚠️  Redis not reachable yet, serving from the local tier until it is');
  }

  return {
    store: new RedisRemoteStore(connection, jsonCodec),
    healthCheck: () => connection.healthCheck(),
  };
};

const startServer = async (): Promise<void> => {
  try {
    const remote = await createRemoteTier();

    const stateManager = new StateManager<unknown>({
      ...configFromEnv(env),
      remote: remote.store,
    });

    const app = createApp({ stateManager, remoteHealthCheck: remote.healthCheck });
    const httpServer = createServer(app);

    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('🚀 State cache server is running');
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Remote store: ${remote.store.name}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    let shuttingDown = false;
    const shutdown = (signal: string): void => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      console.log(`${signal} signal received: closing HTTP server`);

      httpServer.close(() => {
        console.log('HTTP server closed');
        stateManager
          .close()
          .then(() => remote.store.close())
          .then(() => {
            console.log('Remote store closed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            console.error('Error during shutdown:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
