/**
 * Redis Connection Manager
 * Owns one ioredis client with retry, event logging and health checks
 */

import Redis, { RedisOptions } from 'ioredis';

export interface RedisConnectionConfig {
  url: string;
  password?: string;
  db?: number;
  maxConnectionAttempts?: number;
}

export type RedisClientFactory = (url: string, options: RedisOptions) => Redis;

const defaultFactory: RedisClientFactory = (url, options) => new Redis(url, options);

export class RedisConnection {
  private client: Redis | null = null;
  private isConnecting: boolean = false;
  private connectionAttempts: number = 0;
  private readonly config: RedisConnectionConfig;
  private readonly maxConnectionAttempts: number;
  private readonly createClient: RedisClientFactory;

  constructor(config: RedisConnectionConfig, createClient: RedisClientFactory = defaultFactory) {
    this.config = config;
    this.maxConnectionAttempts = config.maxConnectionAttempts ?? 5;
    this.createClient = createClient;
  }

  /**
   * Get the client when it is ready, starting a connection if none exists
   */
  getClient(): Redis | null {
    if (this.client && this.client.status === 'ready') {
      return this.client;
    }

    if (this.client || this.isConnecting) {
      // ioredis reconnects on its own; callers treat null as "unavailable"
      return null;
    }

    return this.connect();
  }

  /**
   * Connect to Redis
   */
  private connect(): Redis | null {
    if (!this.config.url) {
      console.warn('[RedisConnection] Redis URL not configured');
      return null;
    }

    if (this.connectionAttempts >= this.maxConnectionAttempts) {
      console.error('[RedisConnection] Max Redis connection attempts reached');
      return null;
    }

    this.isConnecting = true;
    this.connectionAttempts++;

    const options: RedisOptions = {
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        console.log(`[RedisConnection] Retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: false,
    };

    if (this.config.password) {
      options.password = this.config.password;
    }

    if (this.config.db !== undefined) {
      options.db = this.config.db;
    }

    try {
      const client = this.createClient(this.config.url, options);
      this.client = client;

      client.on('connect', () => {
        console.log('[RedisConnection] Connecting...');
      });

      client.on('ready', () => {
        console.log('[RedisConnection] Connected and ready');
        this.isConnecting = false;
        this.connectionAttempts = 0;
      });

      client.on('error', (error: Error) => {
        console.error('[RedisConnection] Error:', error.message);
        this.isConnecting = false;
      });

      client.on('close', () => {
        console.log('[RedisConnection] Connection closed');
        this.isConnecting = false;
      });

      client.on('reconnecting', () => {
        console.log('[RedisConnection] Reconnecting...');
      });

      return client.status === 'ready' ? client : null;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[RedisConnection] Failed to create client:', message);
      this.isConnecting = false;
      return null;
    }
  }

  /**
   * Health check - ping Redis server
   */
  async healthCheck(): Promise<boolean> {
    const client = this.client ?? this.connect();
    if (!client) {
      return false;
    }

    try {
      const result = await client.ping();
      return result === 'PONG';
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[RedisConnection] Health check failed:', message);
      return false;
    }
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      this.isConnecting = false;
      this.connectionAttempts = 0;
      await client.quit();
    }
  }

  /**
   * Check if Redis is available
   */
  isAvailable(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }
}
