/**
 * Redis Remote Store
 * Remote tier backed by ioredis; records are stored as JSON envelopes
 */

import { RemoteUnavailableError } from './cache.errors';
import { RemoteRecord } from './cache.types';
import { RedisConnection } from './redis.connection';
import { RemoteStore } from './remote.store';

/**
 * Converts payloads to and from their JSON form.
 * The store never looks inside a value; the codec owns its shape.
 */
export interface ValueCodec<V> {
  encode(value: V): unknown;
  decode(raw: unknown): V;
}

/**
 * Codec for payloads that are already plain JSON
 */
export const jsonCodec: ValueCodec<unknown> = {
  encode: (value) => value,
  decode: (raw) => raw,
};

export class RedisRemoteStore<V> implements RemoteStore<V> {
  readonly name = 'redis';
  private readonly connection: RedisConnection;
  private readonly codec: ValueCodec<V>;

  constructor(connection: RedisConnection, codec: ValueCodec<V>) {
    this.connection = connection;
    this.codec = codec;
  }

  async get(key: string): Promise<RemoteRecord<V> | null> {
    const raw = await this.client('get').get(key);
    if (raw === null) {
      return null;
    }
    return this.deserialize(key, raw);
  }

  async set(key: string, record: RemoteRecord<V>, ttlMs: number): Promise<void> {
    const client = this.client('set');
    const payload = JSON.stringify({
      value: this.codec.encode(record.value),
      version: record.version,
      expiresAt: record.expiresAt,
      writtenAt: record.writtenAt,
    });

    if (ttlMs > 0) {
      await client.set(key, payload, 'PX', Math.ceil(ttlMs));
    } else {
      await client.set(key, payload);
    }
  }

  async delete(key: string): Promise<void> {
    await this.client('delete').del(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return this.client('keys').keys(`${escapeGlob(prefix)}*`);
  }

  isAvailable(): boolean {
    return this.connection.isAvailable();
  }

  async close(): Promise<void> {
    await this.connection.disconnect();
  }

  private client(operation: string) {
    const client = this.connection.getClient();
    if (!client) {
      throw new RemoteUnavailableError(operation, new Error('Redis client is not ready'));
    }
    return client;
  }

  /**
   * Parse an envelope; anything malformed is treated as absent
   */
  private deserialize(key: string, raw: string): RemoteRecord<V> | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[RedisRemoteStore] Ignoring unparseable record ${key}: ${message}`);
      return null;
    }

    if (!isEnvelope(parsed)) {
      console.warn(`[RedisRemoteStore] Ignoring malformed record ${key}`);
      return null;
    }

    return {
      value: this.codec.decode(parsed.value),
      version: parsed.version,
      expiresAt: parsed.expiresAt,
      writtenAt: parsed.writtenAt,
    };
  }
}

interface Envelope {
  value: unknown;
  version: number;
  expiresAt: number;
  writtenAt: number;
}

function isEnvelope(input: unknown): input is Envelope {
  if (typeof input !== 'object' || input === null) {
    return false;
  }
  return (
    'value' in input &&
    'version' in input && typeof input.version === 'number' &&
    'expiresAt' in input && typeof input.expiresAt === 'number' &&
    'writtenAt' in input && typeof input.writtenAt === 'number'
  );
}

/**
 * Escape Redis glob metacharacters so a prefix matches literally
 */
export function escapeGlob(prefix: string): string {
  return prefix.replace(/[*?[\]\\]/g, '\\$&');
}
