import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Redis (empty URL = in-memory remote store)
  REDIS_URL: process.env.REDIS_URL || '',
  REDIS_PASSWORD: process.env.REDIS_PASSWORD,
  REDIS_DB: parseInt(process.env.REDIS_DB || '0', 10),

  // Local tier
  CACHE_MAX_ENTRIES: parseInt(process.env.CACHE_MAX_ENTRIES || '1000', 10),
  CACHE_TTL: parseInt(process.env.CACHE_TTL || '300', 10), // seconds
  CACHE_KEY_PREFIX: process.env.CACHE_KEY_PREFIX || 'state:',

  // Reclamation loop
  CACHE_SWEEP_INTERVAL_MS: parseInt(process.env.CACHE_SWEEP_INTERVAL_MS || '5000', 10),
  CACHE_SWEEP_BATCH_SIZE: parseInt(process.env.CACHE_SWEEP_BATCH_SIZE || '500', 10),

  // Remote calls
  REMOTE_TIMEOUT_MS: parseInt(process.env.REMOTE_TIMEOUT_MS || '1000', 10),

  // Circuit Breaker
  CIRCUIT_BREAKER_ENABLED: process.env.CIRCUIT_BREAKER_ENABLED !== 'false', // Default true
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10), // 30 seconds
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
} as const;

export type Env = typeof env;

export default env;
