// ═══════════════════════════════════════════════════════════════════════════════
// REDIS CLIENT — ioredis Connection and Command Surface
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';
import { getLogger } from '../../observability/logging/index.js';

const logger = getLogger({ component: 'redis' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * The commands the validity store issues. An ioredis `Redis` satisfies it;
 * tests run it against ioredis-mock.
 */
export interface RedisCommandClient {
  script(subcommand: 'LOAD', source: string): Promise<unknown>;
  evalsha(sha: string, numKeys: number, ...args: Array<string | number>): Promise<unknown>;
  get(key: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  exists(key: string): Promise<number>;
  zrangebyscore(
    key: string,
    min: number | string,
    max: number | string,
    withScores: 'WITHSCORES'
  ): Promise<string[]>;
}

export interface RedisClientConfig {
  /** Connection URL, e.g. redis://localhost:6379 */
  url: string;

  /** Retries per command before failing it */
  maxRetriesPerRequest: number;

  /** Connect timeout in ms */
  connectTimeoutMs: number;
}

export const DEFAULT_REDIS_CLIENT_CONFIG: Omit<RedisClientConfig, 'url'> = {
  maxRetriesPerRequest: 3,
  connectTimeoutMs: 10_000,
};

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create an ioredis client with connection logging.
 */
export function createRedisClient(
  config: Pick<RedisClientConfig, 'url'> & Partial<RedisClientConfig>
): Redis {
  const resolved: RedisClientConfig = { ...DEFAULT_REDIS_CLIENT_CONFIG, ...config };

  const client = new Redis(resolved.url, {
    maxRetriesPerRequest: resolved.maxRetriesPerRequest,
    connectTimeout: resolved.connectTimeoutMs,
    lazyConnect: true,
  });

  client.on('ready', () => logger.info('Redis connection ready'));
  client.on('reconnecting', () => logger.warn('Redis reconnecting'));
  client.on('error', (error: Error) => logger.error('Redis connection error', error));

  return client;
}

/**
 * Returns true for the error Redis raises when a script SHA is unknown.
 */
export function isNoScriptError(error: unknown): boolean {
  return error instanceof Error && error.message.startsWith('NOSCRIPT');
}
