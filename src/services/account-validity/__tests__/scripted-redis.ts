// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPTED REDIS — ioredis-mock Behind the Validity Store's Command Surface
// ═══════════════════════════════════════════════════════════════════════════════
//
// The store's Lua sources run unchanged inside ioredis-mock. Script loading is
// tracked here so tests can count loads and force NOSCRIPT with
// `flushScripts`.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createHash } from 'node:crypto';
import RedisMock from 'ioredis-mock';
import type { RedisCommandClient } from '../../../infrastructure/redis/index.js';

export class ScriptedRedis implements RedisCommandClient {
  readonly client = new RedisMock();
  readonly calls = { scriptLoad: 0, evalsha: 0 };
  private readonly loaded = new Map<string, string>();

  flushScripts(): void {
    this.loaded.clear();
  }

  async script(_subcommand: 'LOAD', source: string): Promise<unknown> {
    this.calls.scriptLoad++;
    const sha = createHash('sha1').update(source).digest('hex');
    this.loaded.set(sha, source);
    return sha;
  }

  async evalsha(sha: string, numKeys: number, ...args: Array<string | number>): Promise<unknown> {
    this.calls.evalsha++;
    const source = this.loaded.get(sha);
    if (source === undefined) {
      throw new Error('NOSCRIPT No matching script. Please use EVAL.');
    }
    return this.client.eval(source, numKeys, ...args);
  }

  get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.client.hgetall(key);
  }

  exists(key: string): Promise<number> {
    return this.client.exists(key);
  }

  zrangebyscore(
    key: string,
    min: number | string,
    max: number | string,
    withScores: 'WITHSCORES'
  ): Promise<string[]> {
    return this.client.zrangebyscore(key, min, max, withScores);
  }
}

/**
 * ioredis-mock instances share one keyspace, so each test starts from an
 * empty one.
 */
export async function createScriptedRedis(): Promise<ScriptedRedis> {
  const redis = new ScriptedRedis();
  await redis.client.flushall();
  return redis;
}
