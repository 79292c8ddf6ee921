// ═══════════════════════════════════════════════════════════════════════════════
// VALIDITY STORE — Exports
// ═══════════════════════════════════════════════════════════════════════════════

export type { ValidityStore, ValidityStoreConfig, ValidityStoreDeps } from './types.js';
export { MemoryValidityStore } from './memory.js';
export {
  RedisValidityStore,
  DEFAULT_REDIS_STORE_CONFIG,
  type RedisValidityStoreConfig,
} from './redis.js';
export {
  JITTER_RATIO,
  jitteredExpiration,
  collectMissingAccounts,
  planBootstrapRecords,
  type RandomSource,
} from './bootstrap.js';
