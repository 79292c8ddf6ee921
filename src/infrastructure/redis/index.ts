// ═══════════════════════════════════════════════════════════════════════════════
// REDIS MODULE INDEX
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type ValidityKeyspace,
  KeyError,
  createValidityKeyspace,
} from './keys.js';

export {
  type LuaScript,
  type ConsumeStatus,
  type SetTokenStatus,
  UPSERT_VALIDITY_SCRIPT,
  SET_TOKEN_SCRIPT,
  CONSUME_TOKEN_SCRIPT,
  SET_NOTIFIED_SCRIPT,
  SET_DEFAULT_EXPIRATION_SCRIPT,
  INSERT_IF_ABSENT_SCRIPT,
  ALL_SCRIPTS,
  parseConsumeResult,
  parseSetTokenResult,
  parseFlagResult,
} from './scripts.js';

export {
  type RedisCommandClient,
  type RedisClientConfig,
  DEFAULT_REDIS_CLIENT_CONFIG,
  createRedisClient,
  isNoScriptError,
} from './client.js';
