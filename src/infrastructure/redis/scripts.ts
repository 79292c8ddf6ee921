// ═══════════════════════════════════════════════════════════════════════════════
// REDIS LUA SCRIPTS — Atomic Validity Record Operations
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every multi-key update of the validity keyspace runs as one script:
// - Full record upsert with link-token ownership check
// - Token rotation
// - Conditional token consumption (one winner per token)
// - Notified flag and default expiration updates
// - Insert-if-absent for the bootstrap migration
//
// Scripts are loaded once and executed via EVALSHA. Token index keys are
// derived inside the scripts from a prefix argument, so the keyspace must live
// on a single Redis node.
//
// Record hash fields: expiration_ts, notified ('1' | '0'), token, token_used_ts
// Pending set: sorted set of not-yet-notified accounts scored by expiration
// Token index: <prefix>:token:<link token> → account id
//
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// SCRIPT TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Lua script definition.
 */
export interface LuaScript {
  /** Script name for identification */
  readonly name: string;

  /** Lua source code */
  readonly source: string;

  /** Number of KEYS arguments */
  readonly numKeys: number;

  /** Description of what the script does */
  readonly description: string;
}

export type ConsumeStatus = 'renewed' | 'stale' | 'not_found';

export type SetTokenStatus = 'ok' | 'conflict' | 'not_found';

// Shared Lua helpers. Digit-only tokens are manual codes and are not indexed.
const LUA_HELPERS = `
local function is_link(token)
  return token and token ~= '' and string.find(token, '^%d+$') == nil
end

local function release_token(record_key, account_id, token_prefix)
  local old = redis.call('HGET', record_key, 'token')
  if is_link(old) and redis.call('GET', token_prefix .. old) == account_id then
    redis.call('DEL', token_prefix .. old)
  end
end

local function owned_by_other(token, account_id, token_prefix)
  if not is_link(token) then
    return false
  end
  local owner = redis.call('GET', token_prefix .. token)
  if not owner then
    return false
  end
  return owner ~= account_id
end
`;

// ─────────────────────────────────────────────────────────────────────────────────
// RECORD UPSERT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Insert or replace a full validity record.
 *
 * KEYS[1] = record key
 * KEYS[2] = pending set key
 * ARGV[1] = account id
 * ARGV[2] = expiration_ts
 * ARGV[3] = notified ('1' | '0')
 * ARGV[4] = token ('' for none)
 * ARGV[5] = token_used_ts ('' for none)
 * ARGV[6] = token index key prefix
 *
 * Returns: 1 on success, 0 when the link token belongs to another account
 */
export const UPSERT_VALIDITY_SCRIPT: LuaScript = {
  name: 'upsert_validity',
  numKeys: 2,
  description: 'Insert or replace a validity record, keeping the token index in step',
  source: LUA_HELPERS + `
local account_id = ARGV[1]
local token = ARGV[4]
local token_prefix = ARGV[6]

if owned_by_other(token, account_id, token_prefix) then
  return 0
end

release_token(KEYS[1], account_id, token_prefix)
redis.call('HSET', KEYS[1], 'expiration_ts', ARGV[2], 'notified', ARGV[3])

if token ~= '' then
  redis.call('HSET', KEYS[1], 'token', token)
else
  redis.call('HDEL', KEYS[1], 'token')
end

if ARGV[5] ~= '' then
  redis.call('HSET', KEYS[1], 'token_used_ts', ARGV[5])
else
  redis.call('HDEL', KEYS[1], 'token_used_ts')
end

if is_link(token) then
  redis.call('SET', token_prefix .. token, account_id)
end

if ARGV[3] == '1' then
  redis.call('ZREM', KEYS[2], account_id)
else
  redis.call('ZADD', KEYS[2], ARGV[2], account_id)
end

return 1
`,
};

// ─────────────────────────────────────────────────────────────────────────────────
// TOKEN ROTATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Store a new token for an existing record and clear token_used_ts.
 *
 * KEYS[1] = record key
 * ARGV[1] = account id
 * ARGV[2] = token
 * ARGV[3] = token index key prefix
 *
 * Returns: 'ok' | 'conflict' | 'not_found'
 */
export const SET_TOKEN_SCRIPT: LuaScript = {
  name: 'set_token',
  numKeys: 1,
  description: 'Rotate the renewal token of a record',
  source: LUA_HELPERS + `
local account_id = ARGV[1]
local token = ARGV[2]
local token_prefix = ARGV[3]

if redis.call('EXISTS', KEYS[1]) == 0 then
  return 'not_found'
end

if owned_by_other(token, account_id, token_prefix) then
  return 'conflict'
end

release_token(KEYS[1], account_id, token_prefix)
redis.call('HSET', KEYS[1], 'token', token)
redis.call('HDEL', KEYS[1], 'token_used_ts')

if is_link(token) then
  redis.call('SET', token_prefix .. token, account_id)
end

return 'ok'
`,
};

// ─────────────────────────────────────────────────────────────────────────────────
// TOKEN CONSUMPTION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Extend a record if and only if `token` is its current, unused token.
 *
 * KEYS[1] = record key
 * KEYS[2] = pending set key
 * ARGV[1] = account id
 * ARGV[2] = token
 * ARGV[3] = new expiration_ts
 * ARGV[4] = now (becomes token_used_ts)
 *
 * Returns: [status, expiration_ts]
 */
export const CONSUME_TOKEN_SCRIPT: LuaScript = {
  name: 'consume_token',
  numKeys: 2,
  description: 'Consume a renewal token and extend the record once',
  source: `
local current = redis.call('HGET', KEYS[1], 'token')
if not current or current ~= ARGV[2] then
  return {'not_found', '0'}
end

if redis.call('HEXISTS', KEYS[1], 'token_used_ts') == 1 then
  return {'stale', redis.call('HGET', KEYS[1], 'expiration_ts')}
end

redis.call('HSET', KEYS[1], 'expiration_ts', ARGV[3], 'notified', '0', 'token_used_ts', ARGV[4])
redis.call('ZADD', KEYS[2], ARGV[3], ARGV[1])

return {'renewed', ARGV[3]}
`,
};

// ─────────────────────────────────────────────────────────────────────────────────
// FLAGS & DEFAULTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Set the notified flag of an existing record.
 *
 * KEYS[1] = record key
 * KEYS[2] = pending set key
 * ARGV[1] = account id
 * ARGV[2] = notified ('1' | '0')
 *
 * Returns: 1 if the record exists, 0 otherwise
 */
export const SET_NOTIFIED_SCRIPT: LuaScript = {
  name: 'set_notified',
  numKeys: 2,
  description: 'Set the notified flag and maintain the pending set',
  source: `
local expiration = redis.call('HGET', KEYS[1], 'expiration_ts')
if not expiration then
  return 0
end

redis.call('HSET', KEYS[1], 'notified', ARGV[2])

if ARGV[2] == '1' then
  redis.call('ZREM', KEYS[2], ARGV[1])
else
  redis.call('ZADD', KEYS[2], expiration, ARGV[1])
end

return 1
`,
};

/**
 * Overwrite (or create) expiration and notified, leaving token fields alone.
 *
 * KEYS[1] = record key
 * KEYS[2] = pending set key
 * ARGV[1] = account id
 * ARGV[2] = expiration_ts
 *
 * Returns: 1
 */
export const SET_DEFAULT_EXPIRATION_SCRIPT: LuaScript = {
  name: 'set_default_expiration',
  numKeys: 2,
  description: 'Set a default expiration and reset the notified flag',
  source: `
redis.call('HSET', KEYS[1], 'expiration_ts', ARGV[2], 'notified', '0')
redis.call('ZADD', KEYS[2], ARGV[2], ARGV[1])
return 1
`,
};

// ─────────────────────────────────────────────────────────────────────────────────
// BOOTSTRAP INSERT
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Create a record only when none exists. A link token already owned by
 * another account is dropped rather than failing the insert.
 *
 * KEYS[1] = record key
 * KEYS[2] = pending set key
 * ARGV[1..6] = as UPSERT_VALIDITY_SCRIPT
 *
 * Returns: 1 if inserted, 0 if a record already existed
 */
export const INSERT_IF_ABSENT_SCRIPT: LuaScript = {
  name: 'insert_if_absent',
  numKeys: 2,
  description: 'Insert a bootstrap record unless the account already has one',
  source: LUA_HELPERS + `
local account_id = ARGV[1]
local token = ARGV[4]
local token_prefix = ARGV[6]

if redis.call('EXISTS', KEYS[1]) == 1 then
  return 0
end

if owned_by_other(token, account_id, token_prefix) then
  token = ''
end

redis.call('HSET', KEYS[1], 'expiration_ts', ARGV[2], 'notified', ARGV[3])

if token ~= '' then
  redis.call('HSET', KEYS[1], 'token', token)
  if ARGV[5] ~= '' then
    redis.call('HSET', KEYS[1], 'token_used_ts', ARGV[5])
  end
  if is_link(token) then
    redis.call('SET', token_prefix .. token, account_id)
  end
end

if ARGV[3] ~= '1' then
  redis.call('ZADD', KEYS[2], ARGV[2], account_id)
end

return 1
`,
};

// ─────────────────────────────────────────────────────────────────────────────────
// SCRIPT REGISTRY
// ─────────────────────────────────────────────────────────────────────────────────

export const ALL_SCRIPTS: readonly LuaScript[] = [
  UPSERT_VALIDITY_SCRIPT,
  SET_TOKEN_SCRIPT,
  CONSUME_TOKEN_SCRIPT,
  SET_NOTIFIED_SCRIPT,
  SET_DEFAULT_EXPIRATION_SCRIPT,
  INSERT_IF_ABSENT_SCRIPT,
];

// ─────────────────────────────────────────────────────────────────────────────────
// RESULT PARSERS
// ─────────────────────────────────────────────────────────────────────────────────

function isConsumeStatus(value: unknown): value is ConsumeStatus {
  return value === 'renewed' || value === 'stale' || value === 'not_found';
}

/**
 * Parse the [status, expiration_ts] reply of CONSUME_TOKEN_SCRIPT.
 */
export function parseConsumeResult(reply: unknown): { status: ConsumeStatus; expirationTs: number } {
  if (!Array.isArray(reply)) {
    throw new Error(`Unexpected consume_token reply: ${JSON.stringify(reply)}`);
  }
  const [status, expiration]: unknown[] = reply;
  if (!isConsumeStatus(status)) {
    throw new Error(`Unexpected consume_token status: ${JSON.stringify(status)}`);
  }
  return { status, expirationTs: Number(expiration) };
}

/**
 * Parse the status reply of SET_TOKEN_SCRIPT.
 */
export function parseSetTokenResult(reply: unknown): SetTokenStatus {
  if (reply === 'ok' || reply === 'conflict' || reply === 'not_found') {
    return reply;
  }
  throw new Error(`Unexpected set_token reply: ${JSON.stringify(reply)}`);
}

/**
 * Parse a 0/1 integer reply.
 */
export function parseFlagResult(reply: unknown): boolean {
  return reply === 1 || reply === '1';
}
