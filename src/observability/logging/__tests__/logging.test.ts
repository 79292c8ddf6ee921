// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING TESTS — Redaction and Entry Formatting
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  configureLogger,
  getLoggerConfig,
  formatError,
  formatLogEntry,
  LOG_LEVELS,
  redact,
  REDACTED,
  type LoggerConfig,
} from '../index.js';
import { AccountValidityError } from '../../../types/errors.js';

describe('redact', () => {
  it('should replace values of sensitive keys', () => {
    expect(redact({
      token: 'abcdef',
      renewalToken: 'abcdef',
      apiKey: 'test-secret',
      Authorization: 'Bearer test-secret',
      accountId: 'alice',
    })).toEqual({
      token: REDACTED,
      renewalToken: REDACTED,
      apiKey: REDACTED,
      Authorization: REDACTED,
      accountId: 'alice',
    });
  });

  it('should mask e-mail addresses inside strings', () => {
    expect(redact({ address: 'alice@example.test', note: 'sent to bob@example.test twice' })).toEqual({
      address: '[EMAIL]',
      note: 'sent to [EMAIL] twice',
    });
  });

  it('should walk nested objects and arrays', () => {
    expect(redact({ outer: { password: 'x', list: ['carol@example.test', 3] } })).toEqual({
      outer: { password: REDACTED, list: ['[EMAIL]', 3] },
    });
  });

  it('should stop at the maximum depth', () => {
    expect(redact({ a: { b: { c: 'deep' } } }, { maxDepth: 2 })).toEqual({ a: { b: { c: '[MAX_DEPTH]' } } });
  });

  it('should leave e-mails alone when disabled', () => {
    expect(redact({ address: 'alice@example.test' }, { redactEmails: false })).toEqual({
      address: 'alice@example.test',
    });
  });
});

describe('formatLogEntry', () => {
  let saved: LoggerConfig;

  beforeEach(() => {
    saved = getLoggerConfig();
    configureLogger({ timestamp: false, serviceName: 'svc', environment: 'test', redactPII: true });
  });

  afterEach(() => {
    configureLogger(saved);
  });

  it('should build a redacted structured entry', () => {
    expect(formatLogEntry('info', 'Issued renewal token', { accountId: 'alice', token: 'abcdef' }, 'renewal'))
      .toEqual({
        level: 'info',
        levelNum: LOG_LEVELS.info,
        msg: 'Issued renewal token',
        service: 'svc',
        env: 'test',
        component: 'renewal',
        accountId: 'alice',
        token: REDACTED,
      });
  });

  it('should pass values through when redaction is off', () => {
    configureLogger({ redactPII: false });

    expect(formatLogEntry('warn', 'x', { token: 'abcdef' })).toMatchObject({ token: 'abcdef' });
  });
});

describe('formatError', () => {
  it('should include the code of coded errors', () => {
    const formatted = formatError(new AccountValidityError('TOKEN_EXHAUSTED', 'no token'));

    expect(formatted).toMatchObject({
      errorName: 'AccountValidityError',
      errorMessage: 'no token',
      errorCode: 'TOKEN_EXHAUSTED',
    });
  });

  it('should format non-errors as messages', () => {
    expect(formatError('plain')).toEqual({ errorMessage: 'plain' });
    expect(formatError(42)).toEqual({ errorMessage: '42' });
  });
});
