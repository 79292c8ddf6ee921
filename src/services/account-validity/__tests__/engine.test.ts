// ═══════════════════════════════════════════════════════════════════════════════
// RENEWAL ENGINE TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RenewalEngine } from '../engine.js';
import { MemoryValidityStore } from '../store/index.js';
import { INVALID_OUTCOME } from '../types.js';
import { MANUAL_TOKEN_PATTERN, type TokenFormat } from '../tokens.js';
import {
  createTestClock,
  T0,
  DAY,
  PERIOD,
  LINK_A,
  LINK_B,
  type TestClock,
} from './helpers.js';

describe('RenewalEngine', () => {
  let clock: TestClock;
  let store: MemoryValidityStore;
  let engine: RenewalEngine;

  beforeEach(async () => {
    clock = createTestClock();
    store = new MemoryValidityStore({ period: PERIOD }, { clock });
    engine = new RenewalEngine(store, { period: PERIOD }, { clock });
    await store.setDefaultExpiration('alice');
    await store.setDefaultExpiration('bob');
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // ISSUING
  // ─────────────────────────────────────────────────────────────────────────────

  describe('issueToken', () => {
    it('should store the generated token on the account', async () => {
      const token = await engine.issueToken('alice', 'link');

      expect(await store.getRenewalToken('alice')).toBe(token);
    });

    it('should issue digit codes for the manual format', async () => {
      const token = await engine.issueToken('alice', 'manual');
      expect(token).toMatch(MANUAL_TOKEN_PATTERN);
    });

    it('should regenerate a link token that collides', async () => {
      const generate = vi.fn((_format: TokenFormat) => LINK_A);
      engine = new RenewalEngine(store, { period: PERIOD }, { clock, generateToken: generate });
      await engine.issueToken('bob', 'link');

      generate.mockReturnValueOnce(LINK_A).mockReturnValueOnce(LINK_B);

      expect(await engine.issueToken('alice', 'link')).toBe(LINK_B);
      expect(generate).toHaveBeenCalledTimes(3);
    });

    it('should give up after maxTokenAttempts collisions', async () => {
      const generate = vi.fn((_format: TokenFormat) => LINK_A);
      engine = new RenewalEngine(store, { period: PERIOD, maxTokenAttempts: 3 }, { clock, generateToken: generate });
      await engine.issueToken('bob', 'link');

      await expect(engine.issueToken('alice', 'link')).rejects.toMatchObject({
        code: 'TOKEN_EXHAUSTED',
        statusCode: 500,
      });
      expect(generate).toHaveBeenCalledTimes(4);
    });

    it('should let two accounts hold the same manual code', async () => {
      engine = new RenewalEngine(store, { period: PERIOD }, { clock, generateToken: () => '12345678' });

      await engine.issueToken('alice', 'manual');
      await engine.issueToken('bob', 'manual');

      expect(await store.getRenewalToken('alice')).toBe('12345678');
      expect(await store.getRenewalToken('bob')).toBe('12345678');
    });

    it('should fail with NOT_FOUND for an untracked account', async () => {
      await expect(engine.issueToken('ghost', 'link')).rejects.toMatchObject({ code: 'NOT_FOUND' });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // RENEWAL
  // ─────────────────────────────────────────────────────────────────────────────

  describe('attemptRenewal', () => {
    it('should renew once and answer stale with the same expiration afterwards', async () => {
      const token = await engine.issueToken('alice', 'link');
      clock.advance(DAY);

      const first = await engine.attemptRenewal(token);
      clock.advance(DAY);
      const second = await engine.attemptRenewal(token);
      clock.advance(DAY);
      const third = await engine.attemptRenewal(token);

      expect(first).toEqual({ valid: true, stale: false, expirationTs: T0 + DAY + PERIOD });
      expect(second).toEqual({ valid: false, stale: true, expirationTs: T0 + DAY + PERIOD });
      expect(third).toEqual(second);
    });

    it('should reset notified on renewal', async () => {
      const token = await engine.issueToken('alice', 'link');
      await store.setNotified('alice', true);

      await engine.attemptRenewal(token);

      expect(await store.getRecord('alice')).toMatchObject({ notified: false, tokenUsedTs: T0 });
    });

    it('should answer invalid for an unknown token', async () => {
      expect(await engine.attemptRenewal('not-a-real-token')).toEqual({
        valid: false,
        stale: false,
        expirationTs: 0,
      });
      expect(await engine.attemptRenewal('not-a-real-token', 'alice')).toEqual(INVALID_OUTCOME);
    });

    it('should refuse a manual code presented without an account', async () => {
      const code = await engine.issueToken('alice', 'manual');

      expect(await engine.attemptRenewal(code)).toEqual(INVALID_OUTCOME);
      expect(await store.getRecord('alice')).toMatchObject({ tokenUsedTs: null });
    });

    it('should accept a manual code from its own account only', async () => {
      const code = await engine.issueToken('alice', 'manual');

      expect(await engine.attemptRenewal(code, 'bob')).toEqual(INVALID_OUTCOME);
      expect(await engine.attemptRenewal(code, 'alice')).toEqual({
        valid: true,
        stale: false,
        expirationTs: T0 + PERIOD,
      });
    });

    it('should let exactly one of two concurrent attempts renew', async () => {
      const token = await engine.issueToken('alice', 'link');

      const outcomes = await Promise.all([engine.attemptRenewal(token), engine.attemptRenewal(token)]);

      expect(outcomes.filter((o) => o.valid)).toHaveLength(1);
      expect(outcomes.filter((o) => o.stale)).toHaveLength(1);
      expect(outcomes.map((o) => o.expirationTs)).toEqual([T0 + PERIOD, T0 + PERIOD]);
    });

    it('should answer invalid for a token replaced by a newer one', async () => {
      const old = await engine.issueToken('alice', 'link');
      await engine.issueToken('alice', 'link');

      expect(await engine.attemptRenewal(old)).toEqual(INVALID_OUTCOME);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // EXTENSION
  // ─────────────────────────────────────────────────────────────────────────────

  describe('extend', () => {
    it('should default to now + period and clear the token', async () => {
      const token = await engine.issueToken('alice', 'link');
      clock.advance(DAY);

      const expirationTs = await engine.extend('alice');

      expect(expirationTs).toBe(T0 + DAY + PERIOD);
      expect(await store.getRecord('alice')).toEqual({
        accountId: 'alice',
        expirationTs: T0 + DAY + PERIOD,
        notified: false,
        renewalToken: null,
        tokenUsedTs: T0 + DAY,
      });
      expect(await engine.attemptRenewal(token)).toEqual(INVALID_OUTCOME);
    });

    it('should mark a kept token as consumed', async () => {
      const token = await engine.issueToken('alice', 'link');

      await engine.extend('alice', { expirationTs: T0 + 5 * DAY, notified: true, keepToken: token });

      expect(await engine.attemptRenewal(token)).toEqual({
        valid: false,
        stale: true,
        expirationTs: T0 + 5 * DAY,
      });
    });
  });

  describe('isExpired', () => {
    it('should compare the expiration with the clock', async () => {
      expect(await engine.isExpired('alice')).toBe(false);

      clock.set(T0 + PERIOD);
      expect(await engine.isExpired('alice')).toBe(true);
    });

    it('should return null for an untracked account', async () => {
      expect(await engine.isExpired('ghost')).toBeNull();
    });
  });
});
