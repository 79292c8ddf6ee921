// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY SERVICE TESTS — Operations and Full Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { validateConfig } from '../../../config/index.js';
import {
  createAccountValidity,
  createValidityStore,
  MemoryValidityStore,
  RedisValidityStore,
  type AccountValidityModule,
} from '../index.js';
import { ScriptedRedis } from './scripted-redis.js';
import {
  createAccountSource,
  createMockDirectory,
  createMockMailer,
  createTestClock,
  T0,
  HOUR,
  DAY,
  WEEK,
  PERIOD,
  type TestClock,
} from './helpers.js';

const config = validateConfig({
  period: '6w',
  renewAt: '1w',
  publicBaseUrl: 'https://accounts.example.test',
  appName: 'Example',
});

describe('AccountValidityService', () => {
  let clock: TestClock;
  let store: MemoryValidityStore;
  let mailer: ReturnType<typeof createMockMailer>;
  let validity: AccountValidityModule;

  beforeEach(() => {
    clock = createTestClock();
    store = new MemoryValidityStore({ period: config.period }, { clock });
    mailer = createMockMailer();
    validity = createAccountValidity({
      config,
      store,
      directory: createMockDirectory({ alice: ['alice@example.test'] }, { alice: 'Alice' }),
      mailer,
      clock,
    });
  });

  it('should take its period from the parsed configuration', () => {
    expect(config.period).toBe(PERIOD);
    expect(config.renewAt).toBe(WEEK);
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // LIFECYCLE
  // ─────────────────────────────────────────────────────────────────────────────

  it('should carry an account through registration, notice, renewal and re-use', async () => {
    const { service, scanner } = validity;

    expect(await service.onRegistration('alice')).toBe(T0 + PERIOD);
    expect(await store.getExpiration('alice')).toBe(T0 + PERIOD);

    clock.set(T0 + PERIOD - WEEK);
    const scan = await scanner.runOnce();
    expect(scan).toMatchObject({ candidates: 1, notified: 1 });

    const token = await store.getRenewalToken('alice');
    expect(token).not.toBeNull();
    expect(mailer.send.mock.calls[0]?.[0].text).toContain(`?token=${token}`);

    clock.advance(HOUR);
    const renewedAt = clock.now();
    const renewed = await service.renew(token ?? '');
    expect(renewed).toEqual({ valid: true, stale: false, expirationTs: renewedAt + PERIOD });
    expect(await store.getRecord('alice')).toMatchObject({ notified: false });

    clock.advance(DAY);
    expect(await service.renew(token ?? '')).toEqual({
      valid: false,
      stale: true,
      expirationTs: renewedAt + PERIOD,
    });

    expect(await service.renew('fake_token')).toEqual({ valid: false, stale: false, expirationTs: 0 });
  });

  it('should give a new registration an expiration within one period', async () => {
    const expirationTs = await validity.service.onRegistration('alice');
    const stored = await store.getExpiration('alice');

    expect(stored).toBe(expirationTs);
    expect(expirationTs).toBeGreaterThan(clock.now());
    expect(expirationTs).toBeLessThanOrEqual(clock.now() + PERIOD);
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // ADMIN & ON-DEMAND
  // ─────────────────────────────────────────────────────────────────────────────

  describe('adminSetValidity', () => {
    it('should default to now + period with renewal e-mails enabled', async () => {
      const expirationTs = await validity.service.adminSetValidity({ accountId: 'alice' });

      expect(expirationTs).toBe(T0 + PERIOD);
      expect(await store.getRecord('alice')).toMatchObject({ notified: false, renewalToken: null });
    });

    it('should suppress renewal e-mails when asked to', async () => {
      await validity.service.adminSetValidity({
        accountId: 'alice',
        expirationTs: T0 + DAY,
        enableRenewalEmails: false,
      });

      expect(await store.getRecord('alice')).toMatchObject({ expirationTs: T0 + DAY, notified: true });
      expect((await validity.scanner.runOnce()).candidates).toBe(0);
    });

    it('should void a token that was already mailed', async () => {
      await validity.service.onRegistration('alice');
      await validity.service.sendRenewalEmail('alice');
      const token = await store.getRenewalToken('alice');

      await validity.service.adminSetValidity({ accountId: 'alice', expirationTs: T0 + 2 * PERIOD });

      expect(await validity.service.renew(token ?? '')).toEqual({ valid: false, stale: false, expirationTs: 0 });
    });
  });

  describe('sendRenewalEmail', () => {
    it('should reject an untracked account', async () => {
      await expect(validity.service.sendRenewalEmail('ghost')).rejects.toMatchObject({
        code: 'MISSING_EXPIRATION',
      });
    });
  });

  describe('isExpired', () => {
    it('should follow the clock', async () => {
      await validity.service.onRegistration('alice');

      expect(await validity.service.isExpired('alice')).toBe(false);
      clock.set(T0 + PERIOD + 1);
      expect(await validity.service.isExpired('alice')).toBe(true);
      expect(await validity.service.isExpired('ghost')).toBeNull();
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// COMPOSITION
// ─────────────────────────────────────────────────────────────────────────────────

describe('createValidityStore', () => {
  it('should use Redis when a client is given', () => {
    expect(createValidityStore(config, { redis: new ScriptedRedis() })).toBeInstanceOf(RedisValidityStore);
    expect(createValidityStore(config)).toBeInstanceOf(MemoryValidityStore);
  });
});

describe('createAccountValidity', () => {
  it('should populate missing records and stop cleanly', async () => {
    const clock = createTestClock();
    const store = createValidityStore(config, {
      accountSource: createAccountSource(['alice', 'bob', 'carol']),
      clock,
      random: () => 0,
    });
    const validity = createAccountValidity({
      config: { ...config, populateBatchSize: 2 },
      store,
      directory: createMockDirectory({}),
      mailer: createMockMailer(),
      clock,
    });

    expect(await validity.populate()).toEqual({ inserted: 3, batches: 2, interrupted: false });
    expect(await store.getExpiration('carol')).toBe(T0 + PERIOD);

    await validity.stop();
    expect(validity.scanner.isRunning()).toBe(false);
  });

  it('should interrupt population once stopped', async () => {
    const store = createValidityStore(config, {
      accountSource: createAccountSource(['alice', 'bob', 'carol']),
      clock: createTestClock(),
    });
    const validity = createAccountValidity({
      config: { ...config, populateBatchSize: 1 },
      store,
      directory: createMockDirectory({}),
      mailer: createMockMailer(),
    });

    await validity.stop();

    expect(await validity.populate()).toEqual({ inserted: 0, batches: 0, interrupted: true });
  });
});
