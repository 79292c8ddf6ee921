// ═══════════════════════════════════════════════════════════════════════════════
// ACCOUNT VALIDITY — Composition and Exports
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   const validity = createAccountValidity({ config, store, directory, mailer });
//   validity.scanner.start();
//   void validity.populate();   // background backfill
//   ...
//   await validity.stop();
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { AccountValidityConfig } from '../../config/index.js';
import type { RedisCommandClient } from '../../infrastructure/redis/index.js';
import { RenewalEngine, type RenewalEngineDeps } from './engine.js';
import { RenewalNotifier } from './notifier.js';
import { ExpiryScanner } from './scanner.js';
import { AccountValidityService } from './service.js';
import { populateMissingRecords, type PopulateResult } from './migration.js';
import {
  MemoryValidityStore,
  RedisValidityStore,
  type ValidityStore,
  type RandomSource,
} from './store/index.js';
import {
  systemClock,
  type AccountDirectory,
  type AccountSource,
  type Clock,
  type Mailer,
} from './types.js';

// ─────────────────────────────────────────────────────────────────────────────────
// STORE FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

export interface CreateStoreOptions {
  /** Redis connection; the in-memory store is used when absent */
  redis?: RedisCommandClient;
  accountSource?: AccountSource;
  clock?: Clock;
  random?: RandomSource;
}

export function createValidityStore(
  config: AccountValidityConfig,
  options: CreateStoreOptions = {}
): ValidityStore {
  const deps = {
    clock: options.clock ?? systemClock,
    accountSource: options.accountSource,
    random: options.random,
  };

  if (options.redis) {
    return new RedisValidityStore(options.redis, {
      period: config.period,
      keyPrefix: config.redis.keyPrefix,
      cacheMaxEntries: config.cacheMaxEntries,
    }, deps);
  }

  return new MemoryValidityStore({
    period: config.period,
    cacheMaxEntries: config.cacheMaxEntries,
  }, deps);
}

// ─────────────────────────────────────────────────────────────────────────────────
// MODULE
// ─────────────────────────────────────────────────────────────────────────────────

export interface AccountValidityOptions {
  config: AccountValidityConfig;
  store: ValidityStore;
  directory: AccountDirectory;
  mailer: Mailer;
  clock?: Clock;
  generateToken?: RenewalEngineDeps['generateToken'];
}

export interface AccountValidityModule {
  readonly store: ValidityStore;
  readonly engine: RenewalEngine;
  readonly notifier: RenewalNotifier;
  readonly scanner: ExpiryScanner;
  readonly service: AccountValidityService;

  /** Run the bootstrap migration to completion or until `stop()` */
  populate(): Promise<PopulateResult>;

  /** Stop scanning and migration, waiting for work in flight */
  stop(): Promise<void>;
}

export function createAccountValidity(options: AccountValidityOptions): AccountValidityModule {
  const { config, store, directory, mailer } = options;
  const clock = options.clock ?? systemClock;

  const engine = new RenewalEngine(store, {
    period: config.period,
    maxTokenAttempts: config.maxTokenAttempts,
  }, { clock, generateToken: options.generateToken });

  const notifier = new RenewalNotifier(store, engine, directory, mailer, {
    sendLinks: config.sendLinks,
    appName: config.appName,
    renewEmailSubject: config.renewEmailSubject,
    publicBaseUrl: config.publicBaseUrl,
    renewPath: config.renewPath,
  });

  const scanner = new ExpiryScanner(store, notifier, {
    intervalMs: config.scanInterval,
    renewAt: config.renewAt,
  });

  const service = new AccountValidityService(store, engine, notifier);

  let stopping = false;
  let population: Promise<PopulateResult> | null = null;

  return {
    store,
    engine,
    notifier,
    scanner,
    service,

    populate(): Promise<PopulateResult> {
      if (!population) {
        population = populateMissingRecords(store, {
          batchSize: config.populateBatchSize,
          shouldContinue: () => !stopping,
        }).finally(() => {
          population = null;
        });
      }
      return population;
    },

    async stop(): Promise<void> {
      stopping = true;
      await scanner.stop();
      if (population) {
        await population;
      }
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export * from './types.js';
export * from './tokens.js';
export { ExpirationCache, type ExpirationCacheConfig } from './cache.js';
export { RenewalEngine, type RenewalEngineConfig, type ExtendOptions } from './engine.js';
export { RenewalNotifier, type RenewalNotifierConfig } from './notifier.js';
export {
  buildRenewalMessage,
  buildRenewalUrl,
  buildRenewalPage,
  type RenewalMessage,
  type RenewalPage,
} from './message.js';
export { ExpiryScanner, type ExpiryScannerConfig, type ScanResult } from './scanner.js';
export { populateMissingRecords, type PopulateOptions, type PopulateResult } from './migration.js';
export { AccountValidityService, type AdminValidityRequest } from './service.js';
export * from './store/index.js';
