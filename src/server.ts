// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — HTTP App and Service Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════
//
// The host process supplies what this service cannot own: the account
// directory, the mailer, the account source for the bootstrap migration and
// request authentication.
//
//   const running = await startServer({ directory, mailer, accountSource, resolveRequester });
//   ...
//   await initiateShutdown('manual');
//
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import type { Server } from 'node:http';
import { loadConfig, type AccountValidityConfig } from './config/index.js';
import { getLogger } from './observability/logging/index.js';
import { createRedisClient } from './infrastructure/redis/index.js';
import {
  registerShutdownHook,
  createServerCloseHook,
  createDisconnectHook,
  installSignalHandlers,
} from './infrastructure/shutdown/index.js';
import {
  createAccountValidityRouter,
  type AccountValidityRouterOptions,
  type ResolveRequester,
} from './api/routes/index.js';
import { errorHandler } from './api/middleware/error-handler.js';
import { shutdownGuard } from './api/middleware/shutdown-guard.js';
import {
  createAccountValidity,
  createValidityStore,
  type AccountValidityModule,
  type AccountDirectory,
  type AccountSource,
  type Mailer,
} from './services/account-validity/index.js';

const logger = getLogger({ component: 'server' });

export const ROUTE_PREFIX = '/account_validity';

// ─────────────────────────────────────────────────────────────────────────────────
// APP
// ─────────────────────────────────────────────────────────────────────────────────

export type AppOptions = AccountValidityRouterOptions;

export function createApp(options: AppOptions): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(shutdownGuard);
  app.use(express.json({ limit: '16kb' }));
  app.use(ROUTE_PREFIX, createAccountValidityRouter(options));
  app.use(errorHandler);

  return app;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STARTUP
// ─────────────────────────────────────────────────────────────────────────────────

export interface HostCollaborators {
  directory: AccountDirectory;
  mailer: Mailer;
  accountSource?: AccountSource;
  resolveRequester: ResolveRequester;

  /** Defaults to `loadConfig()` over process.env */
  config?: AccountValidityConfig;
}

export interface RunningServer {
  readonly config: AccountValidityConfig;
  readonly validity: AccountValidityModule;
  readonly server: Server;
}

function listen(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once('error', reject);
  });
}

/**
 * Connect Redis, start the scanner and the bootstrap migration, listen, and
 * register shutdown hooks.
 */
export async function startServer(host: HostCollaborators): Promise<RunningServer> {
  const config = host.config ?? loadConfig();

  const redis = createRedisClient({ url: config.redis.url });
  await redis.connect();

  const store = createValidityStore(config, { redis, accountSource: host.accountSource });
  const validity = createAccountValidity({
    config,
    store,
    directory: host.directory,
    mailer: host.mailer,
  });

  const app = createApp({
    service: validity.service,
    resolveRequester: host.resolveRequester,
    appName: config.appName,
  });

  let server: Server;
  try {
    server = await listen(app, config.server.port);
  } catch (error) {
    logger.error('HTTP server failed to start', error, { port: config.server.port });
    await redis.quit().catch((quitError: unknown) => {
      logger.warn('Redis quit failed after startup error', { reason: String(quitError) });
    });
    throw error;
  }

  validity.scanner.start();

  if (config.populateOnStart) {
    validity.populate()
      .then((result) => logger.info('Bootstrap migration finished', { ...result }))
      .catch((error: unknown) => logger.error('Bootstrap migration failed', error));
  }

  registerShutdownHook('http-server', createServerCloseHook(server), { priority: 'critical' });
  registerShutdownHook('account-validity', () => validity.stop(), { priority: 'high', timeoutMs: 20000 });
  registerShutdownHook('redis', createDisconnectHook(redis), { priority: 'normal' });
  installSignalHandlers();

  logger.info('Account validity service started', {
    port: config.server.port,
    scanIntervalMs: config.scanInterval,
    sendLinks: config.sendLinks,
  });

  return { config, validity, server };
}
