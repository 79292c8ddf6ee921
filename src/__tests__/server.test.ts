// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STARTUP TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach } from 'vitest';

const redisClient = vi.hoisted(() => ({
  connect: vi.fn(async () => undefined),
  quit: vi.fn(async () => 'OK'),
}));

vi.mock('../infrastructure/redis/index.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../infrastructure/redis/index.js')>();
  return { ...actual, createRedisClient: vi.fn(() => redisClient) };
});

import { startServer } from '../server.js';
import { validateConfig } from '../config/index.js';
import { clearShutdownHooks } from '../infrastructure/shutdown/index.js';

const config = validateConfig({
  period: '6w',
  renewAt: '1w',
  publicBaseUrl: 'https://accounts.example.test',
  populateOnStart: false,
});

describe('startServer', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clearShutdownHooks();
  });

  it('should quit Redis when the HTTP server cannot listen', async () => {
    await expect(startServer({
      directory: { getEmailAddresses: async () => [], getDisplayName: async () => null },
      mailer: { send: async () => true },
      resolveRequester: async () => null,
      config: { ...config, server: { port: 70000 } },
    })).rejects.toMatchObject({ code: 'ERR_SOCKET_BAD_PORT' });

    expect(redisClient.connect).toHaveBeenCalledTimes(1);
    expect(redisClient.quit).toHaveBeenCalledTimes(1);
  });
});
