// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN GUARD TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { shutdownGuard, ServiceUnavailableError } from '../middleware/shutdown-guard.js';
import { errorHandler } from '../middleware/error-handler.js';
import {
  clearShutdownHooks,
  configureShutdown,
  initiateShutdown,
  resetShutdownState,
} from '../../infrastructure/shutdown/index.js';
import { createMockRequest, createMockResponse } from './http-mocks.js';

describe('shutdownGuard', () => {
  beforeEach(() => {
    clearShutdownHooks();
    resetShutdownState();
    configureShutdown({ exitProcess: false, timeoutMs: 1000 });
  });

  afterEach(() => {
    clearShutdownHooks();
    resetShutdownState();
  });

  it('should pass requests through while the service runs', () => {
    const next = vi.fn();
    const res = createMockResponse();

    shutdownGuard(createMockRequest(), res, next);

    expect(next).toHaveBeenCalledWith();
    expect(res._headers).toEqual({});
  });

  it('should answer 503 once shutdown has started', async () => {
    await initiateShutdown('test');
    const next = vi.fn();
    const res = createMockResponse();

    shutdownGuard(createMockRequest(), res, next);

    expect(res._headers).toEqual({ Connection: 'close' });
    expect(next).toHaveBeenCalledTimes(1);
    const [error]: unknown[] = next.mock.calls[0] ?? [];
    expect(error).toBeInstanceOf(ServiceUnavailableError);

    errorHandler(error, createMockRequest(), res, vi.fn());

    expect(res._status).toBe(503);
    expect(res._json).toMatchObject({ error: 'Service is shutting down', code: 'SERVICE_UNAVAILABLE' });
  });
});
