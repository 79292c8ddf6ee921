// ═══════════════════════════════════════════════════════════════════════════════
// SHUTDOWN GUARD — Refuse New Requests Once Shutdown Has Started
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { shouldAcceptRequests } from '../../infrastructure/shutdown/index.js';
import { ApiError } from './error-handler.js';

export class ServiceUnavailableError extends ApiError {
  constructor(message = 'Service is shutting down') {
    super(message, 503, 'SERVICE_UNAVAILABLE');
    this.name = 'ServiceUnavailableError';
  }
}

/**
 * Requests arriving after shutdown began get 503 and a `Connection: close`
 * so keep-alive clients move to another instance.
 */
export function shutdownGuard(_req: Request, res: Response, next: NextFunction): void {
  if (shouldAcceptRequests()) {
    next();
    return;
  }

  res.setHeader('Connection', 'close');
  next(new ServiceUnavailableError());
}
