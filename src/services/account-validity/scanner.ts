// ═══════════════════════════════════════════════════════════════════════════════
// EXPIRY SCANNER — Periodic Renewal-Window Scan
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every `intervalMs` the scanner selects the accounts that entered their notice
// window and have not been notified yet, and hands each to the notifier.
// Passes never overlap. One account failing does not stop the pass.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../../observability/logging/index.js';
import type { RenewalNotifier } from './notifier.js';
import type { ValidityStore } from './store/index.js';

const logger = getLogger({ component: 'scanner' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ExpiryScannerConfig {
  /** Time between passes (ms) */
  intervalMs: number;

  /** Notice window before expiration (ms) */
  renewAt: number;
}

export const DEFAULT_SCANNER_CONFIG: Pick<ExpiryScannerConfig, 'intervalMs'> = {
  intervalMs: 30 * 60 * 1000,
};

/**
 * Summary of one scan pass.
 */
export interface ScanResult {
  readonly runId: string;

  /** Accounts returned by the window query */
  readonly candidates: number;

  /** Accounts handed to the notifier successfully */
  readonly notified: number;

  /** Accounts skipped for lack of an expiration */
  readonly skipped: number;

  /** Accounts whose notification threw */
  readonly failed: number;

  readonly durationMs: number;
}

// ─────────────────────────────────────────────────────────────────────────────────
// SCANNER
// ─────────────────────────────────────────────────────────────────────────────────

export class ExpiryScanner {
  private readonly config: ExpiryScannerConfig;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ScanResult> | null = null;

  constructor(
    private readonly store: ValidityStore,
    private readonly notifier: RenewalNotifier,
    config: Pick<ExpiryScannerConfig, 'renewAt'> & Partial<ExpiryScannerConfig>
  ) {
    this.config = { ...DEFAULT_SCANNER_CONFIG, ...config };
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.config.intervalMs);
    logger.info('Expiry scanner started', {
      intervalMs: this.config.intervalMs,
      renewAt: this.config.renewAt,
    });
  }

  /**
   * Stop the timer and wait for a pass in progress to finish.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Expiry scanner stopped');
    }

    const running = this.inFlight;
    if (running) {
      try {
        await running;
      } catch (error) {
        logger.warn('Scan in progress at shutdown failed', {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Run one pass now. A call made while a pass is in flight joins that pass.
   */
  runOnce(): Promise<ScanResult> {
    if (this.inFlight) return this.inFlight;

    const run = this.scan().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private tick(): void {
    if (this.inFlight) {
      logger.debug('Previous scan still running, skipping tick');
      return;
    }

    this.runOnce().catch((error: unknown) => {
      logger.error('Expiry scan failed', error);
    });
  }

  private async scan(): Promise<ScanResult> {
    const runId = uuidv4();
    const startedAt = Date.now();
    const log = logger.child({ context: { runId } });

    const candidates = await this.store.listExpiringWithin(this.config.renewAt);

    let notified = 0;
    let skipped = 0;
    let failed = 0;

    for (const { accountId, expirationTs } of candidates) {
      if (expirationTs === null) {
        skipped++;
        log.warn('Account in renewal window has no expiration, skipping', { accountId });
        continue;
      }

      try {
        await this.notifier.sendRenewalEmail(accountId, expirationTs);
        notified++;
      } catch (error) {
        failed++;
        log.error('Renewal notice failed', error, { accountId });
      }
    }

    const result: ScanResult = {
      runId,
      candidates: candidates.length,
      notified,
      skipped,
      failed,
      durationMs: Date.now() - startedAt,
    };

    if (candidates.length > 0) {
      log.info('Expiry scan completed', { ...result });
    } else {
      log.debug('Expiry scan found no accounts');
    }

    return result;
  }
}
