// ═══════════════════════════════════════════════════════════════════════════════
// BOOTSTRAP MIGRATION — Backfill Records for Existing Accounts
// ═══════════════════════════════════════════════════════════════════════════════
//
// Runs `bootstrapMissing` batch after batch until a batch comes back short.
// Each batch commits on its own, so the run can stop between batches.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger } from '../../observability/logging/index.js';
import type { ValidityStore } from './store/index.js';

const logger = getLogger({ component: 'migration' });

export interface PopulateOptions {
  /** Accounts per batch */
  batchSize: number;

  /** Checked before each batch; returning false stops the run */
  shouldContinue?: () => boolean;
}

export interface PopulateResult {
  /** Accounts given a record */
  readonly inserted: number;
  readonly batches: number;

  /** The run stopped before the backfill finished */
  readonly interrupted: boolean;
}

export async function populateMissingRecords(
  store: ValidityStore,
  options: PopulateOptions
): Promise<PopulateResult> {
  const { batchSize, shouldContinue = () => true } = options;

  let inserted = 0;
  let batches = 0;

  for (;;) {
    if (!shouldContinue()) {
      logger.info('Bootstrap migration interrupted', { inserted, batches });
      return { inserted, batches, interrupted: true };
    }

    const count = await store.bootstrapMissing(batchSize);
    batches++;
    inserted += count;

    if (count > 0) {
      logger.info('Inserted validity records for existing accounts', { count, total: inserted });
    }

    if (count < batchSize) {
      break;
    }
  }

  logger.info('Bootstrap migration finished', { inserted, batches });
  return { inserted, batches, interrupted: false };
}
