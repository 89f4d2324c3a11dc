/**
 * SyncExecutor - Applies a sync plan through a transfer primitive
 *
 * Receives a computed plan and hands it to the transfer primitive in a
 * single call:
 * - mirroring enabled (extraneous destination entries removed)
 * - content checksum comparison enabled
 * - filter rules taken from the plan (derived from the same rule set the
 *   planner used)
 *
 * Outcome mapping:
 * - exit 0 → success
 * - non-zero with failed paths → SyncResult with success=false (no retry)
 * - non-zero without detail → TransferError
 */

import { log } from '../utils/logger.js';
import { SyncError, TransferError, describeError } from '../errors/syncErrors.js';
import { SyncPlan, SyncPlanner } from './SyncPlanner.js';
import type { TransferOutcome, TransferPrimitive } from '../transfer/TransferPrimitive.js';

/**
 * Result of applying a plan
 */
export interface SyncResult {
  success: boolean;
  /** False when the plan held no changes and the transfer was not invoked */
  transferred: boolean;
  copied: string[];
  deleted: string[];
  skipped: number;
  failedPaths: string[];
  output: string;
}

/**
 * SyncExecutor class for applying sync plans
 */
export class SyncExecutor {
  /**
   * Apply a plan
   *
   * @param plan - Plan from SyncPlanner.plan()
   * @param sourceRoot - Tree the plan copies from
   * @param destRoot - Tree the plan mutates
   * @param transfer - Transfer primitive performing the work
   * @throws TransferError when the transfer fails without per-path detail
   */
  async apply(
    plan: SyncPlan,
    sourceRoot: string,
    destRoot: string,
    transfer: TransferPrimitive
  ): Promise<SyncResult> {
    const summary = SyncPlanner.summarize(plan);
    const changes = SyncPlanner.changes(plan);

    if (!summary.hasChanges) {
      log.info(`[EXECUTOR] Nothing to apply (${summary.skip} entries skipped)`);
      return {
        success: true,
        transferred: false,
        copied: [],
        deleted: [],
        skipped: summary.skip,
        failedPaths: [],
        output: ''
      };
    }

    log.info(`[EXECUTOR] Applying via ${transfer.name}: +${summary.copy} -${summary.delete}`);

    let outcome: TransferOutcome;
    try {
      outcome = await transfer.transfer({
        sourceRoot,
        destRoot,
        filterRules: plan.filterRules,
        mirror: true,
        checksum: true
      });
    } catch (error) {
      // Scan failures inside an in-process transfer keep their own type
      if (error instanceof SyncError) {
        throw error;
      }
      log.error(`[EXECUTOR] Unexpected transfer error:`, error);
      throw new TransferError(`Transfer via ${transfer.name} failed: ${describeError(error)}`);
    }

    if (outcome.exitCode !== 0 && outcome.failedPaths.length === 0) {
      throw new TransferError(
        `Transfer via ${transfer.name} exited with code ${outcome.exitCode}`,
        outcome.exitCode,
        outcome.output
      );
    }

    const failed = new Set(outcome.failedPaths);
    const result: SyncResult = {
      success: outcome.exitCode === 0,
      transferred: true,
      copied: changes.filter(e => e.action === 'copy' && !failed.has(e.path)).map(e => e.path),
      deleted: changes.filter(e => e.action === 'delete' && !failed.has(e.path)).map(e => e.path),
      skipped: summary.skip,
      failedPaths: [...outcome.failedPaths],
      output: outcome.output
    };

    if (result.success) {
      log.info(`[EXECUTOR] Sync complete: +${result.copied.length} -${result.deleted.length}`);
    } else {
      log.warn(`[EXECUTOR] Partial transfer: ${result.failedPaths.length} path(s) failed`);
    }

    return result;
  }
}
