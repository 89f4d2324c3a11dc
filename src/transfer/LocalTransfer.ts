/**
 * LocalTransfer - In-process transfer between two mounted trees
 *
 * Reads the native filter rules back into a rule set and mirrors the source
 * tree onto the destination with plain fs calls. Each entry is applied on its
 * own; a failing entry is recorded and the rest continue, and the outcome
 * reports exit code 23 as rsync does for a partial transfer.
 */

import { promises as fs, Stats } from 'fs';
import path from 'path';
import { log } from '../utils/logger.js';
import { describeError, isErrnoException } from '../errors/syncErrors.js';
import { RuleSet } from '../rules/RuleSet.js';
import { TreeScanner } from '../sync/TreeScanner.js';
import { PlanEntry, SyncPlanner } from '../sync/SyncPlanner.js';
import {
  EXIT_PARTIAL_TRANSFER,
  TransferOutcome,
  TransferPrimitive,
  TransferRequest
} from './TransferPrimitive.js';

/**
 * LocalTransfer class for filesystem-to-filesystem mirroring
 */
export class LocalTransfer implements TransferPrimitive {
  readonly name = 'local';

  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    const { sourceRoot, destRoot, mirror, checksum } = request;

    // No filter rules means nothing is excluded
    const rules = request.filterRules.length > 0
      ? RuleSet.fromFilterLines(request.filterRules)
      : RuleSet.parse('+ **', '<allow-all>');

    const scanner = new TreeScanner({ fingerprint: checksum ? 'checksum' : 'size-mtime' });
    const source = await scanner.scan(sourceRoot);
    const dest = await scanner.scan(destRoot, { allowMissing: true });
    const plan = SyncPlanner.plan(source, dest, rules);

    await fs.mkdir(destRoot, { recursive: true });

    const failedPaths: string[] = [];
    const output: string[] = [];

    for (const entry of SyncPlanner.changes(plan)) {
      if (entry.action === 'delete' && !mirror) {
        continue;
      }

      try {
        await this.applyEntry(entry, sourceRoot, destRoot);
        output.push(`${entry.action === 'delete' ? '*deleting' : '>copy'} ${entry.path}${entry.kind === 'dir' ? '/' : ''}`);
      } catch (error) {
        failedPaths.push(entry.path);
        output.push(`failed to ${entry.action} "${entry.path}": ${describeError(error)}`);
        log.warn(`[LOCAL] Failed to ${entry.action} ${entry.path}: ${describeError(error)}`);
      }
    }

    return {
      exitCode: failedPaths.length > 0 ? EXIT_PARTIAL_TRANSFER : 0,
      failedPaths,
      output: output.join('\n')
    };
  }

  private async applyEntry(entry: PlanEntry, sourceRoot: string, destRoot: string): Promise<void> {
    const target = path.join(destRoot, ...entry.path.split('/'));

    if (entry.action === 'delete') {
      await removeEntry(target);
      log.debug(`[LOCAL] Deleted: ${entry.path}`);
      return;
    }

    const existing = await lstatOrNull(target);

    if (entry.kind === 'dir') {
      if (existing && !existing.isDirectory()) {
        await fs.unlink(target);
      }
      await fs.mkdir(target, { recursive: true });
      return;
    }

    // Replace whatever sits at the target; never write through a link
    if (existing) {
      await removeEntry(target);
    }

    const sourcePath = path.join(sourceRoot, ...entry.path.split('/'));
    const sourceStats = await fs.stat(sourcePath);

    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.copyFile(sourcePath, target);
    await fs.utimes(target, sourceStats.atime, sourceStats.mtime);

    log.debug(`[LOCAL] Copied: ${entry.path}`);
  }
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file, link or empty directory (children are removed first by plan order)
 */
async function removeEntry(target: string): Promise<void> {
  const stats = await fs.lstat(target);
  if (stats.isDirectory()) {
    await fs.rmdir(target);
  } else {
    await fs.unlink(target);
  }
}
