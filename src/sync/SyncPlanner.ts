/**
 * SyncPlanner - Computes the ordered plan for one sync
 *
 * Pure function of (source listing, destination listing, rule set):
 * - source entries not excluded are copied when missing or different
 * - destination-only entries are deleted unless excluded or protected
 * - everything else is skipped, with the reason recorded
 *
 * The plan also captures the rule set in the transfer tool's native filter
 * syntax, so the executor never needs the rule set itself and the transfer
 * cannot drift from what was planned.
 *
 * Read-only: Does not touch either tree.
 */

import { log } from '../utils/logger.js';
import { RuleSet, SyncDirection, EntryKind } from '../rules/RuleSet.js';
import { TreeListing, entriesIdentical } from './TreeScanner.js';

export type SyncAction = 'copy' | 'delete' | 'skip';

/**
 * Why an entry got its action
 */
export type PlanReason =
  | 'missing'              // copy: absent from destination
  | 'changed'              // copy: present but not identical
  | 'extraneous'           // delete: absent from source
  | 'unchanged'            // skip: identical on both sides
  | 'excluded'             // skip: matched an exclude rule
  | 'protected'            // skip: destination-only, matched a protect rule
  | 'retained-descendant'; // skip: destination-only directory holding a kept entry

/**
 * Single entry of a sync plan
 */
export interface PlanEntry {
  path: string;
  kind: EntryKind;
  action: SyncAction;
  reason: PlanReason;
}

/**
 * Complete plan, computed before any mutation
 */
export interface SyncPlan {
  direction?: SyncDirection;
  /** Deletes first (deepest first), then copies/skips (parents first) */
  entries: PlanEntry[];
  /** Rule set in native filter syntax, handed unchanged to the transfer */
  filterRules: string[];
}

export interface PlanSummary {
  copy: number;
  delete: number;
  skip: number;
  totalChanges: number;
  hasChanges: boolean;
  hasDestructiveChanges: boolean;  // True if any deletes
}

/**
 * SyncPlanner class for computing sync plans
 */
export class SyncPlanner {
  /**
   * Compute the plan turning dest into a mirror of source under the rules
   *
   * @param source - Listing of the tree being copied from
   * @param dest - Listing of the tree being made to match
   * @param rules - Rule set of the sync direction
   * @param direction - Recorded on the plan for reporting
   */
  static plan(
    source: TreeListing,
    dest: TreeListing,
    rules: RuleSet,
    direction?: SyncDirection
  ): SyncPlan {
    log.debug(`[PLANNER] Planning${direction ? ` ${direction}` : ''}: ${source.size} source entries, ${dest.size} dest entries, ${rules.rules.length} rules`);

    const decided = new Map<string, PlanEntry>();

    // Source side: copy unless excluded or already identical
    for (const [relPath, sourceEntry] of source) {
      const destEntry = dest.get(relPath);
      const kind = sourceEntry.kind;

      if (rules.classify(relPath, kind) === 'exclude') {
        decided.set(relPath, { path: relPath, kind, action: 'skip', reason: 'excluded' });
      } else if (!destEntry) {
        decided.set(relPath, { path: relPath, kind, action: 'copy', reason: 'missing' });
      } else if (!entriesIdentical(sourceEntry, destEntry)) {
        decided.set(relPath, { path: relPath, kind, action: 'copy', reason: 'changed' });
      } else {
        decided.set(relPath, { path: relPath, kind, action: 'skip', reason: 'unchanged' });
      }
    }

    // Destination side: delete extraneous entries unless excluded or protected
    for (const [relPath, destEntry] of dest) {
      if (source.has(relPath)) {
        continue;
      }

      const kind = destEntry.kind;
      const action = rules.classify(relPath, kind);

      if (action === 'exclude') {
        decided.set(relPath, { path: relPath, kind, action: 'skip', reason: 'excluded' });
      } else if (action === 'protect') {
        decided.set(relPath, { path: relPath, kind, action: 'skip', reason: 'protected' });
      } else {
        decided.set(relPath, { path: relPath, kind, action: 'delete', reason: 'extraneous' });
      }
    }

    // A directory cannot be removed while it still holds a kept entry
    for (const relPath of dest.keys()) {
      const entry = decided.get(relPath);
      if (!entry || entry.action === 'delete') {
        continue;
      }
      for (const ancestor of ancestorsOf(relPath)) {
        const ancestorEntry = decided.get(ancestor);
        if (ancestorEntry?.action === 'delete') {
          decided.set(ancestor, { ...ancestorEntry, action: 'skip', reason: 'retained-descendant' });
          log.debug(`[PLANNER] Keeping ${ancestor}/ (holds ${relPath})`);
        }
      }
    }

    const entries = orderEntries([...decided.values()]);
    const plan: SyncPlan = { direction, entries, filterRules: rules.toFilterLines() };

    log.info(`[PLANNER] ${direction ? `${direction}: ` : ''}${SyncPlanner.formatSummary(plan)}`);
    return plan;
  }

  /**
   * Count entries by action
   */
  static summarize(plan: SyncPlan): PlanSummary {
    const summary: PlanSummary = {
      copy: 0,
      delete: 0,
      skip: 0,
      totalChanges: 0,
      hasChanges: false,
      hasDestructiveChanges: false
    };

    for (const entry of plan.entries) {
      summary[entry.action]++;
    }

    summary.totalChanges = summary.copy + summary.delete;
    summary.hasChanges = summary.totalChanges > 0;
    summary.hasDestructiveChanges = summary.delete > 0;
    return summary;
  }

  /**
   * Create a summary string for display
   */
  static formatSummary(plan: SyncPlan): string {
    const summary = SyncPlanner.summarize(plan);
    if (!summary.hasChanges) {
      return 'No changes detected';
    }

    const parts: string[] = [];

    if (summary.copy > 0) {
      parts.push(`+${summary.copy} copy`);
    }
    if (summary.delete > 0) {
      parts.push(`-${summary.delete} delete`);
    }

    return parts.join(', ') + ` (${summary.totalChanges} total)`;
  }

  /**
   * Entries that change the destination, in application order
   */
  static changes(plan: SyncPlan): PlanEntry[] {
    return plan.entries.filter(entry => entry.action !== 'skip');
  }
}

/**
 * Deletes first, children before parents; then everything else, parents
 * before children. Plain code-unit ordering keeps the result stable.
 */
function orderEntries(entries: PlanEntry[]): PlanEntry[] {
  const deletes = entries.filter(entry => entry.action === 'delete').sort((a, b) => compareCodeUnits(b.path, a.path));
  const rest = entries.filter(entry => entry.action !== 'delete').sort((a, b) => compareCodeUnits(a.path, b.path));
  return [...deletes, ...rest];
}

function compareCodeUnits(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function ancestorsOf(relPath: string): string[] {
  const segments = relPath.split('/');
  const ancestors: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    ancestors.push(segments.slice(0, i).join('/'));
  }
  return ancestors;
}
