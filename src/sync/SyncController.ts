/**
 * SyncController - Drives push and pull
 *
 * Both directions run the same pipeline with different roles and rules:
 *   scan source → scan destination → plan → apply
 *
 * - push: local → remote under the push rules; on a fully applied push the
 *   instance is asked to reload its configuration
 * - pull: remote → local under the pull rules
 *
 * Sequential, single session: no locking against other syncs of the same
 * destination, no resume of a partially applied plan, no retries.
 */

import { log } from '../utils/logger.js';
import { RuleSet, SyncDirection, loadRuleSet, loadDefaultRuleSet } from '../rules/RuleSet.js';
import { TreeScanner } from './TreeScanner.js';
import { SyncPlan, SyncPlanner } from './SyncPlanner.js';
import { SyncExecutor, SyncResult } from './SyncExecutor.js';
import { ReloadClient, ReloadReport } from '../reload/ReloadClient.js';
import { SyncConfig } from '../config/syncConfig.js';
import { RsyncTransfer } from '../transfer/RsyncTransfer.js';
import { LocalTransfer } from '../transfer/LocalTransfer.js';
import type { TransferPrimitive } from '../transfer/TransferPrimitive.js';

export interface SyncControllerOptions {
  pushRules: RuleSet;
  pullRules: RuleSet;
  transfer: TransferPrimitive;
  scanner?: TreeScanner;
  executor?: SyncExecutor;
  /** Notified after a successful push; no reload when absent */
  reloadClient?: ReloadClient;
}

export interface SyncRunOptions {
  /** Compute and return the plan without applying it */
  dryRun?: boolean;
}

export interface PushOptions extends SyncRunOptions {
  /** Set to false to skip the reload notification */
  reload?: boolean;
}

export interface SyncOutcome {
  direction: SyncDirection;
  sourceRoot: string;
  destRoot: string;
  plan: SyncPlan;
  /** Absent on a dry run */
  result?: SyncResult;
}

export interface PushOutcome extends SyncOutcome {
  /** Present when a reload was attempted */
  reload?: ReloadReport;
}

export interface ControllerFactoryOptions {
  /** Build a reload client (requires the reload token) */
  reload: boolean;
}

/**
 * SyncController class for direction-aware syncs
 */
export class SyncController {
  private readonly pushRules: RuleSet;
  private readonly pullRules: RuleSet;
  /** Mechanism every plan is applied through */
  readonly transfer: TransferPrimitive;
  private readonly scanner: TreeScanner;
  private readonly executor: SyncExecutor;
  private readonly reloadClient?: ReloadClient;

  constructor(options: SyncControllerOptions) {
    this.pushRules = options.pushRules;
    this.pullRules = options.pullRules;
    this.transfer = options.transfer;
    this.scanner = options.scanner ?? new TreeScanner();
    this.executor = options.executor ?? new SyncExecutor();
    this.reloadClient = options.reloadClient;
  }

  /**
   * Create a controller from configuration: rule files, transfer kind and,
   * when requested, the reload client.
   *
   * @throws ConfigError on invalid rules or missing reload token
   */
  static async fromConfig(config: SyncConfig, options: ControllerFactoryOptions): Promise<SyncController> {
    // Credential check first: nothing is read or written without it
    const reloadClient = options.reload ? ReloadClient.fromConfig(config) : undefined;

    const [pushRules, pullRules] = await Promise.all([
      config.rules.push ? loadRuleSet(config.rules.push) : loadDefaultRuleSet('push'),
      config.rules.pull ? loadRuleSet(config.rules.pull) : loadDefaultRuleSet('pull'),
    ]);

    const transfer: TransferPrimitive = config.transfer.kind === 'local'
      ? new LocalTransfer()
      : new RsyncTransfer({
        rsyncPath: config.transfer.rsyncPath,
        extraArgs: config.transfer.rsyncArgs
      });

    return new SyncController({ pushRules, pullRules, transfer, reloadClient });
  }

  /**
   * Push the local authoring tree to the live instance
   */
  async push(localRoot: string, remoteRoot: string, options: PushOptions = {}): Promise<PushOutcome> {
    const outcome: PushOutcome = await this.run('push', localRoot, remoteRoot, this.pushRules, options);

    if (!outcome.result || options.reload === false || !this.reloadClient) {
      return outcome;
    }

    if (!outcome.result.success) {
      log.warn(`[CONTROLLER] Skipping reload: ${outcome.result.failedPaths.length} path(s) failed to transfer`);
      return outcome;
    }

    outcome.reload = await this.reloadClient.reloadAll();
    return outcome;
  }

  /**
   * Pull the live instance's tree into the local authoring tree
   */
  async pull(remoteRoot: string, localRoot: string, options: SyncRunOptions = {}): Promise<SyncOutcome> {
    return this.run('pull', remoteRoot, localRoot, this.pullRules, options);
  }

  /**
   * Rule set used for a direction
   */
  rulesFor(direction: SyncDirection): RuleSet {
    return direction === 'push' ? this.pushRules : this.pullRules;
  }

  private async run(
    direction: SyncDirection,
    sourceRoot: string,
    destRoot: string,
    rules: RuleSet,
    options: SyncRunOptions
  ): Promise<SyncOutcome> {
    log.info(`[CONTROLLER] ${direction}: ${sourceRoot} -> ${destRoot}${options.dryRun ? ' (dry run)' : ''}`);

    const source = await this.scanner.scan(sourceRoot);
    const dest = await this.scanner.scan(destRoot, { allowMissing: true });
    const plan = SyncPlanner.plan(source, dest, rules, direction);

    if (options.dryRun) {
      return { direction, sourceRoot, destRoot, plan };
    }

    const result = await this.executor.apply(plan, sourceRoot, destRoot, this.transfer);
    return { direction, sourceRoot, destRoot, plan, result };
  }
}
