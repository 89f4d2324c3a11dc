import { loadSyncConfig, requireRemoteRoot, SyncConfig, TransferKind } from './config/syncConfig.js';
import { ConfigError, SyncError, describeError } from './errors/syncErrors.js';
import { loadDefaultRuleSet, loadRuleSet, SyncDirection } from './rules/RuleSet.js';
import { SyncController, PushOutcome } from './sync/SyncController.js';
import { SyncPlanner } from './sync/SyncPlanner.js';
import { ReloadClient, ReloadReport } from './reload/ReloadClient.js';

export type CliCommand = 'push' | 'pull' | 'plan-push' | 'plan-pull' | 'reload' | 'rules';

const COMMANDS: readonly CliCommand[] = ['push', 'pull', 'plan-push', 'plan-pull', 'reload', 'rules'];

export interface CliArgs {
  command?: CliCommand;
  /** Direction argument of the rules command */
  direction?: SyncDirection;
  local?: string;
  remote?: string;
  envFile?: string;
  transfer?: TransferKind;
  reload: boolean;
  dryRun: boolean;
  help: boolean;
}

export interface CliIO {
  out: (line: string) => void;
}

export const USAGE = `Usage: ha-config-sync <command> [options]

Commands:
  push              Push the local tree to the instance, then reload it
  pull              Pull the instance tree into the local tree
  plan-push         Show what push would change
  plan-pull         Show what pull would change
  reload            Reload the instance configuration only
  rules <push|pull> Print the filter rules handed to the transfer tool

Options:
  --local <dir>             Local tree (default: SYNC_LOCAL_ROOT or cwd)
  --remote <dir>            Mounted instance tree (default: SYNC_REMOTE_ROOT)
  --env <file>              Env file with HA_URL / HA_TOKEN (default: .env)
  --transfer <rsync|local>  Transfer mechanism (default: SYNC_TRANSFER or rsync)
  --no-reload               Do not reload the instance after push
  --dry-run                 Plan only, change nothing
  -h, --help                Show this help`;

/**
 * Parse command line arguments
 *
 * @throws ConfigError on unknown command or option
 */
export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { reload: true, dryRun: false, help: false };

  const takeValue = (option: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--local':
        result.local = takeValue(arg, i);
        i++;
        break;
      case '--remote':
        result.remote = takeValue(arg, i);
        i++;
        break;
      case '--env':
        result.envFile = takeValue(arg, i);
        i++;
        break;
      case '--transfer': {
        const value = takeValue(arg, i);
        if (value !== 'rsync' && value !== 'local') {
          throw new ConfigError(`--transfer expects rsync or local, got "${value}"`);
        }
        result.transfer = value;
        i++;
        break;
      }
      case '--no-reload':
        result.reload = false;
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new ConfigError(`Unknown option: ${arg}`);
        }
        if (!result.command) {
          const command = toCommand(arg);
          if (!command) {
            throw new ConfigError(`Unknown command: ${arg}`);
          }
          result.command = command;
        } else if (result.command === 'rules' && !result.direction && (arg === 'push' || arg === 'pull')) {
          result.direction = arg;
        } else {
          throw new ConfigError(`Unexpected argument: ${arg}`);
        }
    }
  }

  if (result.command === 'rules' && !result.direction && !result.help) {
    throw new ConfigError('rules requires a direction: push or pull');
  }

  return result;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIO = { out: line => console.log(line) }): Promise<number> {
  try {
    const args = parseArgs(argv);

    if (args.help || !args.command) {
      io.out(USAGE);
      return args.help ? 0 : 2;
    }

    const config = applyOverrides(await loadSyncConfig({ envFile: args.envFile }), args);
    return await runCommand(args.command, args, config, io);

  } catch (error) {
    if (error instanceof SyncError) {
      io.out(`❌ ${error.message}`);
      return error.exitCode;
    }
    io.out(`❌ Unexpected error: ${describeError(error)}`);
    return 1;
  }
}

async function runCommand(command: CliCommand, args: CliArgs, config: SyncConfig, io: CliIO): Promise<number> {
  switch (command) {
    case 'reload': {
      const report = await ReloadClient.fromConfig(config).reloadAll();
      printReload(report, io);
      return report.success ? 0 : 1;
    }

    case 'rules': {
      const direction = args.direction ?? 'push';
      const configured = config.rules[direction];
      const ruleSet = configured ? await loadRuleSet(configured) : await loadDefaultRuleSet(direction);
      ruleSet.toFilterLines().forEach(line => io.out(line));
      return 0;
    }

    case 'push':
    case 'plan-push': {
      const dryRun = args.dryRun || command === 'plan-push';
      const remoteRoot = requireRemoteRoot(config);
      const controller = await SyncController.fromConfig(config, { reload: args.reload && !dryRun });
      const outcome = await controller.push(config.localRoot, remoteRoot, { dryRun, reload: args.reload });
      return printOutcome(outcome, io);
    }

    case 'pull':
    case 'plan-pull': {
      const dryRun = args.dryRun || command === 'plan-pull';
      const remoteRoot = requireRemoteRoot(config);
      const controller = await SyncController.fromConfig(config, { reload: false });
      const outcome = await controller.pull(remoteRoot, config.localRoot, { dryRun });
      return printOutcome(outcome, io);
    }
  }
}

function applyOverrides(config: SyncConfig, args: CliArgs): SyncConfig {
  return {
    ...config,
    localRoot: args.local ?? config.localRoot,
    remoteRoot: args.remote ?? config.remoteRoot,
    transfer: {
      ...config.transfer,
      kind: args.transfer ?? config.transfer.kind
    }
  };
}

function printOutcome(outcome: PushOutcome, io: CliIO): number {
  const { plan, result } = outcome;
  io.out(`📋 ${outcome.direction}: ${SyncPlanner.formatSummary(plan)}`);

  if (!result) {
    for (const entry of SyncPlanner.changes(plan)) {
      io.out(`  ${entry.action === 'copy' ? '+' : '-'} ${entry.path}${entry.kind === 'dir' ? '/' : ''}`);
    }
    return 0;
  }

  let exitCode = 0;

  if (result.success) {
    io.out(`✅ ${outcome.direction} complete: ${result.copied.length} copied, ${result.deleted.length} deleted`);
  } else {
    io.out(`❌ ${outcome.direction} incomplete: ${result.failedPaths.length} path(s) failed`);
    result.failedPaths.forEach(failedPath => io.out(`   ${failedPath}`));
    exitCode = 1;
  }

  if (outcome.reload) {
    printReload(outcome.reload, io);
    if (!outcome.reload.success) {
      exitCode = 1;
    }
  }

  return exitCode;
}

function printReload(report: ReloadReport, io: CliIO): void {
  for (const result of report.results) {
    if (result.success) {
      io.out(`✅ ${capitalize(result.name)} reloaded`);
    } else {
      io.out(`❌ Failed to reload ${result.name}: ${result.message ?? result.failure ?? 'unknown error'}`);
    }
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function toCommand(value: string): CliCommand | undefined {
  return COMMANDS.find(command => command === value);
}
