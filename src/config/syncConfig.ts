import { promises as fs } from 'fs';
import path from 'path';
import { ConfigError, describeError, isErrnoException } from '../errors/syncErrors.js';
import { parseEnvFile } from '../utils/envParser.js';
import { log } from '../utils/logger.js';

export type TransferKind = 'rsync' | 'local';

/**
 * Settings for one sync invocation
 * Loaded once from the process environment merged with an optional `.env` file
 */
export interface SyncConfig {
  // Tree roots
  localRoot: string;
  remoteRoot?: string;

  // Rule set files (defaults to the shipped rules/ files when absent)
  rules: {
    push?: string;
    pull?: string;
  };

  // Transfer primitive selection
  transfer: {
    kind: TransferKind;
    rsyncPath: string;
    /** Added to every rsync invocation, e.g. --compress */
    rsyncArgs: string[];
  };

  // Reload notification endpoint
  reload: {
    url: string;
    token?: string;
    timeoutMs: number;
  };
}

export interface LoadConfigOptions {
  /** Base environment (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Path of the env file; a missing file is not an error */
  envFile?: string;
  /** Directory relative paths resolve against (defaults to process.cwd()) */
  cwd?: string;
}

export const DEFAULT_RELOAD_URL = 'http://homeassistant.local:8123';
export const DEFAULT_RELOAD_TIMEOUT_MS = 30_000;
export const DEFAULT_ENV_FILE = '.env';

/**
 * Load configuration from the environment and the env file.
 * Values from the env file take precedence over the inherited environment.
 *
 * @throws ConfigError on unreadable env file or invalid setting
 */
export async function loadSyncConfig(options: LoadConfigOptions = {}): Promise<SyncConfig> {
  const cwd = options.cwd ?? process.cwd();
  const envFile = path.resolve(cwd, options.envFile ?? DEFAULT_ENV_FILE);

  const fileValues = await readEnvFile(envFile);
  const values: Record<string, string | undefined> = {
    ...(options.env ?? process.env),
    ...fileValues
  };

  return buildSyncConfig(values, cwd);
}

/**
 * Build and validate configuration from an already merged key/value source
 */
export function buildSyncConfig(values: Record<string, string | undefined>, cwd: string): SyncConfig {
  const setting = (key: string): string | undefined => {
    const value = values[key]?.trim();
    return value ? value : undefined;
  };

  const url = (setting('HA_URL') ?? DEFAULT_RELOAD_URL).replace(/\/+$/, '');
  if (!/^https?:\/\/[^/\s]+/.test(url)) {
    throw new ConfigError(`Invalid HA_URL: expected http(s) URL, got "${url}"`, { key: 'HA_URL' });
  }

  const transferKind = setting('SYNC_TRANSFER') ?? 'rsync';
  if (transferKind !== 'rsync' && transferKind !== 'local') {
    throw new ConfigError(`Invalid SYNC_TRANSFER: expected "rsync" or "local", got "${transferKind}"`, {
      key: 'SYNC_TRANSFER'
    });
  }

  const timeoutSetting = setting('SYNC_RELOAD_TIMEOUT_MS');
  let timeoutMs = DEFAULT_RELOAD_TIMEOUT_MS;
  if (timeoutSetting !== undefined) {
    if (!/^\d+$/.test(timeoutSetting) || parseInt(timeoutSetting, 10) === 0) {
      throw new ConfigError(
        `Invalid SYNC_RELOAD_TIMEOUT_MS: expected positive integer, got "${timeoutSetting}"`,
        { key: 'SYNC_RELOAD_TIMEOUT_MS' }
      );
    }
    timeoutMs = parseInt(timeoutSetting, 10);
  }

  const rsyncArgs = setting('SYNC_RSYNC_ARGS')?.split(/\s+/) ?? [];
  const positional = rsyncArgs.find(arg => !arg.startsWith('-'));
  if (positional !== undefined) {
    throw new ConfigError(
      `Invalid SYNC_RSYNC_ARGS: expected options only, got "${positional}"`,
      { key: 'SYNC_RSYNC_ARGS' }
    );
  }

  const resolvePath = (value: string | undefined): string | undefined =>
    value === undefined ? undefined : path.resolve(cwd, value);

  return {
    localRoot: resolvePath(setting('SYNC_LOCAL_ROOT')) ?? cwd,
    remoteRoot: resolvePath(setting('SYNC_REMOTE_ROOT')),
    rules: {
      push: resolvePath(setting('SYNC_PUSH_RULES')),
      pull: resolvePath(setting('SYNC_PULL_RULES'))
    },
    transfer: {
      kind: transferKind,
      rsyncPath: setting('SYNC_RSYNC_PATH') ?? 'rsync',
      rsyncArgs
    },
    reload: {
      url,
      token: setting('HA_TOKEN'),
      timeoutMs
    }
  };
}

/**
 * Return the reload credential or fail before any network call is attempted
 */
export function requireReloadToken(config: SyncConfig): string {
  if (!config.reload.token) {
    throw new ConfigError(
      'HA_TOKEN not found in environment or .env file. ' +
      'Create a .env file with: HA_TOKEN=<long-lived access token from your profile page>',
      { key: 'HA_TOKEN' }
    );
  }
  return config.reload.token;
}

/**
 * Return the remote root or fail with a configuration error
 */
export function requireRemoteRoot(config: SyncConfig): string {
  if (!config.remoteRoot) {
    throw new ConfigError(
      'Remote root not configured. Set SYNC_REMOTE_ROOT or pass --remote <dir>.',
      { key: 'SYNC_REMOTE_ROOT' }
    );
  }
  return config.remoteRoot;
}

async function readEnvFile(envFile: string): Promise<Record<string, string>> {
  try {
    const content = await fs.readFile(envFile, 'utf-8');
    log.debug(`[CONFIG] Loaded ${envFile}`);
    return parseEnvFile(content);
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return {};
    }
    throw new ConfigError(`Cannot read env file ${envFile}: ${describeError(error)}`, { envFile });
  }
}
