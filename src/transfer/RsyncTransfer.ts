/**
 * RsyncTransfer - Transfer primitive backed by the rsync binary
 *
 * Writes the plan's filter rules to a temporary merge file and runs:
 *   rsync --archive --copy-links --itemize-changes [--checksum] [--delete]
 *         --filter="merge <file>" <source>/ <dest>/
 *
 * Exit codes 23/24 are partial transfers; the failing paths are recovered
 * from rsync's diagnostics. Any other non-zero exit is returned as-is for
 * the executor to surface.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { log } from '../utils/logger.js';
import { TransferError } from '../errors/syncErrors.js';
import {
  EXIT_PARTIAL_TRANSFER,
  EXIT_VANISHED_SOURCE,
  TransferOutcome,
  TransferPrimitive,
  TransferRequest
} from './TransferPrimitive.js';

/**
 * Child process surface used by the transfer
 */
export interface SpawnedProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
}

export type SpawnFunction = (command: string, args: string[]) => SpawnedProcess;

export interface RsyncTransferOptions {
  /** rsync executable (default: rsync on PATH) */
  rsyncPath?: string;
  /** Extra arguments inserted before the filter rule, e.g. ['--compress'] */
  extraArgs?: string[];
  /** Process spawner, replaceable in tests */
  spawnFn?: SpawnFunction;
}

interface ProcessResult {
  code: number;
  stdout: string;
  stderr: string;
}

const defaultSpawn: SpawnFunction = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * RsyncTransfer class for rsync-based mirroring
 */
export class RsyncTransfer implements TransferPrimitive {
  readonly name = 'rsync';
  private readonly rsyncPath: string;
  private readonly extraArgs: string[];
  private readonly spawnFn: SpawnFunction;

  constructor(options: RsyncTransferOptions = {}) {
    this.rsyncPath = options.rsyncPath ?? 'rsync';
    this.extraArgs = options.extraArgs ?? [];
    this.spawnFn = options.spawnFn ?? defaultSpawn;
  }

  async transfer(request: TransferRequest): Promise<TransferOutcome> {
    const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ha-config-sync-'));
    const filterFile = path.join(tempDir, 'filter.rules');

    try {
      await fs.writeFile(filterFile, request.filterRules.map(line => `${line}\n`).join(''), 'utf-8');

      const args = this.buildArgs(request, filterFile);
      log.debug(`[RSYNC] ${this.rsyncPath} ${args.join(' ')}`);

      const { code, stdout, stderr } = await this.run(args);
      const partial = code === EXIT_PARTIAL_TRANSFER || code === EXIT_VANISHED_SOURCE;
      const failedPaths = partial ? parseFailedPaths(stderr, request.sourceRoot, request.destRoot) : [];

      log.debug(`[RSYNC] Exit code ${code}, ${failedPaths.length} failed path(s)`);

      return {
        exitCode: code,
        failedPaths,
        output: [stdout.trim(), stderr.trim()].filter(Boolean).join('\n')
      };
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  /**
   * Build the rsync argument vector
   */
  buildArgs(request: TransferRequest, filterFile: string): string[] {
    return [
      '--archive',
      '--copy-links',
      '--itemize-changes',
      ...(request.checksum ? ['--checksum'] : []),
      ...(request.mirror ? ['--delete'] : []),
      ...this.extraArgs,
      `--filter=merge ${filterFile}`,
      withTrailingSlash(request.sourceRoot),
      withTrailingSlash(request.destRoot)
    ];
  }

  /**
   * Execute rsync safely using spawn
   */
  private run(args: string[]): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = this.spawnFn(this.rsyncPath, args);

      let stdout = '';
      let stderr = '';

      child.stdout?.on('data', (data: Buffer | string) => { stdout += data.toString(); });
      child.stderr?.on('data', (data: Buffer | string) => { stderr += data.toString(); });

      child.on('close', (code: number | null) => {
        // Killed by a signal: no exit code, treat as a plain failure
        resolve({ code: code ?? 1, stdout, stderr });
      });

      child.on('error', (err: Error) => {
        reject(new TransferError(`Failed to spawn ${this.rsyncPath}: ${err.message}`));
      });
    });
  }
}

/**
 * Recover the relative paths rsync failed on from its diagnostics
 *
 * Recognized forms:
 * - rsync: [sender] send_files failed to open "/src/a.yaml": Permission denied (13)
 * - rsync: [receiver] mkstemp "/dest/.a.yaml.Xy12Ab" failed: Permission denied (13)
 * - rsync: [generator] delete_file: unlink(a.yaml) failed: Permission denied (13)
 * - file has vanished: "/src/a.yaml"
 */
export function parseFailedPaths(stderr: string, sourceRoot: string, destRoot: string): string[] {
  const roots = [path.resolve(sourceRoot), path.resolve(destRoot)];
  const found: string[] = [];

  for (const line of stderr.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('rsync:') && !trimmed.startsWith('file has vanished:')) {
      continue;
    }

    let candidate: string | undefined;

    const deleteMatch = trimmed.match(/delete_(?:file|item): \w+\((.+?)\) failed/);
    const quotedMatch = trimmed.match(/"([^"]+)"/);

    if (deleteMatch) {
      candidate = deleteMatch[1];
    } else if (quotedMatch) {
      candidate = quotedMatch[1];
    }

    if (!candidate) {
      continue;
    }

    const relative = relativeToRoots(candidate, roots);
    const relPath = /\b(?:mkstemp|rename)\b/.test(trimmed) ? stripTempName(relative) : relative;
    if (relPath && !found.includes(relPath)) {
      found.push(relPath);
    }
  }

  return found;
}

function relativeToRoots(candidate: string, roots: string[]): string {
  for (const root of roots) {
    if (candidate.startsWith(root + '/')) {
      return candidate.slice(root.length + 1);
    }
  }
  return candidate.replace(/^\.\//, '');
}

/**
 * rsync writes into `.name.XXXXXX` before renaming; report the real name
 */
function stripTempName(relPath: string): string {
  const slash = relPath.lastIndexOf('/');
  const dir = relPath.slice(0, slash + 1);
  const base = relPath.slice(slash + 1);
  const temp = base.match(/^\.(.+)\.[A-Za-z0-9]{6}$/);
  return temp ? dir + temp[1] : relPath;
}

function withTrailingSlash(dir: string): string {
  return dir.endsWith('/') ? dir : `${dir}/`;
}
