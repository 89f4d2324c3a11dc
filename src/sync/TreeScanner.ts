/**
 * TreeScanner - Builds a normalized listing of one tree
 *
 * Walks every file and directory below a root and records, per relative path,
 * the entry kind and a fingerprint used to decide whether two sides match.
 *
 * Failure policy:
 * - unreadable entry → AccessError (a partial listing is never returned)
 * - symbolic link resolving outside the root, or looping back into a
 *   directory being walked → TraversalError
 */

import { promises as fs, Dirent, Stats } from 'fs';
import path from 'path';
import { log } from '../utils/logger.js';
import { computeFileChecksum, sizeMtimeFingerprint } from '../utils/hashUtils.js';
import { AccessError, TraversalError, describeError, isErrnoException } from '../errors/syncErrors.js';
import type { EntryKind } from '../rules/RuleSet.js';

/**
 * One entry of a tree listing
 */
export interface TreeEntry {
  path: string;          // Relative, '/'-separated
  kind: EntryKind;
  fingerprint: string;   // Content checksum, size:mtime, or DIRECTORY_FINGERPRINT
  size?: number;
}

/**
 * Relative path → entry, from one full scan
 */
export type TreeListing = Map<string, TreeEntry>;

export type FingerprintMode = 'checksum' | 'size-mtime';

export interface TreeScannerOptions {
  fingerprint?: FingerprintMode;
}

export interface ScanOptions {
  /** Return an empty listing instead of failing when the root does not exist */
  allowMissing?: boolean;
}

/** Directories are identical whenever both sides have one */
export const DIRECTORY_FINGERPRINT = 'dir';

/**
 * Two entries are identical iff kind and fingerprint match
 */
export function entriesIdentical(a: TreeEntry, b: TreeEntry): boolean {
  return a.kind === b.kind && a.fingerprint === b.fingerprint;
}

/**
 * TreeScanner class for listing a directory tree
 */
export class TreeScanner {
  private readonly fingerprintMode: FingerprintMode;

  constructor(options: TreeScannerOptions = {}) {
    this.fingerprintMode = options.fingerprint ?? 'checksum';
  }

  /**
   * Scan a tree recursively
   *
   * @param root - Tree root directory
   * @returns Listing keyed by relative path
   * @throws AccessError | TraversalError
   */
  async scan(root: string, options: ScanOptions = {}): Promise<TreeListing> {
    const listing: TreeListing = new Map();

    let realRoot: string;
    try {
      realRoot = await fs.realpath(root);
    } catch (error: unknown) {
      if (options.allowMissing && isErrnoException(error) && error.code === 'ENOENT') {
        log.debug(`[SCANNER] Root ${root} does not exist - empty listing`);
        return listing;
      }
      throw new AccessError(root, describeError(error));
    }

    const rootStat = await this.statPath(realRoot);
    if (!rootStat.isDirectory()) {
      throw new AccessError(root, 'not a directory');
    }

    await this.walk(realRoot, realRoot, '', listing, new Set([realRoot]));

    log.debug(`[SCANNER] ${root}: ${listing.size} entries (${this.fingerprintMode})`);
    return listing;
  }

  /**
   * Walk one directory
   *
   * @param realRoot - Resolved root, boundary for link targets
   * @param dirPath - Resolved path of the directory being read
   * @param relDir - Listing path of that directory ('' for the root)
   * @param ancestors - Resolved directories currently being walked (cycle guard)
   */
  private async walk(
    realRoot: string,
    dirPath: string,
    relDir: string,
    listing: TreeListing,
    ancestors: ReadonlySet<string>
  ): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dirPath, { withFileTypes: true });
    } catch (error) {
      throw new AccessError(dirPath, describeError(error));
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
      const entryPath = path.join(dirPath, entry.name);

      const targetPath = entry.isSymbolicLink()
        ? await this.resolveLink(realRoot, entryPath, relPath)
        : entryPath;

      const stats = await this.statPath(targetPath);

      if (stats.isDirectory()) {
        if (ancestors.has(targetPath)) {
          throw new TraversalError(relPath, targetPath, 'symbolic link cycle');
        }

        listing.set(relPath, { path: relPath, kind: 'dir', fingerprint: DIRECTORY_FINGERPRINT });
        await this.walk(realRoot, targetPath, relPath, listing, new Set([...ancestors, targetPath]));

      } else if (stats.isFile()) {
        listing.set(relPath, {
          path: relPath,
          kind: 'file',
          fingerprint: await this.fingerprint(targetPath, stats),
          size: stats.size
        });

      } else {
        // Sockets, FIFOs and devices carry no configuration
        log.warn(`[SCANNER] Skipping special file: ${relPath}`);
      }
    }
  }

  /**
   * Resolve a symbolic link, refusing targets outside the root
   */
  private async resolveLink(realRoot: string, linkPath: string, relPath: string): Promise<string> {
    let target: string;
    try {
      target = await fs.realpath(linkPath);
    } catch (error) {
      throw new AccessError(linkPath, `cannot resolve symbolic link: ${describeError(error)}`);
    }

    if (target !== realRoot && !target.startsWith(realRoot + path.sep)) {
      throw new TraversalError(relPath, target);
    }
    if (target === realRoot) {
      throw new TraversalError(relPath, target, 'symbolic link cycle');
    }
    return target;
  }

  private async statPath(targetPath: string): Promise<Stats> {
    try {
      return await fs.stat(targetPath);
    } catch (error) {
      throw new AccessError(targetPath, describeError(error));
    }
  }

  private async fingerprint(filePath: string, stats: Stats): Promise<string> {
    if (this.fingerprintMode === 'size-mtime') {
      return sizeMtimeFingerprint(stats.size, stats.mtimeMs);
    }

    try {
      return await computeFileChecksum(filePath);
    } catch (error) {
      throw new AccessError(filePath, describeError(error));
    }
  }
}
