/**
 * Temporary tree fixtures for sync tests
 */

import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';

/** File content, or null for an empty directory */
export type TreeLayout = Record<string, string | null>;

export async function makeTempDir(prefix = 'ha-sync-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Create files and directories below root; parents are created as needed
 */
export async function writeTree(root: string, layout: TreeLayout): Promise<void> {
  for (const [relPath, content] of Object.entries(layout)) {
    const target = path.join(root, ...relPath.split('/'));
    if (content === null) {
      await fs.mkdir(target, { recursive: true });
    } else {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    }
  }
}

/**
 * Read a tree back as relative path → content (null for directories)
 */
export async function readTree(root: string): Promise<TreeLayout> {
  const result: TreeLayout = {};

  const walk = async (dir: string, relDir: string): Promise<void> => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        result[relPath] = null;
        await walk(fullPath, relPath);
      } else {
        result[relPath] = await fs.readFile(fullPath, 'utf-8');
      }
    }
  };

  await walk(root, '');
  return result;
}

export async function exists(target: string): Promise<boolean> {
  return fs.access(target).then(() => true, () => false);
}
