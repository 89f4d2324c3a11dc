/**
 * Unit tests for TreeScanner
 */

import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import path from 'path';
import { promises as fs } from 'fs';
import {
  TreeScanner,
  DIRECTORY_FINGERPRINT,
  entriesIdentical
} from '../../../src/sync/TreeScanner.js';
import { AccessError, TraversalError } from '../../../src/errors/syncErrors.js';
import { computeContentChecksum } from '../../../src/utils/hashUtils.js';
import { makeTempDir, removeDir, writeTree } from '../../helpers/treeFixtures.js';

describe('TreeScanner', () => {
  let tempDir: string;
  let root: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('scanner-test-');
    root = path.join(tempDir, 'tree');
    await fs.mkdir(root);
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  describe('scan', () => {
    it('should list files and directories by relative path', async () => {
      await writeTree(root, {
        'configuration.yaml': 'homeassistant:\n',
        'packages/lights.yaml': 'light: []\n',
        'empty': null
      });

      const listing = await new TreeScanner().scan(root);

      expect([...listing.keys()]).to.deep.equal([
        'configuration.yaml',
        'empty',
        'packages',
        'packages/lights.yaml'
      ]);
      expect(listing.get('packages')).to.deep.equal({
        path: 'packages',
        kind: 'dir',
        fingerprint: DIRECTORY_FINGERPRINT
      });
      expect(listing.get('configuration.yaml')).to.deep.equal({
        path: 'configuration.yaml',
        kind: 'file',
        fingerprint: computeContentChecksum('homeassistant:\n'),
        size: 15
      });
    });

    it('should return an empty listing for an empty root', async () => {
      const listing = await new TreeScanner().scan(root);
      expect(listing.size).to.equal(0);
    });

    it('should fail on a missing root', async () => {
      const missing = path.join(tempDir, 'missing');
      const error = await new TreeScanner().scan(missing).then(() => null, (err: unknown) => err);

      expect(error).to.be.instanceOf(AccessError);
      expect(error).to.have.property('exitCode', 3);
    });

    it('should return an empty listing for a missing root when allowed', async () => {
      const listing = await new TreeScanner().scan(path.join(tempDir, 'missing'), { allowMissing: true });
      expect(listing.size).to.equal(0);
    });

    it('should fail when the root is a file', async () => {
      const file = path.join(tempDir, 'file.txt');
      await fs.writeFile(file, 'x');

      const error = await new TreeScanner().scan(file).then(() => null, (err: unknown) => err);
      expect(error).to.be.instanceOf(AccessError);
      expect(error).to.have.property('message', `Cannot read ${file}: not a directory`);
    });
  });

  describe('fingerprints', () => {
    it('should give identical content the same checksum', async () => {
      const other = path.join(tempDir, 'other');
      await writeTree(root, { 'a.yaml': 'same' });
      await writeTree(other, { 'a.yaml': 'same' });

      const scanner = new TreeScanner();
      const left = await scanner.scan(root);
      const right = await scanner.scan(other);

      const a = left.get('a.yaml');
      const b = right.get('a.yaml');
      expect(a && b && entriesIdentical(a, b)).to.be.true;
    });

    it('should distinguish content differing only in line endings', async () => {
      const other = path.join(tempDir, 'other');
      await writeTree(root, { 'a.yaml': 'x: 1\n' });
      await writeTree(other, { 'a.yaml': 'x: 1\r\n' });

      const scanner = new TreeScanner();
      const a = (await scanner.scan(root)).get('a.yaml');
      const b = (await scanner.scan(other)).get('a.yaml');
      expect(a && b && entriesIdentical(a, b)).to.be.false;
    });

    it('should use size and mtime in size-mtime mode', async () => {
      await writeTree(root, { 'a.yaml': 'abc' });
      const mtime = new Date('2024-05-01T10:00:00Z');
      await fs.utimes(path.join(root, 'a.yaml'), mtime, mtime);

      const listing = await new TreeScanner({ fingerprint: 'size-mtime' }).scan(root);
      expect(listing.get('a.yaml')?.fingerprint).to.equal(`3:${mtime.getTime()}`);
    });

    it('should never treat a file and a directory as identical', () => {
      expect(entriesIdentical(
        { path: 'x', kind: 'dir', fingerprint: DIRECTORY_FINGERPRINT },
        { path: 'x', kind: 'file', fingerprint: DIRECTORY_FINGERPRINT }
      )).to.be.false;
    });
  });

  describe('symbolic links', () => {
    it('should follow links that stay inside the root', async () => {
      await writeTree(root, { 'packages/lights.yaml': 'light: []\n' });
      await fs.symlink(path.join(root, 'packages', 'lights.yaml'), path.join(root, 'lights.yaml'));
      await fs.symlink(path.join(root, 'packages'), path.join(root, 'linked'));

      const listing = await new TreeScanner().scan(root);

      expect(listing.get('lights.yaml')?.kind).to.equal('file');
      expect(listing.get('lights.yaml')?.fingerprint).to.equal(computeContentChecksum('light: []\n'));
      expect(listing.get('linked')?.kind).to.equal('dir');
      expect(listing.has('linked/lights.yaml')).to.be.true;
    });

    it('should refuse a link pointing outside the root', async () => {
      const outside = path.join(tempDir, 'outside.yaml');
      await fs.writeFile(outside, 'secret');
      await fs.symlink(outside, path.join(root, 'escape.yaml'));

      const error = await new TreeScanner().scan(root).then(() => null, (err: unknown) => err);
      expect(error).to.be.instanceOf(TraversalError);
      expect(error).to.have.property('message').that.includes('Refusing to follow escape.yaml');
    });

    it('should refuse a link looping back to the root', async () => {
      await fs.symlink(root, path.join(root, 'loop'));

      const error = await new TreeScanner().scan(root).then(() => null, (err: unknown) => err);
      expect(error).to.be.instanceOf(TraversalError);
      expect(error).to.have.property('message').that.includes('symbolic link cycle');
    });

    it('should refuse a link looping back to an ancestor directory', async () => {
      await writeTree(root, { 'a/b': null });
      await fs.symlink(path.join(root, 'a'), path.join(root, 'a', 'b', 'up'));

      const error = await new TreeScanner().scan(root).then(() => null, (err: unknown) => err);
      expect(error).to.be.instanceOf(TraversalError);
      expect(error).to.have.nested.property('data.path', 'a/b/up');
    });

    it('should fail on a dangling link', async () => {
      await fs.symlink(path.join(root, 'nowhere'), path.join(root, 'dangling'));

      const error = await new TreeScanner().scan(root).then(() => null, (err: unknown) => err);
      expect(error).to.be.instanceOf(AccessError);
      expect(error).to.have.property('message').that.includes('cannot resolve symbolic link');
    });
  });
});
