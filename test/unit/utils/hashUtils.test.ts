import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import path from 'path';
import { promises as fs } from 'fs';
import {
  computeContentChecksum,
  computeFileChecksum,
  sizeMtimeFingerprint
} from '../../../src/utils/hashUtils.js';
import { makeTempDir, removeDir } from '../../helpers/treeFixtures.js';

describe('hashUtils', () => {
  describe('computeContentChecksum', () => {
    it('should compute SHA-256 hex digests', () => {
      expect(computeContentChecksum('')).to.equal('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
      expect(computeContentChecksum('abc')).to.equal('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should hash strings and buffers alike', () => {
      expect(computeContentChecksum(Buffer.from('abc'))).to.equal(computeContentChecksum('abc'));
    });
  });

  describe('computeFileChecksum', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await makeTempDir('hash-test-');
    });

    afterEach(async () => {
      await removeDir(tempDir);
    });

    it('should hash the raw file bytes', async () => {
      const file = path.join(tempDir, 'a.yaml');
      await fs.writeFile(file, Buffer.from([0xef, 0xbb, 0xbf, 0x61]));

      expect(await computeFileChecksum(file)).to.equal(
        computeContentChecksum(Buffer.from([0xef, 0xbb, 0xbf, 0x61]))
      );
      expect(await computeFileChecksum(file)).to.not.equal(computeContentChecksum('a'));
    });
  });

  describe('sizeMtimeFingerprint', () => {
    it('should combine size and whole milliseconds', () => {
      expect(sizeMtimeFingerprint(120, 1714557600000.75)).to.equal('120:1714557600000');
    });
  });
});
