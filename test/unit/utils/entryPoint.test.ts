import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import path from 'path';
import { promises as fs } from 'fs';
import { pathToFileURL } from 'url';
import { isEntryPoint } from '../../../src/utils/entryPoint.js';
import { makeTempDir, removeDir } from '../../helpers/treeFixtures.js';

describe('isEntryPoint', () => {
  let tempDir: string;
  let script: string;
  let moduleUrl: string;

  beforeEach(async () => {
    tempDir = await makeTempDir('entry-test-');
    script = path.join(tempDir, 'index.js');
    await fs.writeFile(script, '', 'utf-8');
    moduleUrl = pathToFileURL(script).href;
  });

  afterEach(async () => {
    await removeDir(tempDir);
  });

  it('should match the started script', () => {
    expect(isEntryPoint(moduleUrl, script)).to.be.true;
  });

  it('should match when started through a bin symlink', async () => {
    const binDir = path.join(tempDir, 'node_modules', '.bin');
    await fs.mkdir(binDir, { recursive: true });
    const link = path.join(binDir, 'ha-config-sync');
    await fs.symlink(script, link);

    expect(isEntryPoint(moduleUrl, link)).to.be.true;
  });

  it('should not match another script', async () => {
    const other = path.join(tempDir, 'other.js');
    await fs.writeFile(other, '', 'utf-8');

    expect(isEntryPoint(moduleUrl, other)).to.be.false;
  });

  it('should not match a missing or absent script path', () => {
    expect(isEntryPoint(moduleUrl, path.join(tempDir, 'missing.js'))).to.be.false;
    expect(isEntryPoint(moduleUrl, undefined)).to.be.false;
  });
});
