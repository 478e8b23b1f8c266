/**
 * Unit tests for file fingerprints
 */

import { expect } from 'chai';
import path from 'path';

import { computeFileHash, needsHash, statFile } from '../../../src/sync/fingerprint.js';
import { FingerprintError } from '../../../src/core/errors.js';
import { fileRecord, makeTempDir, removeDir, writeFixture } from '../../helpers/fixtures.js';

describe('needsHash', () => {
  it('does not hash untracked files', () => {
    expect(needsHash(undefined, { size: 1, mtime: 2 })).to.be.false;
  });

  it('does not hash when size and mtime match the record', () => {
    expect(needsHash(fileRecord('id', { size: 10, mtime: 20 }), { size: 10, mtime: 20 })).to.be.false;
  });

  it('hashes when the mtime moved', () => {
    expect(needsHash(fileRecord('id', { size: 10, mtime: 20 }), { size: 10, mtime: 21 })).to.be.true;
  });

  it('hashes when the size changed', () => {
    expect(needsHash(fileRecord('id', { size: 10, mtime: 20 }), { size: 11, mtime: 20 })).to.be.true;
  });
});

describe('file system fingerprints', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('reads size and mtime', async () => {
    const file = await writeFixture(dir, 'a.txt', 'hello', 1_700_000_000);

    const result = await statFile(file);

    expect(result).to.deep.equal({ size: 5, mtime: 1_700_000_000_000 });
  });

  it('computes the MD5 of the contents', async () => {
    const file = await writeFixture(dir, 'a.txt', 'hello');

    expect(await computeFileHash(file)).to.equal('5d41402abc4b2a76b9719d911017c592');
  });

  it('raises FingerprintError for a missing file', async () => {
    const missing = path.join(dir, 'missing.pdf');

    try {
      await statFile(missing);
      expect.fail('statFile should have thrown');
    } catch (error) {
      expect(error).to.be.instanceOf(FingerprintError);
      expect((error as FingerprintError).path).to.equal(missing);
    }
  });

  it('raises FingerprintError when hashing a missing file', async () => {
    try {
      await computeFileHash(path.join(dir, 'missing.pdf'));
      expect.fail('computeFileHash should have thrown');
    } catch (error) {
      expect(error).to.be.instanceOf(FingerprintError);
    }
  });
});
