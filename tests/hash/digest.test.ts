import { createHash } from 'node:crypto';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { computeFileDigest } from '../../src/hash/digest.js';
import { createTempDir, removeTempDir, writeFixture } from '../helpers/fs-fixtures.js';

describe('computeFileDigest', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('digest');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('returns the lowercase hex MD5 of the file', async () => {
    const path = await writeFixture(root, 'hello.txt', 'hello');

    await expect(computeFileDigest(path)).resolves.toBe('5d41402abc4b2a76b9719d911017c592');
  });

  it('digests files larger than one read block', async () => {
    const content = Buffer.alloc(20_000, 'ab');
    const path = await writeFixture(root, 'large.bin', content);

    const expected = createHash('md5').update(content).digest('hex');

    await expect(computeFileDigest(path)).resolves.toBe(expected);
  });

  it('gives identical digests for identical content in different files', async () => {
    const first = await writeFixture(root, 'one/copy.dat', 'same bytes');
    const second = await writeFixture(root, 'two/other-name.dat', 'same bytes');

    expect(await computeFileDigest(first)).toBe(await computeFileDigest(second));
  });

  it('returns null when the file does not exist', async () => {
    await expect(computeFileDigest(join(root, 'missing.bin'))).resolves.toBeNull();
  });

  it('returns null when the path is a directory', async () => {
    await expect(computeFileDigest(root)).resolves.toBeNull();
  });
});
