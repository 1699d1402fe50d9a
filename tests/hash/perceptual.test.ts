import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  computeImageFingerprint,
  computePerceptualHash,
  encodeCoefficients,
  lowFrequencyDct,
  resizeArea,
  toLuminance
} from '../../src/hash/perceptual.js';
import { createTempDir, removeTempDir, writeFixture } from '../helpers/fs-fixtures.js';
import { createQuadrantBitmap, createQuadrantImage, createSolidImage } from '../helpers/test-images.js';

function blockWith(entries: Array<[number, number, number]>): number[][] {
  const block = Array.from({ length: 8 }, () => new Array<number>(8).fill(0));
  for (const [row, column, value] of entries) {
    block[row][column] = value;
  }
  return block;
}

describe('resizeArea', () => {
  it('averages whole blocks when shrinking by an integer factor', () => {
    const pixels = Array.from({ length: 16 }, (_, i) => i);

    const resized = resizeArea(pixels, 4, 4, 1, 2, 2);

    expect(Array.from(resized)).toEqual([2.5, 4.5, 10.5, 12.5]);
  });

  it('weights partially covered pixels by their coverage', () => {
    const resized = resizeArea([0, 3, 6], 3, 1, 1, 2, 1);

    expect(resized[0]).toBeCloseTo(1, 10);
    expect(resized[1]).toBeCloseTo(5, 10);
  });

  it('keeps channels separate', () => {
    const pixels = [10, 20, 30, 30, 40, 50];

    const resized = resizeArea(pixels, 2, 1, 3, 1, 1);

    expect(Array.from(resized)).toEqual([20, 30, 40]);
  });

  it('rejects a buffer that is too small', () => {
    expect(() => resizeArea([1, 2, 3], 2, 2, 1)).toThrow('Pixel buffer is smaller');
  });
});

describe('toLuminance', () => {
  it('weights red, green and blue', () => {
    const luminance = toLuminance([255, 255, 255, 100, 0, 0], 3);

    expect(luminance).toHaveLength(2);
    expect(luminance[0]).toBeCloseTo(255, 9);
    expect(luminance[1]).toBeCloseTo(29.9, 9);
  });

  it('passes single-channel data through', () => {
    expect(Array.from(toLuminance([7, 9], 1))).toEqual([7, 9]);
  });
});

describe('lowFrequencyDct', () => {
  it('puts all energy of a flat grid into the DC term', () => {
    const grid = new Float64Array(32 * 32).fill(10);

    const block = lowFrequencyDct(grid);

    expect(block).toHaveLength(8);
    expect(block[0]).toHaveLength(8);
    expect(block[0][0]).toBeCloseTo(320, 9);
    for (let v = 0; v < 8; v++) {
      for (let u = 0; u < 8; u++) {
        if (v !== 0 || u !== 0) {
          expect(block[v][u]).toBeCloseTo(0, 9);
        }
      }
    }
  });

  it('requires a square grid of the given size', () => {
    expect(() => lowFrequencyDct(new Float64Array(10))).toThrow('Expected a 32x32 grid');
  });
});

describe('encodeCoefficients', () => {
  it('sets the bit of each coefficient above the mean, MSB first', () => {
    expect(encodeCoefficients(blockWith([[0, 0, 1000], [1, 0, 100]]))).toBe('80000000000000');
    expect(encodeCoefficients(blockWith([[0, 0, 1000], [7, 7, 5]]))).toBe('00000000000001');
    expect(encodeCoefficients(blockWith([[2, 1, 3]]))).toBe('00400000000000');
  });

  it('ignores the first row of the block', () => {
    const withRowZero = blockWith([[0, 3, -50], [0, 5, 75], [1, 0, 100]]);
    const withoutRowZero = blockWith([[1, 0, 100]]);

    expect(encodeCoefficients(withRowZero)).toBe(encodeCoefficients(withoutRowZero));
  });

  it('rejects blocks of the wrong shape', () => {
    expect(() => encodeCoefficients([[1], [2]])).toThrow('Expected 56 coefficients, got 1');
  });
});

describe('computePerceptualHash', () => {
  it('returns a 14 character hex code with the image dimensions', async () => {
    const image = await createQuadrantImage();

    const result = await computePerceptualHash(image);

    expect(result.hash).toMatch(/^[0-9a-f]{14}$/);
    expect(result.width).toBe(64);
    expect(result.height).toBe(64);
  });

  it('is deterministic for the same image', async () => {
    const image = await createQuadrantImage({ corner: 'bottom-right' });

    const first = await computePerceptualHash(image);
    const second = await computePerceptualHash(image);

    expect(first.hash).toBe(second.hash);
  });

  it('ignores lossless re-encoding', async () => {
    const stored = await createQuadrantImage({ compressionLevel: 0 });
    const compressed = await createQuadrantImage({ compressionLevel: 9 });

    expect(stored.equals(compressed)).toBe(false);

    const [a, b] = await Promise.all([computePerceptualHash(stored), computePerceptualHash(compressed)]);
    expect(a.hash).toBe(b.hash);
  });

  it('drops the alpha channel before hashing', async () => {
    const opaque = await createQuadrantImage();
    const translucent = await createQuadrantImage({ alpha: 128 });

    const [a, b] = await Promise.all([computePerceptualHash(opaque), computePerceptualHash(translucent)]);
    expect(a.hash).toBe(b.hash);
  });

  it('distinguishes visually different images', async () => {
    const topLeft = await createQuadrantImage({ corner: 'top-left' });
    const bottomRight = await createQuadrantImage({ corner: 'bottom-right' });

    const [a, b] = await Promise.all([computePerceptualHash(topLeft), computePerceptualHash(bottomRight)]);

    expect(a.hash).not.toBe(b.hash);
    // The strongest coefficient flips sign between the two layouts
    expect(parseInt(a.hash.slice(0, 2), 16) & 0x80).toBe(0x80);
    expect(parseInt(b.hash.slice(0, 2), 16) & 0x80).toBe(0);
  });

  it('hashes a BMP like the same pixels stored as PNG', async () => {
    const [bitmap, png] = await Promise.all([
      computePerceptualHash(createQuadrantBitmap('top-left')),
      computePerceptualHash(await createQuadrantImage({ corner: 'top-left' }))
    ]);

    expect(bitmap).toEqual({ hash: png.hash, width: 64, height: 64 });
  });

  it('keeps BMP rows in top-down order', async () => {
    const [topLeft, bottomRight] = await Promise.all([
      computePerceptualHash(createQuadrantBitmap('top-left')),
      computePerceptualHash(createQuadrantBitmap('bottom-right'))
    ]);

    expect(parseInt(topLeft.hash.slice(0, 2), 16) & 0x80).toBe(0x80);
    expect(parseInt(bottomRight.hash.slice(0, 2), 16) & 0x80).toBe(0);
  });

  it('rejects data that is not an image', async () => {
    await expect(computePerceptualHash(Buffer.from('not an image'))).rejects.toThrow();
  });
});

describe('computeImageFingerprint', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('phash');
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('hashes an image file on disk', async () => {
    const image = await createSolidImage({ r: 20, g: 200, b: 90 });
    const path = await writeFixture(root, 'green.png', image);

    const fingerprint = await computeImageFingerprint(path);

    expect(fingerprint).toBe((await computePerceptualHash(image)).hash);
  });

  it('returns null when the file cannot be decoded', async () => {
    const path = await writeFixture(root, 'broken.jpg', 'plain text pretending to be a photo');

    await expect(computeImageFingerprint(path)).resolves.toBeNull();
  });

  it('hashes a BMP file on disk', async () => {
    const path = await writeFixture(root, 'scan.BMP', createQuadrantBitmap());

    await expect(computeImageFingerprint(path)).resolves.toBe(
      (await computePerceptualHash(await createQuadrantImage())).hash
    );
  });

  it('returns null for a truncated BMP', async () => {
    const path = await writeFixture(root, 'cut.bmp', createQuadrantBitmap().subarray(0, 20));

    await expect(computeImageFingerprint(path)).resolves.toBeNull();
  });

  it('returns null for a missing file', async () => {
    await expect(computeImageFingerprint(join(root, 'gone.png'))).resolves.toBeNull();
  });
});
