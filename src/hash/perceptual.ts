/**
 * Perceptual Hashing for Image Duplicate Detection
 *
 * Produces a 56-bit DCT fingerprint from the coarse structure of an image.
 * Re-encoding, small pixel noise and lossless re-saves leave it unchanged,
 * while visually different images get different codes.
 *
 * Steps:
 * 1. Decode with sharp (bmp-js for BMP files, which sharp cannot read),
 *    drop any alpha channel, take 8-bit sRGB pixels
 * 2. Area-average down to a 32x32 grid
 * 3. Convert to luminance
 * 4. 2-D DCT (orthonormal DCT-II) and keep the top-left 8x8 block
 * 5. Drop the first row of that block (DC term included), 56 coefficients left
 * 6. One bit per coefficient: 1 when above the mean of the 56
 * 7. Pack MSB-first into 7 bytes, hex encode (14 characters)
 */

import { readFile } from 'node:fs/promises';

import bmp from 'bmp-js';
import sharp from 'sharp';

import { describeError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

/** Side of the grid the image is reduced to before the transform */
export const HASH_GRID_SIZE = 32;

/** Side of the low-frequency block taken from the transform */
export const LOW_FREQUENCY_SIZE = 8;

/** (8 - 1) rows x 8 columns */
export const PERCEPTUAL_HASH_BITS = (LOW_FREQUENCY_SIZE - 1) * LOW_FREQUENCY_SIZE;

/**
 * Perceptual hash result
 */
export interface PerceptualHashResult {
  /** 14 character lowercase hex code */
  hash: string;
  /** Decoded image dimensions */
  width: number;
  height: number;
}

interface AxisWeight {
  index: number;
  weight: number;
}

/**
 * For each output cell, the source cells it covers and by how much.
 */
function areaWeights(sourceLength: number, targetLength: number): AxisWeight[][] {
  const scale = sourceLength / targetLength;
  const weights: AxisWeight[][] = [];

  for (let target = 0; target < targetLength; target++) {
    const start = target * scale;
    const end = start + scale;
    const cell: AxisWeight[] = [];

    for (let index = Math.floor(start); index < Math.min(Math.ceil(end), sourceLength); index++) {
      const weight = Math.min(end, index + 1) - Math.max(start, index);
      if (weight > 0) {
        cell.push({ index, weight: weight / scale });
      }
    }

    weights.push(cell);
  }

  return weights;
}

/**
 * Resize interleaved pixel data by area averaging.
 *
 * Every output pixel is the coverage-weighted mean of the source pixels under
 * its footprint, which avoids the aliasing of nearest-neighbour sampling.
 */
export function resizeArea(
  pixels: ArrayLike<number>,
  width: number,
  height: number,
  channels: number,
  targetWidth: number = HASH_GRID_SIZE,
  targetHeight: number = HASH_GRID_SIZE
): Float64Array {
  if (pixels.length < width * height * channels) {
    throw new Error('Pixel buffer is smaller than width x height x channels');
  }

  const columns = areaWeights(width, targetWidth);
  const rows = areaWeights(height, targetHeight);
  const output = new Float64Array(targetWidth * targetHeight * channels);

  for (let ty = 0; ty < targetHeight; ty++) {
    for (let tx = 0; tx < targetWidth; tx++) {
      const base = (ty * targetWidth + tx) * channels;

      for (const row of rows[ty]) {
        for (const column of columns[tx]) {
          const weight = row.weight * column.weight;
          const source = (row.index * width + column.index) * channels;
          for (let c = 0; c < channels; c++) {
            output[base + c] += pixels[source + c] * weight;
          }
        }
      }
    }
  }

  return output;
}

/**
 * Collapse interleaved pixels to one luminance value per pixel (ITU-R BT.601 weights).
 * Single-channel input is passed through.
 */
export function toLuminance(pixels: ArrayLike<number>, channels: number): Float64Array {
  const count = Math.floor(pixels.length / channels);
  const luminance = new Float64Array(count);

  for (let i = 0; i < count; i++) {
    const offset = i * channels;
    luminance[i] =
      channels >= 3
        ? 0.299 * pixels[offset] + 0.587 * pixels[offset + 1] + 0.114 * pixels[offset + 2]
        : pixels[offset];
  }

  return luminance;
}

function dctBasis(size: number, keep: number): Float64Array[] {
  const basis: Float64Array[] = [];
  for (let u = 0; u < keep; u++) {
    const scale = u === 0 ? Math.sqrt(1 / size) : Math.sqrt(2 / size);
    const row = new Float64Array(size);
    for (let x = 0; x < size; x++) {
      row[x] = scale * Math.cos((Math.PI * (2 * x + 1) * u) / (2 * size));
    }
    basis.push(row);
  }
  return basis;
}

/**
 * Orthonormal 2-D DCT-II of a square grid, returning only the top-left
 * `keep` x `keep` coefficients indexed [vertical][horizontal].
 */
export function lowFrequencyDct(
  grid: ArrayLike<number>,
  size: number = HASH_GRID_SIZE,
  keep: number = LOW_FREQUENCY_SIZE
): number[][] {
  if (grid.length !== size * size) {
    throw new Error(`Expected a ${size}x${size} grid`);
  }

  const basis = dctBasis(size, keep);

  // Transform rows first: partial[y][u]
  const partial: Float64Array[] = [];
  for (let y = 0; y < size; y++) {
    const row = new Float64Array(keep);
    for (let u = 0; u < keep; u++) {
      let sum = 0;
      for (let x = 0; x < size; x++) {
        sum += basis[u][x] * grid[y * size + x];
      }
      row[u] = sum;
    }
    partial.push(row);
  }

  const coefficients: number[][] = [];
  for (let v = 0; v < keep; v++) {
    const row: number[] = [];
    for (let u = 0; u < keep; u++) {
      let sum = 0;
      for (let y = 0; y < size; y++) {
        sum += basis[v][y] * partial[y][u];
      }
      row.push(sum);
    }
    coefficients.push(row);
  }

  return coefficients;
}

/**
 * Turn an 8x8 coefficient block into the hex fingerprint.
 * The first row is ignored; the remaining 56 values are thresholded at their mean.
 */
export function encodeCoefficients(block: number[][]): string {
  const region = block.slice(1).flat();
  if (region.length !== PERCEPTUAL_HASH_BITS) {
    throw new Error(`Expected ${PERCEPTUAL_HASH_BITS} coefficients, got ${region.length}`);
  }

  const mean = region.reduce((sum, value) => sum + value, 0) / region.length;
  const bytes = Buffer.alloc(PERCEPTUAL_HASH_BITS / 8);

  region.forEach((value, bit) => {
    if (value > mean) {
      bytes[bit >> 3] |= 0x80 >> (bit & 7);
    }
  });

  return bytes.toString('hex');
}

interface DecodedPixels {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

async function decodeWithSharp(input: string | Buffer): Promise<DecodedPixels> {
  const { data, info } = await sharp(input)
    .removeAlpha()
    .toColourspace('srgb')
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
}

function isBitmap(buffer: Buffer): boolean {
  return buffer.length >= 2 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

/**
 * Decode a Windows bitmap into RGB pixels, dropping alpha like the sharp path does
 */
function decodeBitmap(buffer: Buffer): DecodedPixels {
  const image = bmp.decode(buffer);
  const pixelCount = image.width * image.height;
  const rgb = Buffer.alloc(pixelCount * 3);

  for (let pixel = 0; pixel < pixelCount; pixel++) {
    // bmp-js emits ABGR
    rgb[pixel * 3] = image.data[pixel * 4 + 3];
    rgb[pixel * 3 + 1] = image.data[pixel * 4 + 2];
    rgb[pixel * 3 + 2] = image.data[pixel * 4 + 1];
  }

  return { data: rgb, width: image.width, height: image.height, channels: 3 };
}

async function decodePixels(input: string | Buffer): Promise<DecodedPixels> {
  try {
    return await decodeWithSharp(input);
  } catch (error) {
    const buffer = typeof input === 'string' ? await readFile(input) : input;
    if (!isBitmap(buffer)) {
      throw error;
    }
    return decodeBitmap(buffer);
  }
}

/**
 * Compute the perceptual hash of an image file or buffer
 *
 * @param input - Image path or data (any format sharp decodes, or BMP)
 * @throws When the image cannot be decoded
 */
export async function computePerceptualHash(input: string | Buffer): Promise<PerceptualHashResult> {
  const { data, width, height, channels } = await decodePixels(input);

  if (width === 0 || height === 0) {
    throw new Error('Image has no pixels');
  }

  const resized = resizeArea(data, width, height, channels);
  const luminance = toLuminance(resized, channels);

  return {
    hash: encodeCoefficients(lowFrequencyDct(luminance)),
    width,
    height
  };
}

/**
 * Fingerprint an image file, or null when it cannot be decoded
 */
export async function computeImageFingerprint(path: string): Promise<string | null> {
  try {
    const { hash } = await computePerceptualHash(path);
    return hash;
  } catch (error) {
    logger.debug({ path, error: describeError(error) }, 'Image decode failed');
    return null;
  }
}
