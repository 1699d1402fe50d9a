/**
 * Hash module - exact digests and perceptual fingerprints
 */

export { computeFileDigest, DIGEST_BLOCK_SIZE } from './digest.js';
export {
  computePerceptualHash,
  computeImageFingerprint,
  resizeArea,
  toLuminance,
  lowFrequencyDct,
  encodeCoefficients,
  HASH_GRID_SIZE,
  LOW_FREQUENCY_SIZE,
  PERCEPTUAL_HASH_BITS,
  type PerceptualHashResult
} from './perceptual.js';
export { fingerprintEntry } from './fingerprint.js';
