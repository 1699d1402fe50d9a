/**
 * Classify module - date and quarter folders for images
 */

export { classify, type ClassifyOptions } from './classifier.js';
export { deriveClassificationKey, quarterOf, KEY_DERIVERS, type KeyDeriver } from './keys.js';
