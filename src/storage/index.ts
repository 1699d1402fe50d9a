/**
 * Storage module - file relocation within and across filesystems
 */

export { ensureDirectory, pathExists, relocateFile, type RelocationOutcome } from './relocate.js';
