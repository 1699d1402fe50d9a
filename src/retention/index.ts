/**
 * Retention module - survivor selection and quarantine moves
 */

export {
  RETENTION_RULES,
  orderForRetention,
  selectSurvivor,
  type RetentionRule,
  type SortDirection
} from './strategies.js';
export { resolveDuplicates, quarantineFolderName, type ResolveOptions } from './resolver.js';
