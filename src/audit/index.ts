export {
  formatAuditLog,
  writeAuditLog,
  auditLogFileName,
  formatMegabytes,
  type AuditReport,
  type WriteAuditLogOptions
} from './run-log.js';
