/**
 * Storage facade.
 */
export { recordAudit, queryAuditLog, getAuditStats, verifyAuditChain } from './audit.js';
