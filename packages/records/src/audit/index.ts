/**
 * Integrity audit and repair
 */

export {
  FindingKind,
  IntegrityAuditor,
  findParentCycles,
  type IntegrityFinding,
  type AuditReport,
  type RepairResult,
} from './integrity.js';
