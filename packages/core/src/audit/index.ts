export {
  createAuditRecorder,
  type AuditBatch,
  type AuditRecorder,
  type AuditRecorderOptions,
} from "./recorder.js";
export { AUDIT_COLUMNS, escapeCsvField, recordToRow, toCsv } from "./csv.js";
