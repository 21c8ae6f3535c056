export {
  MigratorError,
  SessionScopeError,
  ConfigurationError,
  InvalidTimeWindowError,
  EnumerationError,
  MalformedRecordError,
  PerObjectMigrationError,
  AuditWriteError,
  describeCause,
  type AuditPhase,
} from "./catalog.js";
