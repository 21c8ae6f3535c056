/**
 * Typed error catalog for migration runs.
 *
 * `fatal` errors invalidate the whole run (wrong scope, unusable listing,
 * lost audit trail after mutation). Non-fatal errors are local to one
 * object and are recorded while the run continues.
 */

export class MigratorError extends Error {
  constructor(
    public readonly errorCode: string,
    message: string,
    public readonly fatal: boolean,
    public readonly details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        errorCode: this.errorCode,
        message: this.message,
        fatal: this.fatal,
        ...(this.details !== undefined && { details: this.details }),
        ...(this.cause !== undefined && { cause: describeCause(this.cause) }),
      },
    };
  }
}

/** Human-readable message of an unknown thrown value. */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

// Fatal: run scope

export class SessionScopeError extends MigratorError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super("SESSION_SCOPE", message, true, details, options);
  }
}

export class ConfigurationError extends MigratorError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIGURATION", message, true, details);
  }
}

export class InvalidTimeWindowError extends MigratorError {
  constructor(startTime: Date, endTime: Date) {
    super(
      "INVALID_TIME_WINDOW",
      "Time window start must not be after its end",
      true,
      { startTime: startTime.toISOString(), endTime: endTime.toISOString() },
    );
  }
}

// Fatal: listing

export class EnumerationError extends MigratorError {
  constructor(container: string, objectsRead: number, cause: unknown) {
    super(
      "ENUMERATION_FAILED",
      `Listing container "${container}" failed: ${describeCause(cause)}`,
      true,
      { container, objectsRead },
      { cause },
    );
  }
}

// Recovered per object

export class MalformedRecordError extends MigratorError {
  constructor(name: string, field: string, value: unknown) {
    super(
      "MALFORMED_RECORD",
      `Object "${name}" has an unusable ${field}`,
      false,
      { name, field, value: value === null ? null : String(value) },
    );
  }
}

export class PerObjectMigrationError extends MigratorError {
  constructor(
    name: string,
    versionId: string | undefined,
    cause: unknown,
  ) {
    super(
      "OBJECT_MIGRATION_FAILED",
      `Changing tier of "${name}" failed: ${describeCause(cause)}`,
      false,
      { name, ...(versionId !== undefined && { versionId }) },
      { cause },
    );
  }
}

// Audit trail

export type AuditPhase = "discovered" | "migrated" | "failed";

export class AuditWriteError extends MigratorError {
  constructor(
    public readonly phase: AuditPhase,
    path: string,
    cause: unknown,
  ) {
    // Losing the discovery artifact is recoverable: the candidate set is in the log.
    super(
      "AUDIT_WRITE_FAILED",
      `Writing the ${phase} audit artifact failed: ${describeCause(cause)}`,
      phase !== "discovered",
      { phase, path },
      { cause },
    );
  }
}
