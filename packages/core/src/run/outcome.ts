import type { AuditBatch } from "../audit/recorder.js";
import type { BlobRecord } from "../blobs/types.js";
import type { MigratorError } from "../errors/catalog.js";
import type { RunPhase } from "../lifecycle/state-machine.js";
import type { MigrationResult } from "../migration/types.js";

export interface RunAudit {
  /** Null when the discovery write failed and the run went on without it. */
  discovered: AuditBatch | null;
  migrated: AuditBatch | null;
  failed: AuditBatch | null;
}

export type RunOutcome =
  | {
      kind: "completed" | "completed-with-errors";
      candidates: readonly BlobRecord[];
      result: MigrationResult;
      audit: RunAudit;
    }
  | { kind: "no-candidates"; enumerated: number }
  | { kind: "declined"; candidates: readonly BlobRecord[]; audit: RunAudit }
  | {
      kind: "interrupted";
      phase: RunPhase;
      /** Null when the run stopped before any tier change was issued. */
      result: MigrationResult | null;
      audit: RunAudit;
    }
  | {
      kind: "fatal";
      phase: RunPhase;
      error: MigratorError;
      /** Set when tier changes were issued before the failure. */
      result: MigrationResult | null;
      audit: RunAudit;
    };

export type RunOutcomeKind = RunOutcome["kind"];

export const EXIT_CODES: Record<RunOutcomeKind, number> = {
  completed: 0,
  "no-candidates": 0,
  declined: 0,
  "completed-with-errors": 2,
  interrupted: 130,
  fatal: 1,
};

export function exitCodeFor(outcome: RunOutcome): number {
  return EXIT_CODES[outcome.kind];
}
