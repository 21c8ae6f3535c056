import { z, ZodError } from "zod";
import { MigratorError } from "@blob-tier-migrator/core/errors";
import type { RunPhase } from "@blob-tier-migrator/core/lifecycle";
import type { RunOutcome } from "@blob-tier-migrator/core/run";

/** Operator-facing description of an error that ended the run. */
export function formatFailure(error: unknown, phase?: RunPhase): string {
  const lines: string[] = [];

  if (error instanceof MigratorError) {
    lines.push(`${error.name} [${error.errorCode}]: ${error.message}`);
    if (phase !== undefined) lines.push(`  phase:   ${phase}`);
    if (error.details !== undefined) {
      lines.push(`  details: ${JSON.stringify(error.details)}`);
    }
  } else if (error instanceof ZodError) {
    lines.push("Invalid configuration file:");
    lines.push(z.prettifyError(error));
  } else if (error instanceof Error) {
    lines.push(`${error.name}: ${error.message}`);
  } else {
    lines.push(String(error));
  }

  return lines.join("\n");
}

/** One-paragraph result of a run, printed to stdout. */
export function formatOutcome(outcome: RunOutcome): string {
  switch (outcome.kind) {
    case "no-candidates":
      return `Nothing to migrate: none of ${outcome.enumerated} listed object(s) matched.`;
    case "declined":
      return `Cancelled. ${outcome.candidates.length} candidate(s) left unchanged.`;
    case "completed":
    case "completed-with-errors": {
      const { succeeded, failed } = outcome.result;
      const lines = [
        `Migrated ${succeeded.length} of ${outcome.candidates.length} object(s), ${failed.length} failed.`,
      ];
      if (outcome.audit.discovered) lines.push(`  discovered: ${outcome.audit.discovered.path}`);
      if (outcome.audit.migrated) lines.push(`  migrated:   ${outcome.audit.migrated.path}`);
      if (outcome.audit.failed) lines.push(`  failed:     ${outcome.audit.failed.path}`);
      return lines.join("\n");
    }
    case "interrupted": {
      if (outcome.result === null) {
        return `Interrupted during ${outcome.phase}. No tier was changed.`;
      }
      const { succeeded, failed, notAttempted } = outcome.result;
      const lines = [
        `Interrupted: ${succeeded.length} migrated, ${failed.length} failed, ${notAttempted.length} not attempted.`,
      ];
      if (outcome.audit.migrated) lines.push(`  migrated:   ${outcome.audit.migrated.path}`);
      if (outcome.audit.failed) lines.push(`  failed:     ${outcome.audit.failed.path}`);
      return lines.join("\n");
    }
    case "fatal": {
      const lines = [formatFailure(outcome.error, outcome.phase)];
      if (outcome.result !== null) {
        const { succeeded, failed, notAttempted } = outcome.result;
        lines.push("Tier changes already issued:");
        lines.push(`  migrated:      ${succeeded.map((r) => r.name).join(", ") || "none"}`);
        lines.push(`  failed:        ${failed.map((f) => f.record.name).join(", ") || "none"}`);
        lines.push(`  not attempted: ${notAttempted.map((r) => r.name).join(", ") || "none"}`);
        if (outcome.audit.failed) lines.push(`  failed audit:  ${outcome.audit.failed.path}`);
      }
      return lines.join("\n");
    }
  }
}
