import type { Logger } from "pino";
import type { AuditBatch, AuditRecorder } from "../audit/recorder.js";
import type { BlobEnumerator } from "../blobs/enumerator.js";
import { filterByWindow } from "../blobs/filter.js";
import type { BlobRecord } from "../blobs/types.js";
import type { ConfirmationGate } from "../confirmation/gate.js";
import { AuditWriteError, MigratorError } from "../errors/catalog.js";
import { RunStateMachine } from "../lifecycle/state-machine.js";
import type { TierMigrationExecutor } from "../migration/executor.js";
import type { MigrationResult } from "../migration/types.js";
import type { SessionGuard } from "../session/guard.js";
import type { RunContext } from "./context.js";
import { exitCodeFor, type RunAudit, type RunOutcome } from "./outcome.js";

export interface RunDeps {
  sessionGuard: SessionGuard;
  enumerator: BlobEnumerator;
  recorder: AuditRecorder;
  gate: ConfirmationGate;
  executor: TierMigrationExecutor;
  logger: Logger;
  /** Aborting stops the run at the next step boundary. */
  signal?: AbortSignal;
  /** Default: 1 */
  concurrency?: number;
  /** Extra attempts for the discovery artifact. Default: 1 */
  discoveryRetries?: number;
}

async function recordDiscovery(
  candidates: readonly BlobRecord[],
  deps: RunDeps,
): Promise<AuditBatch | null> {
  const attempts = 1 + (deps.discoveryRetries ?? 1);

  for (let attempt = 1; ; attempt++) {
    try {
      return await deps.recorder.record("discovered", candidates);
    } catch (err) {
      if (!(err instanceof AuditWriteError) || err.fatal) throw err;
      if (attempt < attempts) {
        deps.logger.warn(
          { attempt, error: err.message },
          "Discovery audit write failed, retrying",
        );
        continue;
      }
      deps.logger.warn(
        { error: err.message, candidates: candidates.map((r) => r.name) },
        "Discovery audit not written, continuing with the candidate list logged",
      );
      return null;
    }
  }
}

/**
 * Writes the migrated set and, when anything failed, the failed set. Both
 * writes are attempted even if the first one throws; the first error is
 * rethrown afterwards.
 */
async function recordMigration(
  result: MigrationResult,
  audit: RunAudit,
  deps: RunDeps,
): Promise<void> {
  let firstError: unknown;
  let failedWrite = false;

  try {
    audit.migrated = await deps.recorder.record("migrated", result.succeeded);
  } catch (err) {
    firstError = err;
    failedWrite = true;
  }

  if (result.failed.length > 0) {
    try {
      audit.failed = await deps.recorder.recordFailures(result.failed);
    } catch (err) {
      if (!failedWrite) firstError = err;
      failedWrite = true;
    }
  }

  if (failedWrite) {
    deps.logger.error(
      {
        migrated: result.succeeded.map((r) => r.name),
        failed: result.failed.map((f) => f.record.name),
        notAttempted: result.notAttempted.map((r) => r.name),
      },
      "Tier changes were issued but the migration audit is incomplete",
    );
    throw firstError;
  }
}

/**
 * One pass of session check, listing, filtering, discovery audit,
 * confirmation, tier changes and post-migration audit.
 *
 * Expected endings (nothing to do, declined, interrupted, fatal) come back
 * as a RunOutcome. Errors outside the catalog propagate.
 */
export async function runMigration(
  context: RunContext,
  deps: RunDeps,
): Promise<RunOutcome> {
  const { logger, signal } = deps;
  const machine = new RunStateMachine();
  const audit: RunAudit = { discovered: null, migrated: null, failed: null };
  let result: MigrationResult | null = null;

  machine.onPhaseChange((event) => {
    logger.debug(
      { runId: context.runId, from: event.from, to: event.to, reason: event.reason },
      "Run phase changed",
    );
  });

  const finish = (outcome: RunOutcome): RunOutcome => {
    logger.info(
      { runId: context.runId, outcome: outcome.kind, exitCode: exitCodeFor(outcome) },
      "Run finished",
    );
    return outcome;
  };

  const interrupted = (): RunOutcome => {
    const phase = machine.getPhase();
    machine.transition("failed", "interrupted");
    return finish({ kind: "interrupted", phase, result: null, audit });
  };

  logger.info(
    {
      runId: context.runId,
      account: context.account,
      container: context.container,
      tier: context.tierFilter,
      targetTier: context.migration.targetTier,
      startTime: context.window.startTime.toISOString(),
      endTime: context.window.endTime.toISOString(),
    },
    "Run started",
  );

  try {
    machine.transition("session");
    await deps.sessionGuard.ensureSession(context.tenantId, context.subscriptionId);
    if (signal?.aborted) return interrupted();

    machine.transition("enumerating");
    const listed = await deps.enumerator.listBlobs(
      context.container,
      context.tierFilter,
      signal,
    );

    machine.transition("filtering");
    const candidates = filterByWindow(
      listed,
      {
        tierFilter: context.tierFilter,
        startTime: context.window.startTime,
        endTime: context.window.endTime,
      },
      {
        onMalformed: (record, error) => {
          logger.warn({ name: record.name, details: error.details }, error.message);
        },
      },
    );
    logger.info(
      { enumerated: listed.length, candidates: candidates.length },
      "Candidates selected",
    );

    if (candidates.length === 0) {
      machine.transition("finished", "no candidates");
      return finish({ kind: "no-candidates", enumerated: listed.length });
    }

    machine.transition("recording-discovery");
    audit.discovered = await recordDiscovery(candidates, deps);
    if (signal?.aborted) return interrupted();

    machine.transition("awaiting-confirmation");
    const confirmed = await deps.gate.requireConfirmation(
      candidates,
      {
        account: context.account,
        container: context.container,
        sourceTier: context.tierFilter,
        targetTier: context.migration.targetTier,
        auditPath: audit.discovered?.path ?? null,
      },
      signal,
    );
    if (signal?.aborted) return interrupted();
    if (!confirmed) {
      machine.transition("finished", "declined");
      return finish({ kind: "declined", candidates, audit });
    }

    machine.transition("migrating");
    const migration = await deps.executor.migrate(candidates, context.migration, {
      concurrency: deps.concurrency,
      signal,
    });
    result = migration;

    machine.transition("recording-migration");
    await recordMigration(migration, audit, deps);

    machine.transition("finished");
    if (result.notAttempted.length > 0) {
      return finish({ kind: "interrupted", phase: "migrating", result, audit });
    }
    return finish({
      kind: result.failed.length > 0 ? "completed-with-errors" : "completed",
      candidates,
      result,
      audit,
    });
  } catch (err) {
    if (machine.isTerminal()) throw err;
    if (signal?.aborted && machine.getPhase() !== "recording-migration") {
      return interrupted();
    }

    const phase = machine.getPhase();
    machine.transition("failed", err instanceof Error ? err.message : undefined);
    if (!(err instanceof MigratorError)) throw err;

    logger.error(
      { runId: context.runId, phase, ...err.toJSON() },
      "Run aborted",
    );
    return finish({ kind: "fatal", phase, error: err, result, audit });
  }
}
