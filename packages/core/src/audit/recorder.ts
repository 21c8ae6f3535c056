import { randomUUID } from "node:crypto";
import { link, mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { BlobRecord } from "../blobs/types.js";
import { AuditWriteError, type AuditPhase } from "../errors/catalog.js";
import type { MigrationFailure } from "../migration/types.js";
import { AUDIT_COLUMNS, recordToRow, toCsv } from "./csv.js";

/** Write-once evidence of what a run saw or changed. */
export interface AuditBatch {
  readonly phase: AuditPhase;
  readonly createdAt: Date;
  readonly records: readonly BlobRecord[];
  readonly path: string;
}

export interface AuditRecorderOptions {
  dir: string;
  account: string;
  container: string;
  /** Default: () => new Date() */
  now?: () => Date;
}

export interface AuditRecorder {
  record(
    phase: Exclude<AuditPhase, "failed">,
    records: readonly BlobRecord[],
  ): Promise<AuditBatch>;

  /** Failed-set artifact: the audit columns plus the error message. */
  recordFailures(failures: readonly MigrationFailure[]): Promise<AuditBatch>;
}

function artifactName(
  account: string,
  container: string,
  phase: AuditPhase,
  createdAt: Date,
): string {
  const stamp = createdAt.toISOString().replace(/[:.]/g, "-");
  return `${account}-${container}-${phase}-${stamp}.csv`;
}

export function createAuditRecorder(options: AuditRecorderOptions): AuditRecorder {
  const { dir, account, container } = options;
  const now = options.now ?? (() => new Date());
  let lastCreatedAt: number | null = null;

  /** Strictly increasing across this recorder's batches, even if the clock stalls. */
  function nextTimestamp(): Date {
    let next = now().getTime();
    if (lastCreatedAt !== null && next <= lastCreatedAt) {
      next = lastCreatedAt + 1;
    }
    lastCreatedAt = next;
    return new Date(next);
  }

  async function writeBatch(
    phase: AuditPhase,
    header: readonly string[],
    rows: string[][],
    records: readonly BlobRecord[],
  ): Promise<AuditBatch> {
    const createdAt = nextTimestamp();
    const path = join(dir, artifactName(account, container, phase, createdAt));
    const tmp = `${path}.${randomUUID()}.tmp`;
    let wroteTmp = false;

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmp, toCsv(header, rows), { encoding: "utf-8", flag: "wx" });
      wroteTmp = true;
      // link() refuses an existing target, so an artifact is never partial or replaced
      await link(tmp, path);
    } catch (err) {
      throw new AuditWriteError(phase, path, err);
    } finally {
      if (wroteTmp) await rm(tmp, { force: true });
    }

    return Object.freeze({
      phase,
      createdAt,
      records: Object.freeze([...records]),
      path,
    });
  }

  return {
    record(phase, records) {
      return writeBatch(phase, AUDIT_COLUMNS, records.map(recordToRow), records);
    },

    recordFailures(failures) {
      return writeBatch(
        "failed",
        [...AUDIT_COLUMNS, "error"],
        failures.map(({ record, error }) => [...recordToRow(record), error.message]),
        failures.map(({ record }) => record),
      );
    },
  };
}
