import type { Logger } from "pino";
import type { BlobRecord } from "../blobs/types.js";
import { PerObjectMigrationError } from "../errors/catalog.js";
import type { ObjectStoreProvider } from "../storage/adapters/interface.js";
import type {
  MigrationFailure,
  MigrationProgress,
  MigrationRequest,
  MigrationResult,
} from "./types.js";

export interface TierMigrationExecutorDeps {
  provider: ObjectStoreProvider;
  logger: Logger;
}

export interface MigrateOptions {
  /** Parallel requests. Default: 1 (strictly sequential) */
  concurrency?: number;
  /**
   * Stops scheduling further objects. Requests already sent are left to
   * settle so their outcome is known.
   */
  signal?: AbortSignal;
  onProgress?: (progress: MigrationProgress) => void;
}

export interface TierMigrationExecutor {
  /**
   * Issues one tier change per record. A failing object is recorded and
   * the batch continues; the executor never aborts on a single failure.
   */
  migrate(
    records: readonly BlobRecord[],
    request: MigrationRequest,
    options?: MigrateOptions,
  ): Promise<MigrationResult>;
}

type Attempt =
  | { ok: true; record: BlobRecord }
  | { ok: false; record: BlobRecord; error: PerObjectMigrationError };

export function createTierMigrationExecutor(
  deps: TierMigrationExecutorDeps,
): TierMigrationExecutor {
  const { provider, logger } = deps;

  async function attempt(
    record: BlobRecord,
    request: MigrationRequest,
  ): Promise<Attempt> {
    try {
      await provider.setTier(record.container, record.name, request.targetTier, {
        ...(record.tier === "Archive" && {
          rehydratePriority: request.rehydratePriority,
        }),
        ...(record.versionId !== undefined && { versionId: record.versionId }),
      });
      return { ok: true, record };
    } catch (err) {
      return {
        ok: false,
        record,
        error: new PerObjectMigrationError(record.name, record.versionId, err),
      };
    }
  }

  return {
    async migrate(records, request, options) {
      const total = records.length;
      const concurrency = Math.max(1, Math.floor(options?.concurrency ?? 1));
      const signal = options?.signal;
      const attempts: (Attempt | undefined)[] = new Array(total);
      let next = 0;
      let completed = 0;

      // Each worker claims the next index; results land at that index so
      // output order matches input order whatever the completion order.
      async function worker(): Promise<void> {
        while (next < total && !signal?.aborted) {
          const index = next++;
          const result = await attempt(records[index], request);
          attempts[index] = result;
          completed++;

          if (result.ok) {
            logger.info(
              { name: result.record.name, progress: `${completed} / ${total}` },
              "Tier changed",
            );
          } else {
            logger.error(
              {
                name: result.record.name,
                progress: `${completed} / ${total}`,
                error: result.error.message,
              },
              "Tier change failed",
            );
          }
          options?.onProgress?.({ completed, total, record: result.record, ok: result.ok });
        }
      }

      await Promise.all(
        Array.from({ length: Math.min(concurrency, total) }, () => worker()),
      );

      const succeeded: BlobRecord[] = [];
      const failed: MigrationFailure[] = [];
      const notAttempted: BlobRecord[] = [];
      records.forEach((record, index) => {
        const result = attempts[index];
        if (!result) notAttempted.push(record);
        else if (result.ok) succeeded.push(record);
        else failed.push({ record, error: result.error });
      });

      logger.info(
        {
          total,
          succeeded: succeeded.length,
          failed: failed.length,
          notAttempted: notAttempted.length,
          targetTier: request.targetTier,
        },
        "Migration batch finished",
      );

      return { succeeded, failed, notAttempted };
    },
  };
}
