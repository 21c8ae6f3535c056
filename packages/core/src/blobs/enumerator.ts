import type { Logger } from "pino";
import type {
  ObjectStoreProvider,
  RawObjectMetadata,
} from "../storage/adapters/interface.js";
import { EnumerationError } from "../errors/catalog.js";
import type {
  BlobRecord,
  BlobTier,
  RehydrationStatus,
  StorageTier,
} from "./types.js";

export interface BlobEnumeratorDeps {
  provider: ObjectStoreProvider;
  logger: Logger;
}

export interface BlobEnumerator {
  /**
   * Fully buffered listing of a container, annotated with tier and
   * modification metadata. Throws EnumerationError on any provider failure;
   * a partial listing is never returned.
   */
  listBlobs(
    container: string,
    tierFilter: StorageTier,
    signal?: AbortSignal,
  ): Promise<BlobRecord[]>;
}

const KNOWN_TIERS: ReadonlySet<string> = new Set(["Hot", "Cool", "Cold", "Archive"]);

function isKnownTier(value: string): value is StorageTier {
  return KNOWN_TIERS.has(value);
}

function toTier(value: string | undefined): BlobTier {
  return value !== undefined && isKnownTier(value) ? value : "Unknown";
}

/** Missing → null; unparseable → an invalid Date, left for the filter to reject. */
function toDate(value: Date | string | undefined): Date | null {
  if (value === undefined) return null;
  return value instanceof Date ? value : new Date(value);
}

function toRehydrationStatus(
  raw: RawObjectMetadata,
  tier: BlobTier,
): RehydrationStatus {
  if (raw.archiveStatus?.startsWith("rehydrate-pending")) return "Pending";
  if (raw.rehydratePriority !== undefined && tier !== "Archive") {
    return "Complete";
  }
  return "None";
}

export function toBlobRecord(
  container: string,
  raw: RawObjectMetadata,
): BlobRecord {
  const tier = toTier(raw.accessTier);
  return Object.freeze({
    container,
    name: raw.name,
    ...(raw.versionId !== undefined && { versionId: raw.versionId }),
    tier,
    lastModified: toDate(raw.lastModified),
    lastAccessed: toDate(raw.lastAccessedOn),
    contentLength: raw.contentLength ?? 0,
    rehydrationStatus: toRehydrationStatus(raw, tier),
    etag: raw.etag ?? "",
    tags: Object.freeze({ ...raw.tags }),
  });
}

export function createBlobEnumerator(deps: BlobEnumeratorDeps): BlobEnumerator {
  const { provider, logger } = deps;

  return {
    async listBlobs(container, tierFilter, signal) {
      const records: BlobRecord[] = [];
      logger.info({ container, tier: tierFilter }, "Listing objects");

      try {
        for await (const raw of provider.listObjects(
          container,
          { tier: tierFilter },
          signal,
        )) {
          const record = toBlobRecord(container, raw);
          records.push(record);
          logger.debug(
            {
              name: record.name,
              versionId: record.versionId,
              tier: record.tier,
              lastModified: record.lastModified,
              contentLength: record.contentLength,
              rehydrationStatus: record.rehydrationStatus,
            },
            "Enumerated object",
          );
        }
      } catch (err) {
        throw new EnumerationError(container, records.length, err);
      }

      logger.info(
        { container, tier: tierFilter, count: records.length },
        "Listing complete",
      );
      return records;
    },
  };
}
