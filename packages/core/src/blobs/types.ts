import type { StorageTier } from "../schemas/migrator-config.js";

export type { StorageTier } from "../schemas/migrator-config.js";

/** Provider tier, with `Unknown` for values outside the known tiers. */
export type BlobTier = StorageTier | "Unknown";

export type RehydrationStatus = "None" | "Pending" | "Complete";

/**
 * Snapshot of one object as the enumerator saw it. Never updated after
 * capture; it does not follow the object's live state.
 */
export interface BlobRecord {
  readonly container: string;
  readonly name: string;
  readonly versionId?: string;
  readonly tier: BlobTier;
  /** Authoritative for window filtering. `null` when the provider omitted it. */
  readonly lastModified: Date | null;
  readonly lastAccessed: Date | null;
  readonly contentLength: number;
  readonly rehydrationStatus: RehydrationStatus;
  readonly etag: string;
  readonly tags: Readonly<Record<string, string>>;
}

export interface TierFilterCriteria {
  tierFilter: StorageTier;
  /** Inclusive. */
  startTime: Date;
  /** Inclusive. */
  endTime: Date;
}
