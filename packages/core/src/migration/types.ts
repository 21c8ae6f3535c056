import type { BlobRecord } from "../blobs/types.js";
import type { PerObjectMigrationError } from "../errors/catalog.js";
import type { RehydratePriority, StorageTier } from "../schemas/migrator-config.js";

export interface MigrationRequest {
  targetTier: StorageTier;
  /** Only meaningful when an object leaves Archive. */
  rehydratePriority: RehydratePriority;
}

export interface MigrationFailure {
  record: BlobRecord;
  error: PerObjectMigrationError;
}

export interface MigrationResult {
  /** Enumeration order. */
  succeeded: BlobRecord[];
  /** Enumeration order. */
  failed: MigrationFailure[];
  /** Never attempted because the run was cancelled. */
  notAttempted: BlobRecord[];
}

export interface MigrationProgress {
  completed: number;
  total: number;
  record: BlobRecord;
  ok: boolean;
}
