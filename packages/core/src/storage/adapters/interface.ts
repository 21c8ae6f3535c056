import type { RehydratePriority, StorageTier } from "../../schemas/migrator-config.js";

/**
 * Object metadata as the provider reports it, before normalisation.
 * Field names follow the Blob service listing.
 */
export interface RawObjectMetadata {
  name: string;
  versionId?: string;
  accessTier?: string;
  lastModified?: Date | string;
  lastAccessedOn?: Date | string;
  contentLength?: number;
  archiveStatus?: string;
  rehydratePriority?: string;
  etag?: string;
  tags?: Record<string, string>;
}

export interface ListObjectsFilter {
  /** Only yield objects currently in this tier. */
  tier?: StorageTier;
}

export interface SetTierOptions {
  /** Only sent when the object is leaving Archive. */
  rehydratePriority?: RehydratePriority;
  versionId?: string;
}

/**
 * Object-store capability used by the enumerator and the executor.
 * Implementations throw on provider failure.
 */
export interface ObjectStoreProvider {
  /**
   * Stream every object in a container, page by page.
   * @param filter - predicate applied as close to the provider as it allows
   */
  listObjects(
    container: string,
    filter?: ListObjectsFilter,
    signal?: AbortSignal,
  ): AsyncIterable<RawObjectMetadata>;

  /**
   * Request a tier change for a single object.
   * @throws the provider's error when the request is rejected
   */
  setTier(
    container: string,
    objectName: string,
    targetTier: StorageTier,
    options?: SetTierOptions,
  ): Promise<void>;
}
