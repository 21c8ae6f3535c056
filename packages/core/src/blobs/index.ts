export type {
  BlobRecord,
  BlobTier,
  RehydrationStatus,
  StorageTier,
  TierFilterCriteria,
} from "./types.js";
export {
  createBlobEnumerator,
  toBlobRecord,
  type BlobEnumerator,
  type BlobEnumeratorDeps,
} from "./enumerator.js";
export { filterByWindow, type FilterOptions } from "./filter.js";
