import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "blob-tier-migrator");

/** Environment variable that overrides the root directory. */
export const ROOT_PATH_ENV = "BLOB_TIER_MIGRATOR_ROOT_PATH";
