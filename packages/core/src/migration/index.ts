export type {
  MigrationFailure,
  MigrationProgress,
  MigrationRequest,
  MigrationResult,
} from "./types.js";
export {
  createTierMigrationExecutor,
  type MigrateOptions,
  type TierMigrationExecutor,
  type TierMigrationExecutorDeps,
} from "./executor.js";
