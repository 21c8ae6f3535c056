export {
  DEFAULTS,
  AzureConfigSchema,
  LogLevelSchema,
  MigratorConfigSchema,
  RehydratePrioritySchema,
  StorageTierSchema,
  type AzureConfig,
  type LoggingConfig,
  type LogLevel,
  type MigratorConfig,
  type RehydratePriority,
  type StorageTier,
} from "./migrator-config.js";
