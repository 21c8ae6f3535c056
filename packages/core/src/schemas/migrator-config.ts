import { z } from "zod";

export const DEFAULTS = {
  azure: {},
  migration: {
    sourceTier: "Archive" as const,
    targetTier: "Hot" as const,
    rehydratePriority: "Standard" as const,
    concurrency: 1,
  },
  audit: {
    dir: "audit",
    discoveryRetries: 1,
  },
  confirmation: {
    affirmativeTokens: ["y", "Y"],
  },
  logging: {
    level: "info" as const,
    pretty: false,
    file: "logs/migrator.log",
  },
};

export const StorageTierSchema = z.enum(["Hot", "Cool", "Cold", "Archive"]);

export const RehydratePrioritySchema = z.enum(["Standard", "High"]);

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug"]);

export const AzureConfigSchema = z.object({
  tenantId: z.string().min(1).optional().describe("Entra ID tenant the session must be scoped to"),
  subscriptionId: z.string().min(1).optional(),
  accountName: z.string().min(3).max(24).optional(),
  endpoint: z
    .url()
    .optional()
    .describe("Blob service URL; defaults to https://{accountName}.blob.core.windows.net"),
  container: z.string().min(3).max(63).optional(),
});

export const MigratorConfigSchema = z.object({
  azure: AzureConfigSchema.default(DEFAULTS.azure),
  migration: z
    .object({
      sourceTier: StorageTierSchema.default(DEFAULTS.migration.sourceTier),
      targetTier: StorageTierSchema.default(DEFAULTS.migration.targetTier),
      rehydratePriority: RehydratePrioritySchema.default(
        DEFAULTS.migration.rehydratePriority,
      ),
      concurrency: z
        .number()
        .int()
        .min(1)
        .max(32)
        .default(DEFAULTS.migration.concurrency),
    })
    .default(DEFAULTS.migration),
  audit: z
    .object({
      dir: z.string().min(1).default(DEFAULTS.audit.dir),
      discoveryRetries: z
        .number()
        .int()
        .min(0)
        .max(5)
        .default(DEFAULTS.audit.discoveryRetries),
    })
    .default(DEFAULTS.audit),
  confirmation: z
    .object({
      affirmativeTokens: z
        .array(z.string().min(1))
        .min(1)
        .default(DEFAULTS.confirmation.affirmativeTokens),
    })
    .default(DEFAULTS.confirmation),
  logging: z
    .object({
      level: LogLevelSchema.default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
      file: z.string().min(1).nullable().default(DEFAULTS.logging.file),
    })
    .default(DEFAULTS.logging),
});

export type MigratorConfig = z.infer<typeof MigratorConfigSchema>;
export type AzureConfig = MigratorConfig["azure"];
export type LoggingConfig = MigratorConfig["logging"];
export type StorageTier = z.infer<typeof StorageTierSchema>;
export type RehydratePriority = z.infer<typeof RehydratePrioritySchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
