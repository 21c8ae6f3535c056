import {
  RehydratePrioritySchema,
  StorageTierSchema,
  type MigratorConfig,
  type RehydratePriority,
  type StorageTier,
} from "../schemas/migrator-config.js";
import { ConfigurationError, InvalidTimeWindowError } from "../errors/catalog.js";
import { blobEndpointFor } from "../storage/adapters/azure.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export interface TimeWindowInput {
  start?: string;
  end?: string;
  olderThanDays?: number;
}

/** Values given on the command line. Each one wins over config.json. */
export interface RunOverrides {
  tenantId?: string;
  subscriptionId?: string;
  accountName?: string;
  endpoint?: string;
  container?: string;
  sourceTier?: string;
  targetTier?: string;
  rehydratePriority?: string;
  concurrency?: number;
  auditDir?: string;
  window: TimeWindowInput;
}

export interface ResolvedRunOptions {
  tenantId: string;
  subscriptionId: string;
  account: string;
  endpoint: string;
  container: string;
  window: { startTime: Date; endTime: Date };
  tierFilter: StorageTier;
  migration: { targetTier: StorageTier; rehydratePriority: RehydratePriority };
  concurrency: number;
  auditDir: string;
  discoveryRetries: number;
  affirmativeTokens: readonly string[];
}

function parseBound(
  flag: string,
  input: string,
  edge: "start" | "end",
): Date {
  const iso = DATE_ONLY.test(input)
    ? `${input}T${edge === "start" ? "00:00:00.000" : "23:59:59.999"}Z`
    : input;
  const date = new Date(iso);
  // A date-only value that rolls over (2024-02-30) is not a real day.
  if (
    Number.isNaN(date.getTime()) ||
    (iso !== input && date.toISOString().slice(0, 10) !== input)
  ) {
    throw new ConfigurationError(`${flag} is not a valid date`, { [flag]: input });
  }
  return date;
}

/**
 * Turns either an explicit start/end pair or an age cutoff into a window.
 * A date-only start covers that whole UTC day, as does a date-only end.
 * A missing start means the epoch and a missing end means `now`.
 */
export function resolveTimeWindow(
  input: TimeWindowInput,
  now: Date = new Date(),
): { startTime: Date; endTime: Date } {
  const explicit = input.start !== undefined || input.end !== undefined;

  if (explicit && input.olderThanDays !== undefined) {
    throw new ConfigurationError(
      "Use either --start/--end or --older-than-days, not both",
    );
  }

  if (input.olderThanDays !== undefined) {
    const days = input.olderThanDays;
    if (!Number.isInteger(days) || days < 0) {
      throw new ConfigurationError(
        "--older-than-days must be a non-negative integer",
        { olderThanDays: days },
      );
    }
    return {
      startTime: new Date(0),
      endTime: new Date(now.getTime() - days * DAY_MS),
    };
  }

  if (!explicit) {
    throw new ConfigurationError(
      "A time window is required: pass --start/--end or --older-than-days",
    );
  }

  const startTime =
    input.start !== undefined ? parseBound("--start", input.start, "start") : new Date(0);
  const endTime =
    input.end !== undefined ? parseBound("--end", input.end, "end") : now;

  if (startTime.getTime() > endTime.getTime()) {
    throw new InvalidTimeWindowError(startTime, endTime);
  }
  return { startTime, endTime };
}

function parseTier(field: string, value: string): StorageTier {
  const parsed = StorageTierSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Unsupported ${field} "${value}"`, { [field]: value });
  }
  return parsed.data;
}

function parsePriority(value: string): RehydratePriority {
  const parsed = RehydratePrioritySchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Unsupported priority "${value}"`, { priority: value });
  }
  return parsed.data;
}

/**
 * Merges command-line overrides over the loaded config and checks that
 * every value a run needs is present.
 */
export function resolveRunOptions(
  config: MigratorConfig,
  overrides: RunOverrides,
  now: Date = new Date(),
): ResolvedRunOptions {
  const tenantId = overrides.tenantId ?? config.azure.tenantId;
  const subscriptionId = overrides.subscriptionId ?? config.azure.subscriptionId;
  const account = overrides.accountName ?? config.azure.accountName;
  const container = overrides.container ?? config.azure.container;

  const missing = [
    tenantId === undefined && "tenant",
    subscriptionId === undefined && "subscription",
    account === undefined && "account",
    container === undefined && "container",
  ].filter((name): name is string => name !== false);

  if (
    tenantId === undefined ||
    subscriptionId === undefined ||
    account === undefined ||
    container === undefined
  ) {
    throw new ConfigurationError(
      `Missing required settings: ${missing.join(", ")}`,
      { missing },
    );
  }

  const tierFilter =
    overrides.sourceTier !== undefined
      ? parseTier("tier", overrides.sourceTier)
      : config.migration.sourceTier;
  const targetTier =
    overrides.targetTier !== undefined
      ? parseTier("target tier", overrides.targetTier)
      : config.migration.targetTier;
  const rehydratePriority =
    overrides.rehydratePriority !== undefined
      ? parsePriority(overrides.rehydratePriority)
      : config.migration.rehydratePriority;

  const concurrency = overrides.concurrency ?? config.migration.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError("--concurrency must be a positive integer", {
      concurrency,
    });
  }

  return {
    tenantId,
    subscriptionId,
    account,
    endpoint: overrides.endpoint ?? config.azure.endpoint ?? blobEndpointFor(account),
    container,
    window: resolveTimeWindow(overrides.window, now),
    tierFilter,
    migration: { targetTier, rehydratePriority },
    concurrency,
    auditDir: overrides.auditDir ?? config.audit.dir,
    discoveryRetries: config.audit.discoveryRetries,
    affirmativeTokens: config.confirmation.affirmativeTokens,
  };
}
