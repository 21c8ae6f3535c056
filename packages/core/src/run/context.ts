import { randomUUID } from "node:crypto";
import { z } from "zod";
import {
  RehydratePrioritySchema,
  StorageTierSchema,
  type RehydratePriority,
  type StorageTier,
} from "../schemas/migrator-config.js";
import { ConfigurationError, InvalidTimeWindowError } from "../errors/catalog.js";

export const RunContextInputSchema = z.object({
  tenantId: z.string().min(1),
  subscriptionId: z.string().min(1),
  account: z.string().min(1),
  container: z.string().min(1),
  window: z.object({
    startTime: z.date(),
    endTime: z.date(),
  }),
  tierFilter: StorageTierSchema,
  migration: z.object({
    targetTier: StorageTierSchema,
    rehydratePriority: RehydratePrioritySchema,
  }),
});

export type RunContextInput = z.input<typeof RunContextInputSchema>;

/** Everything one run is scoped to. Built once, read-only afterwards. */
export interface RunContext {
  readonly runId: string;
  readonly startedAt: Date;
  readonly tenantId: string;
  readonly subscriptionId: string;
  readonly account: string;
  readonly container: string;
  readonly window: { readonly startTime: Date; readonly endTime: Date };
  readonly tierFilter: StorageTier;
  readonly migration: {
    readonly targetTier: StorageTier;
    readonly rehydratePriority: RehydratePriority;
  };
}

export interface CreateRunContextOptions {
  runId?: string;
  now?: () => Date;
}

export function createRunContext(
  input: RunContextInput,
  options?: CreateRunContextOptions,
): RunContext {
  const parsed = RunContextInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid run settings", {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    });
  }

  const { window, migration, ...scope } = parsed.data;

  if (window.startTime.getTime() > window.endTime.getTime()) {
    throw new InvalidTimeWindowError(window.startTime, window.endTime);
  }
  if (migration.targetTier === scope.tierFilter) {
    throw new ConfigurationError(
      `Target tier ${migration.targetTier} is the tier being selected`,
      { tierFilter: scope.tierFilter, targetTier: migration.targetTier },
    );
  }

  // Dates are copied so the caller's instances cannot change the window.
  return Object.freeze({
    runId: options?.runId ?? randomUUID(),
    startedAt: options?.now?.() ?? new Date(),
    ...scope,
    window: Object.freeze({
      startTime: new Date(window.startTime.getTime()),
      endTime: new Date(window.endTime.getTime()),
    }),
    migration: Object.freeze({ ...migration }),
  });
}
