import type { RunOverrides } from "@blob-tier-migrator/core/config";
import {
  resolveRunOptions,
  resolveUnderRoot,
} from "@blob-tier-migrator/core/config";
import { createAuditRecorder } from "@blob-tier-migrator/core/audit";
import { createBlobEnumerator } from "@blob-tier-migrator/core/blobs";
import {
  createConfirmationGate,
  createReadlineConfirmationSource,
  createStaticConfirmationSource,
} from "@blob-tier-migrator/core/confirmation";
import { createLogger, type Logger } from "@blob-tier-migrator/core/logger";
import { createTierMigrationExecutor } from "@blob-tier-migrator/core/migration";
import { createRunContext, type RunContext, type RunDeps } from "@blob-tier-migrator/core/run";
import type { LogLevel, MigratorConfig } from "@blob-tier-migrator/core/schemas";
import {
  createAzureCliSessionProvider,
  createSessionGuard,
  type SessionProvider,
} from "@blob-tier-migrator/core/session";
import {
  createAzureBlobProvider,
  createBlobServiceClient,
  type ObjectStoreProvider,
} from "@blob-tier-migrator/core/storage/adapters";
import type { Readable, Writable } from "node:stream";

export interface MigrationRunOptions {
  rootPath: string;
  yes: boolean;
  logLevel?: LogLevel;
  signal?: AbortSignal;
  /** Ctrl+C typed at the confirmation prompt */
  onInterrupt?: () => void;
  /** Default: pino per the logging config */
  logger?: Logger;
  /** Default: the Azure CLI */
  sessionProvider?: SessionProvider;
  /** Default: @azure/storage-blob against the resolved endpoint */
  objectStore?: ObjectStoreProvider;
  input?: Readable;
  output?: Writable;
  now?: () => Date;
}

export interface MigrationRun {
  context: RunContext;
  deps: RunDeps;
  logger: Logger;
  auditDir: string;
}

/** Resolves settings and wires every collaborator of one run. */
export function createMigrationRun(
  config: MigratorConfig,
  overrides: RunOverrides,
  options: MigrationRunOptions,
): MigrationRun {
  const now = options.now ?? (() => new Date());
  const resolved = resolveRunOptions(config, overrides, now());

  const logger =
    options.logger ??
    createLogger(
      { ...config.logging, level: options.logLevel ?? config.logging.level },
      {
        filePath:
          config.logging.file === null
            ? null
            : resolveUnderRoot(options.rootPath, config.logging.file),
      },
    );

  const context = createRunContext(
    {
      tenantId: resolved.tenantId,
      subscriptionId: resolved.subscriptionId,
      account: resolved.account,
      container: resolved.container,
      window: resolved.window,
      tierFilter: resolved.tierFilter,
      migration: resolved.migration,
    },
    { now },
  );

  const objectStore =
    options.objectStore ??
    createAzureBlobProvider({
      serviceClient: createBlobServiceClient({
        endpoint: resolved.endpoint,
        tenantId: resolved.tenantId,
      }),
    });

  const auditDir = resolveUnderRoot(options.rootPath, resolved.auditDir);

  if (options.yes) {
    logger.warn("Confirmation prompt skipped (--yes)");
  }
  const source = options.yes
    ? createStaticConfirmationSource(resolved.affirmativeTokens[0])
    : createReadlineConfirmationSource({
        input: options.input,
        output: options.output,
        onInterrupt: options.onInterrupt,
      });

  return {
    context,
    logger,
    auditDir,
    deps: {
      sessionGuard: createSessionGuard({
        provider: options.sessionProvider ?? createAzureCliSessionProvider(),
        logger,
      }),
      enumerator: createBlobEnumerator({ provider: objectStore, logger }),
      recorder: createAuditRecorder({
        dir: auditDir,
        account: resolved.account,
        container: resolved.container,
        now,
      }),
      gate: createConfirmationGate({
        source,
        affirmativeTokens: resolved.affirmativeTokens,
        write: (text) => {
          (options.output ?? process.stdout).write(text);
        },
      }),
      executor: createTierMigrationExecutor({ provider: objectStore, logger }),
      logger,
      signal: options.signal,
      concurrency: resolved.concurrency,
      discoveryRetries: resolved.discoveryRetries,
    },
  };
}
