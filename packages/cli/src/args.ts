import { parseArgs } from "node:util";
import type { RunOverrides } from "@blob-tier-migrator/core/config";
import { ConfigurationError } from "@blob-tier-migrator/core/errors";
import { LogLevelSchema, type LogLevel } from "@blob-tier-migrator/core/schemas";

export const HELP = `Usage: blob-tier-migrator [options]

Move blobs of one access tier, modified inside a time window, to another tier.
Every run writes a CSV of the candidates before asking for confirmation and a
CSV of the migrated (and failed) objects afterwards.

Scope (fall back to config.json):
  --tenant <id>              Entra ID tenant the session must use
  --subscription <id>        Subscription that owns the storage account
  --account <name>           Storage account name
  --endpoint <url>           Blob service URL (default: https://<account>.blob.core.windows.net)
  --container <name>         Container to scan

Selection:
  --tier <tier>              Tier to select: Hot, Cool, Cold or Archive (default: Archive)
  --start <date>             Window start, ISO date or timestamp (inclusive)
  --end <date>               Window end, ISO date or timestamp (inclusive)
  --older-than-days <n>      Select objects last modified at least n days ago

Migration:
  --target-tier <tier>       Tier to move to (default: Hot)
  --priority <priority>      Rehydrate priority when leaving Archive: Standard or High
  --concurrency <n>          Parallel tier changes (default: 1)
  -y, --yes                  Skip the confirmation prompt

General:
  --audit-dir <path>         Audit CSV directory (default: <root>/audit)
  --config <path>            Config file (default: <root>/config.json)
  --root <path>              Root directory (default: ~/blob-tier-migrator)
  --log-level <level>        fatal, error, warn, info or debug
  -h, --help                 Show help
  -v, --version              Show version

Exit codes: 0 done or nothing to do, 1 fatal error, 2 some objects failed,
130 interrupted.

Examples:
  blob-tier-migrator --container archive-logs --start 2024-04-01 --end 2024-04-30
  blob-tier-migrator --container archive-logs --older-than-days 90 --target-tier Cool`;

export interface CliOptions {
  help: boolean;
  version: boolean;
  yes: boolean;
  configPath?: string;
  rootPath?: string;
  logLevel?: LogLevel;
  overrides: RunOverrides;
}

function parseInteger(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ConfigurationError(`${flag} expects a whole number`, { [flag]: value });
  }
  return Number.parseInt(value, 10);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const parsed = LogLevelSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(`Unsupported log level "${value}"`, {
      "--log-level": value,
    });
  }
  return parsed.data;
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      tenant: { type: "string" },
      subscription: { type: "string" },
      account: { type: "string" },
      endpoint: { type: "string" },
      container: { type: "string" },
      tier: { type: "string" },
      "target-tier": { type: "string" },
      priority: { type: "string" },
      start: { type: "string" },
      end: { type: "string" },
      "older-than-days": { type: "string" },
      concurrency: { type: "string" },
      yes: { type: "boolean", short: "y", default: false },
      "audit-dir": { type: "string" },
      config: { type: "string" },
      root: { type: "string" },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: false,
  });
}

export function parseCliArgs(argv: string[]): CliOptions {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (err) {
    // Unknown flags and missing values surface as TypeErrors from parseArgs.
    if (err instanceof TypeError) throw new ConfigurationError(err.message);
    throw err;
  }
  const { values } = parsed;

  return {
    help: values.help === true,
    version: values.version === true,
    yes: values.yes === true,
    configPath: values.config,
    rootPath: values.root,
    logLevel: parseLogLevel(values["log-level"]),
    overrides: {
      tenantId: values.tenant,
      subscriptionId: values.subscription,
      accountName: values.account,
      endpoint: values.endpoint,
      container: values.container,
      sourceTier: values.tier,
      targetTier: values["target-tier"],
      rehydratePriority: values.priority,
      concurrency: parseInteger("--concurrency", values.concurrency),
      auditDir: values["audit-dir"],
      window: {
        start: values.start,
        end: values.end,
        olderThanDays: parseInteger("--older-than-days", values["older-than-days"]),
      },
    },
  };
}
