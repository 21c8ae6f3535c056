#!/usr/bin/env node
import { createRequire } from "node:module";
import { z } from "zod";
import {
  loadConfig,
  resolveRootPath,
  ROOT_PATH_ENV,
} from "@blob-tier-migrator/core/config";
import { exitCodeFor, runMigration } from "@blob-tier-migrator/core/run";
import { HELP, parseCliArgs } from "./args.js";
import { createMigrationRun } from "./bootstrap.js";
import { formatFailure, formatOutcome } from "./report.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

async function main(argv: string[]): Promise<number> {
  const cli = parseCliArgs(argv);

  if (cli.help) {
    console.log(HELP);
    return 0;
  }
  if (cli.version) {
    console.log(pkg.version);
    return 0;
  }

  const rootPath = resolveRootPath(cli.rootPath ?? process.env[ROOT_PATH_ENV]);
  const config = await loadConfig({ rootPath, configPath: cli.configPath });

  const controller = new AbortController();
  const run = createMigrationRun(config, cli.overrides, {
    rootPath,
    yes: cli.yes,
    logLevel: cli.logLevel,
    signal: controller.signal,
    onInterrupt: () => onSignal("SIGINT"),
  });
  const { logger } = run;

  // First signal stops scheduling; in-flight tier changes are allowed to settle.
  function onSignal(signal: NodeJS.Signals): void {
    logger.warn({ signal }, "Stop requested, finishing in-flight work");
    controller.abort();
  }
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const outcome = await runMigration(run.context, run.deps);
    const report = formatOutcome(outcome);
    if (outcome.kind === "fatal") console.error(report);
    else console.log(report);
    return exitCodeFor(outcome);
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(formatFailure(err));
    process.exitCode = 1;
  },
);
