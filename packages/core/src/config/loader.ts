import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  MigratorConfigSchema,
  type MigratorConfig,
} from "../schemas/migrator-config.js";
import { resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathFor(options?: LoadConfigOptions): string {
  return (
    options?.configPath ??
    join(resolveRootPath(options?.rootPath), "config.json")
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<MigratorConfig> {
  const configPath = configPathFor(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error && "code" in err && err.code === "ENOENT")
    ) {
      throw err;
    }
    // Missing file: defaults only
  }

  const parsed: unknown = raw !== undefined ? JSON.parse(raw) : {};
  const config = MigratorConfigSchema.parse(parsed);

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}
