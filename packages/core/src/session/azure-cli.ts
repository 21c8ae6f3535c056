/**
 * Session provider backed by the Azure CLI's token cache.
 *
 * - `az account show` reads the active session (non-zero exit = signed out)
 * - `az login --tenant` runs the interactive sign-in on the operator's terminal
 * - `az account set --subscription` switches the active subscription
 */

import { spawn } from "node:child_process";
import { z } from "zod";
import type { SessionInfo, SessionProvider } from "./types.js";

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** Inherit the terminal so the command can prompt the operator. */
  interactive?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export interface AzureCliSessionProviderOptions {
  /** Default: "az" */
  command?: string;
  run?: CommandRunner;
}

const AccountShowSchema = z.object({
  id: z.string().min(1),
  tenantId: z.string().min(1),
  user: z.object({ name: z.string() }).optional(),
});

/** Runs a command and collects its output. Rejects only when it cannot start. */
export const spawnCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: options?.interactive ? "inherit" : ["ignore", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    child.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf-8");
    });
    child.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf-8");
    });
    child.once("error", reject);
    child.once("close", (code) => {
      resolve({ exitCode: code ?? 1, stdout, stderr });
    });
  });

function failure(action: string, result: CommandResult): Error {
  const reason = result.stderr.trim() || `exit code ${result.exitCode}`;
  return new Error(`${action} failed: ${reason}`);
}

export function createAzureCliSessionProvider(
  options?: AzureCliSessionProviderOptions,
): SessionProvider {
  const command = options?.command ?? "az";
  const run = options?.run ?? spawnCommand;

  return {
    async getCurrentSession(): Promise<SessionInfo | null> {
      const result = await run(command, ["account", "show", "--output", "json"]);
      if (result.exitCode !== 0) return null;

      const parsed = AccountShowSchema.safeParse(JSON.parse(result.stdout));
      if (!parsed.success) {
        throw new Error(`Unexpected "az account show" output: ${parsed.error.message}`);
      }
      return {
        tenantId: parsed.data.tenantId,
        subscriptionId: parsed.data.id,
        ...(parsed.data.user && { user: parsed.data.user.name }),
      };
    },

    async login(tenantId) {
      const result = await run(
        command,
        ["login", "--tenant", tenantId, "--output", "none"],
        { interactive: true },
      );
      if (result.exitCode !== 0) throw failure("az login", result);
    },

    async setActiveScope(subscriptionId) {
      const result = await run(command, [
        "account",
        "set",
        "--subscription",
        subscriptionId,
      ]);
      if (result.exitCode !== 0) throw failure("az account set", result);
    },
  };
}
