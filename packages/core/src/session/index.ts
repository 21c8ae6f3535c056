export type { SessionInfo, SessionProvider } from "./types.js";
export {
  createSessionGuard,
  type SessionGuard,
  type SessionGuardDeps,
} from "./guard.js";
export {
  createAzureCliSessionProvider,
  spawnCommand,
  type AzureCliSessionProviderOptions,
  type CommandOptions,
  type CommandResult,
  type CommandRunner,
} from "./azure-cli.js";
