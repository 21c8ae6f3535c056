export {
  createRunContext,
  RunContextInputSchema,
  type RunContext,
  type RunContextInput,
  type CreateRunContextOptions,
} from "./context.js";
export {
  EXIT_CODES,
  exitCodeFor,
  type RunAudit,
  type RunOutcome,
  type RunOutcomeKind,
} from "./outcome.js";
export { runMigration, type RunDeps } from "./orchestrator.js";
