export {
  createConfirmationGate,
  formatBytes,
  formatSummary,
  DEFAULT_AFFIRMATIVE_TOKENS,
  type ConfirmationGate,
  type ConfirmationGateOptions,
  type ConfirmationSummary,
} from "./gate.js";
export {
  createReadlineConfirmationSource,
  createStaticConfirmationSource,
  type ConfirmationSource,
  type ReadlineSourceOptions,
} from "./sources.js";
