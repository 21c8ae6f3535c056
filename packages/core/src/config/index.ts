export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export { expandHomePath, resolveRootPath, resolveUnderRoot } from "./paths.js";
export {
  resolveRunOptions,
  resolveTimeWindow,
  type RunOverrides,
  type ResolvedRunOptions,
  type TimeWindowInput,
} from "./run-options.js";
