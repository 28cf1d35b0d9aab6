// Cross-cutting utilities shared by every diagweave package.

export {
  configureDebug,
  debug,
  formatDebugValue,
  getDebugChannel,
  isDebugEnabled,
  refreshDebugChannels,
  DEBUG_ENV_VAR,
  type Debug,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./debug.js";

export { displayPath, fsPathFromUri, isFileUri } from "./paths.js";
