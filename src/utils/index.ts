/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists } from "./file-exists";
export { isTextFile } from "./is-text-file";
export { normalizeOutputPath } from "./output-path";

// Async utilities
export { withTimeout } from "./with-timeout";

// Config utilities
export {
  loadConfig,
  mergeConfig,
  getUserConfigPath,
  loadDefaultConfig,
} from "./load-config";

// Classes
export { Tracker } from "./tracker";
export { Logger } from "./logger";
