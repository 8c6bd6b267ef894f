export { hasPullRequest, loadPluginConfig, parseBool } from "./env.js";
export type { Env, Credentials, LoadResult } from "./env.js";
export {
  loadSettingsFile,
  parseSettings,
  isCommentPolicy,
  isCommentOrder,
  DEFAULT_SETTINGS_FILE,
  VALID_POLICIES,
  VALID_ORDERS,
} from "./settingsFile.js";
export type { FileSettings } from "./settingsFile.js";
