export { runPlugin, connect } from "./plugin.js";
export type { Connect, RunPluginOptions } from "./plugin.js";
export { resolveStageStep } from "./resolve/resolveStageStep.js";
export type { StageStepResolution } from "./resolve/resolveStageStep.js";
export { curateLogs, trimBlankLines } from "./logs/curateLogs.js";
export * from "./comment/index.js";
export * from "./lifecycle/index.js";
export * from "./drone/index.js";
export * from "./github/index.js";
export * from "./config/index.js";
export { PluginError, settle, fatal, errorMessage } from "./errors.js";
export type { PluginErrorKind, Settled } from "./errors.js";
export { consoleLogger, LOG_PREFIX } from "./util/log.js";
export type { Logger } from "./util/log.js";
export { VERSION } from "./version.js";
