export { runCommentLifecycle, labelsFor, policySkipReason } from "./controller.js";
export { findStaleComments, removeStaleComments } from "./cleanup.js";
export { deleteThenCreate, createThenDelete, strategyFor } from "./strategy.js";
export {
  buildLabelMarkers,
  parseLabelMarkers,
  hasLabelMarkers,
  MARKER_PREFIX,
  MARKER_SUFFIX,
} from "./marker.js";
export type { Labels } from "./marker.js";
export type {
  PluginConfig,
  CommentPolicy,
  CommentOrder,
  Collaborators,
  LifecycleDeps,
  LifecycleOutcome,
  SkipReason,
  CleanupFailure,
  CleanupReport,
  PublishRequest,
  PublishResult,
  PublishStrategy,
} from "./types.js";
