export { DroneClient, DroneApiError, parseBuild, parseLogLines } from "./client.js";
export type { DroneClientOptions, FetchLike } from "./client.js";
export {
  STATUS_PASSING,
  STATUS_FAILING,
  isTerminalStatus,
} from "./types.js";
export type {
  Build,
  Stage,
  Step,
  LogLine,
  DroneUser,
  PipelineBackend,
  TerminalStatus,
} from "./types.js";
