/**
 * Drone API shapes used by the plugin. Only the fields the comment lifecycle reads.
 */

export const STATUS_PASSING = "success";
export const STATUS_FAILING = "failure";

export type TerminalStatus = typeof STATUS_PASSING | typeof STATUS_FAILING;

export interface Step {
  id: number;
  number: number;
  name: string;
  status: string;
}

export interface Stage {
  id: number;
  number: number;
  name: string;
  status: string;
  steps: Step[];
}

export interface Build {
  id: number;
  number: number;
  status: string;
  stages: Stage[];
}

export interface LogLine {
  pos: number;
  out: string;
  time: number;
}

export interface DroneUser {
  login: string;
}

export function isTerminalStatus(status: string): status is TerminalStatus {
  return status === STATUS_PASSING || status === STATUS_FAILING;
}

/** Collaborator the lifecycle uses to read build metadata and step logs. */
export interface PipelineBackend {
  currentUser(): Promise<DroneUser>;
  fetchBuild(owner: string, repo: string, buildNumber: number): Promise<Build>;
  fetchLogs(
    owner: string,
    repo: string,
    buildNumber: number,
    stageNumber: number,
    stepNumber: number,
  ): Promise<LogLine[]>;
}
