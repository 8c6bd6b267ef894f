import type { Labels } from "../lifecycle/marker.js";

/** Everything the comment template may reference. Built once per run, then frozen. */
export interface TemplateContext {
  readonly buildNumber: number;
  /** Drone server address, e.g. https://drone.example.com */
  readonly droneServer: string;
  readonly labels: Labels;
  readonly logs: readonly string[];
  readonly pullRequest: number;
  readonly repoName: string;
  readonly repoOwner: string;
  readonly sha: string;
  readonly stageName: string;
  readonly stageNumber: number;
  readonly status: string;
  readonly stepName: string;
  readonly stepNumber: number;
}

export function createTemplateContext(fields: TemplateContext): TemplateContext {
  return Object.freeze({
    ...fields,
    labels: Object.freeze({ ...fields.labels }),
    logs: Object.freeze([...fields.logs]),
  });
}
