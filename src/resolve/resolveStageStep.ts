import type { Build } from "../drone/types.js";

export type StageStepResolution =
  | { found: true; stageNumber: number; stepNumber: number; status: string }
  | { found: false };

/**
 * Resolve a named stage and step into the numbers the logs endpoint needs.
 * Stage names are unique within a build, so once the stage matches its steps
 * are the only candidates; a missing step there is a failed lookup, not a
 * reason to keep scanning later stages.
 */
export function resolveStageStep(
  build: Build,
  stageName: string,
  stepName: string,
): StageStepResolution {
  const stage = build.stages.find((s) => s.name === stageName);
  if (!stage) return { found: false };

  const step = stage.steps.find((s) => s.name === stepName);
  if (!step) return { found: false };

  return {
    found: true,
    stageNumber: stage.number,
    stepNumber: step.number,
    status: step.status,
  };
}
