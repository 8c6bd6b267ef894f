/**
 * Comment lifecycle for one plugin run: identity, stage/step resolution,
 * status gate, logs, render, then publish through the configured strategy.
 * Every step runs after the previous one settles; there is no fan-out.
 */

import { renderComment } from "../comment/render.js";
import { createTemplateContext } from "../comment/types.js";
import { isTerminalStatus, STATUS_FAILING, STATUS_PASSING } from "../drone/types.js";
import { fatal, PluginError } from "../errors.js";
import type { PullRequestTarget } from "../github/types.js";
import { curateLogs } from "../logs/curateLogs.js";
import { resolveStageStep } from "../resolve/resolveStageStep.js";
import { consoleLogger } from "../util/log.js";
import type { Labels } from "./marker.js";
import { strategyFor } from "./strategy.js";
import type { CommentPolicy, LifecycleDeps, LifecycleOutcome, PluginConfig, SkipReason } from "./types.js";

export function labelsFor(config: Pick<PluginConfig, "stage" | "step">): Labels {
  return { stage: config.stage, step: config.step };
}

/** Skip reason when the policy does not want a comment for this status, else null. */
export function policySkipReason(status: string, when: CommentPolicy): SkipReason | null {
  if (status === STATUS_PASSING && when === "failure") return "STEP_PASSED";
  if (status === STATUS_FAILING && when === "success") return "STEP_FAILED";
  return null;
}

export async function runCommentLifecycle(
  config: PluginConfig,
  deps: LifecycleDeps,
): Promise<LifecycleOutcome> {
  const { backend, codeHost } = deps;
  const log = deps.log ?? consoleLogger;
  const { droneServer, repoOwner, repoName, buildNumber, pullRequest } = config;

  const droneUser = await fatal("IDENTITY", "failed to fetch drone user", () => backend.currentUser());
  log(`authenticated as drone user ${droneUser.login}`);

  const githubUser = await fatal("IDENTITY", "failed to fetch github user", () => codeHost.currentUser());
  log(`authenticated as github user ${githubUser.login}`);

  log(`fetching build for ${droneServer}/${repoOwner}/${repoName}/${buildNumber}`);
  const build = await fatal("FETCH", "failed to fetch build", () =>
    backend.fetchBuild(repoOwner, repoName, buildNumber),
  );

  log(`searching for stage ${config.stage} step ${config.step}`);
  const resolved = resolveStageStep(build, config.stage, config.step);
  if (!resolved.found) {
    throw new PluginError(
      "RESOLUTION",
      `build stage "${config.stage}" and step "${config.step}" could not be found`,
    );
  }
  const { stageNumber, stepNumber, status } = resolved;

  if (!isTerminalStatus(status)) {
    throw new PluginError("STATUS", `target step status is ${status}`);
  }

  const skip = policySkipReason(status, config.when);
  if (skip) {
    log(skip === "STEP_PASSED" ? "not commenting since step passed" : "not commenting since step failed");
    return { kind: "SKIPPED", reason: skip };
  }

  log(
    `fetching logs for ${droneServer}/${repoOwner}/${repoName}/${buildNumber}/${stageNumber}/${stepNumber}`,
  );
  const lines = await fatal("FETCH", "failed to fetch logs", () =>
    backend.fetchLogs(repoOwner, repoName, buildNumber, stageNumber, stepNumber),
  );

  const labels = labelsFor(config);
  const context = createTemplateContext({
    buildNumber,
    droneServer,
    labels,
    logs: curateLogs(
      lines.map((l) => l.out),
      config.verbatim,
    ),
    pullRequest,
    repoName,
    repoOwner,
    sha: config.commitSha,
    stageName: config.stage,
    stageNumber,
    status,
    stepName: config.step,
    stepNumber,
  });
  const body = renderComment(context);
  log(`templated comment:\n${body}`);

  const target: PullRequestTarget = { owner: repoOwner, repo: repoName, pullRequest };
  const { comment, cleanup } = await strategyFor(config.order).publish({
    codeHost,
    target,
    author: githubUser.login,
    labels,
    body,
    keep: config.keep,
    log,
  });
  log(`created comment ${comment.url}`);

  return {
    kind: "POSTED",
    comment,
    deleted: cleanup.deleted,
    cleanupFailures: cleanup.failures,
  };
}
