/**
 * One plugin invocation: read configuration, stop quietly outside pull
 * requests, otherwise connect to Drone and GitHub and run the comment lifecycle.
 */

import { hasPullRequest, loadPluginConfig, type Credentials, type Env } from "./config/env.js";
import { loadSettingsFile } from "./config/settingsFile.js";
import { DroneClient } from "./drone/client.js";
import { createOctokit, GitHubCodeHost } from "./github/codeHost.js";
import { runCommentLifecycle } from "./lifecycle/controller.js";
import type { Collaborators, LifecycleOutcome } from "./lifecycle/types.js";
import { consoleLogger, type Logger } from "./util/log.js";
import { VERSION } from "./version.js";

export type Connect = (credentials: Credentials) => Collaborators;

export interface RunPluginOptions {
  cwd?: string;
  log?: Logger;
}

/** Real collaborators: Drone over fetch, GitHub over Octokit. */
export function connect(credentials: Credentials): Collaborators {
  return {
    backend: new DroneClient({ server: credentials.droneServer, token: credentials.droneToken }),
    codeHost: new GitHubCodeHost(createOctokit(credentials.githubToken)),
  };
}

export async function runPlugin(
  env: Env,
  connectTo: Connect = connect,
  options: RunPluginOptions = {},
): Promise<LifecycleOutcome> {
  const log = options.log ?? consoleLogger;
  const cwd = options.cwd ?? process.cwd();
  log(`drone-step-comment version ${VERSION}`);

  if (!hasPullRequest(env)) {
    log("exiting as build is not for a pull request");
    return { kind: "SKIPPED", reason: "NO_PULL_REQUEST" };
  }

  const file = loadSettingsFile(cwd, env.PLUGIN_CONFIG?.trim());
  const loaded = loadPluginConfig(env, file);
  if (loaded.kind === "NO_PULL_REQUEST") {
    return { kind: "SKIPPED", reason: "NO_PULL_REQUEST" };
  }

  return runCommentLifecycle(loaded.config, { ...connectTo(loaded.credentials), log });
}
