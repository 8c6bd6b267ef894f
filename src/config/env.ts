/**
 * Plugin configuration from the Drone environment.
 * DRONE_* is set by Drone for every step; plugin `settings` arrive as PLUGIN_*.
 */

import { PluginError } from "../errors.js";
import type { PluginConfig } from "../lifecycle/types.js";
import {
  isCommentOrder,
  isCommentPolicy,
  parseBool,
  VALID_ORDERS,
  VALID_POLICIES,
  type FileSettings,
} from "./settingsFile.js";

export { parseBool };

export type Env = Readonly<Record<string, string | undefined>>;

export interface Credentials {
  droneServer: string;
  droneToken: string;
  githubToken: string;
}

export type LoadResult =
  | { kind: "NO_PULL_REQUEST" }
  | { kind: "READY"; config: PluginConfig; credentials: Credentials };

const MIN_SHA_LENGTH = 7;

function getEnv(env: Env, key: string): string {
  const v = env[key];
  if (v == null) return "";
  return v.trim();
}

/** False for branch, tag and promotion builds: there is no PR to comment on. */
export function hasPullRequest(env: Env): boolean {
  return getEnv(env, "DRONE_PULL_REQUEST") !== "";
}

function parsePositiveInt(key: string, value: string): number {
  if (!/^[0-9]+$/.test(value)) {
    throw new PluginError("CONFIG", `${key} is not a valid number: ${value}`);
  }
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new PluginError("CONFIG", `${key} is not a valid number: ${value}`);
  }
  return n;
}

function required(values: Record<string, string>, key: string): void {
  if (!values[key]) throw new PluginError("CONFIG", `${key} was not provided`);
}

/**
 * Validate the environment. Without a pull request there is nothing to
 * comment on and nothing else is checked. Required values are checked in a
 * fixed order: build metadata, then credentials, then stage and step.
 */
export function loadPluginConfig(env: Env, file: FileSettings = {}): LoadResult {
  if (!hasPullRequest(env)) return { kind: "NO_PULL_REQUEST" };
  const pullRequestRaw = getEnv(env, "DRONE_PULL_REQUEST");

  const values: Record<string, string> = {
    DRONE_BUILD_NUMBER: getEnv(env, "DRONE_BUILD_NUMBER"),
    DRONE_COMMIT_SHA: getEnv(env, "DRONE_COMMIT_SHA"),
    DRONE_REPO_NAME: getEnv(env, "DRONE_REPO_NAME"),
    DRONE_REPO_OWNER: getEnv(env, "DRONE_REPO_OWNER"),
    DRONE_SYSTEM_PROTO: getEnv(env, "DRONE_SYSTEM_PROTO"),
    DRONE_SYSTEM_HOSTNAME: getEnv(env, "DRONE_SYSTEM_HOSTNAME"),
    DRONE_TOKEN: getEnv(env, "DRONE_TOKEN"),
    GITHUB_TOKEN: getEnv(env, "GITHUB_TOKEN"),
    PLUGIN_STAGE: getEnv(env, "PLUGIN_STAGE") || (file.stage ?? ""),
    PLUGIN_STEP: getEnv(env, "PLUGIN_STEP") || (file.step ?? ""),
  };
  for (const key of Object.keys(values)) required(values, key);

  const buildNumber = parsePositiveInt("DRONE_BUILD_NUMBER", values.DRONE_BUILD_NUMBER);
  const pullRequest = parsePositiveInt("DRONE_PULL_REQUEST", pullRequestRaw);

  const commitSha = values.DRONE_COMMIT_SHA;
  if (commitSha.length < MIN_SHA_LENGTH) {
    throw new PluginError(
      "CONFIG",
      `DRONE_COMMIT_SHA must be at least ${MIN_SHA_LENGTH} characters: ${commitSha}`,
    );
  }

  const keepRaw = getEnv(env, "PLUGIN_KEEP");
  const verbatimRaw = getEnv(env, "PLUGIN_VERBATIM");

  const whenRaw = getEnv(env, "PLUGIN_WHEN");
  const when = whenRaw === "" ? (file.when ?? "always") : whenRaw;
  if (!isCommentPolicy(when)) {
    throw new PluginError("CONFIG", `PLUGIN_WHEN must be one of ${VALID_POLICIES.join(", ")}: ${when}`);
  }

  const orderRaw = getEnv(env, "PLUGIN_ORDER");
  const order = orderRaw === "" ? (file.order ?? "delete-then-create") : orderRaw;
  if (!isCommentOrder(order)) {
    throw new PluginError("CONFIG", `PLUGIN_ORDER must be one of ${VALID_ORDERS.join(", ")}: ${order}`);
  }

  const droneServer = `${values.DRONE_SYSTEM_PROTO}://${values.DRONE_SYSTEM_HOSTNAME}`;

  return {
    kind: "READY",
    config: {
      droneServer,
      repoOwner: values.DRONE_REPO_OWNER,
      repoName: values.DRONE_REPO_NAME,
      buildNumber,
      pullRequest,
      commitSha,
      stage: values.PLUGIN_STAGE,
      step: values.PLUGIN_STEP,
      keep: keepRaw === "" ? (file.keep ?? false) : parseBool(keepRaw),
      verbatim: verbatimRaw === "" ? (file.verbatim ?? false) : parseBool(verbatimRaw),
      when,
      order,
    },
    credentials: {
      droneServer,
      droneToken: values.DRONE_TOKEN,
      githubToken: values.GITHUB_TOKEN,
    },
  };
}
