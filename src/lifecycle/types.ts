import type { PipelineBackend } from "../drone/types.js";
import type { CodeHost, HostComment, PullRequestTarget } from "../github/types.js";
import type { Logger } from "../util/log.js";
import type { Labels } from "./marker.js";

export type CommentPolicy = "success" | "failure" | "always";

export type CommentOrder = "delete-then-create" | "create-then-delete";

/** Validated settings for one run against a pull request. */
export interface PluginConfig {
  droneServer: string;
  repoOwner: string;
  repoName: string;
  buildNumber: number;
  pullRequest: number;
  commitSha: string;
  stage: string;
  step: string;
  keep: boolean;
  verbatim: boolean;
  when: CommentPolicy;
  order: CommentOrder;
}

export interface Collaborators {
  backend: PipelineBackend;
  codeHost: CodeHost;
}

export interface LifecycleDeps extends Collaborators {
  log?: Logger;
}

export type SkipReason = "NO_PULL_REQUEST" | "STEP_PASSED" | "STEP_FAILED";

export interface CleanupFailure {
  /** Comment id, or null when listing the comments failed. */
  commentId: number | null;
  message: string;
}

export interface CleanupReport {
  deleted: number[];
  failures: CleanupFailure[];
}

export type LifecycleOutcome =
  | { kind: "SKIPPED"; reason: SkipReason }
  | {
      kind: "POSTED";
      comment: HostComment;
      deleted: number[];
      cleanupFailures: CleanupFailure[];
    };

export interface PublishRequest {
  codeHost: CodeHost;
  target: PullRequestTarget;
  /** Login that authored this plugin's earlier comments. */
  author: string;
  labels: Labels;
  body: string;
  keep: boolean;
  log: Logger;
}

export interface PublishResult {
  comment: HostComment;
  cleanup: CleanupReport;
}

/** Order in which the new comment is created and stale ones are removed. */
export interface PublishStrategy {
  readonly order: CommentOrder;
  publish(request: PublishRequest): Promise<PublishResult>;
}
