export { GitHubCodeHost, createOctokit } from "./codeHost.js";
export type { CodeHost, HostComment, HostUser, PullRequestTarget } from "./types.js";
