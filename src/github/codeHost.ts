/**
 * GitHub adapter over @octokit/rest. PR comments are issue comments.
 */

import { Octokit } from "@octokit/rest";
import type { CodeHost, HostComment, HostUser, PullRequestTarget } from "./types.js";

const USER_AGENT = "drone-step-comment/1.0";
const PER_PAGE = 100;

interface RawComment {
  id: number;
  body?: string | null;
  html_url: string;
  user: { login: string } | null;
}

function toHostComment(c: RawComment): HostComment {
  return {
    id: c.id,
    author: c.user?.login ?? "",
    body: typeof c.body === "string" ? c.body : "",
    url: c.html_url,
  };
}

export function createOctokit(token: string, fetchImpl?: typeof fetch): Octokit {
  return new Octokit({
    auth: token,
    userAgent: USER_AGENT,
    ...(fetchImpl ? { request: { fetch: fetchImpl } } : {}),
  });
}

export class GitHubCodeHost implements CodeHost {
  constructor(private readonly octokit: Octokit) {}

  async currentUser(): Promise<HostUser> {
    const { data } = await this.octokit.users.getAuthenticated();
    return { login: data.login };
  }

  async listComments(target: PullRequestTarget): Promise<HostComment[]> {
    const comments = await this.octokit.paginate(this.octokit.issues.listComments, {
      owner: target.owner,
      repo: target.repo,
      issue_number: target.pullRequest,
      per_page: PER_PAGE,
    });
    return comments.map(toHostComment);
  }

  async createComment(target: PullRequestTarget, body: string): Promise<HostComment> {
    const { data } = await this.octokit.issues.createComment({
      owner: target.owner,
      repo: target.repo,
      issue_number: target.pullRequest,
      body,
    });
    return toHostComment(data);
  }

  async deleteComment(owner: string, repo: string, commentId: number): Promise<void> {
    await this.octokit.issues.deleteComment({ owner, repo, comment_id: commentId });
  }
}
