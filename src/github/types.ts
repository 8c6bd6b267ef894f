export interface HostUser {
  login: string;
}

export interface HostComment {
  id: number;
  /** Login of the comment author; empty when GitHub reports no user (deleted account). */
  author: string;
  body: string;
  url: string;
}

export interface PullRequestTarget {
  owner: string;
  repo: string;
  pullRequest: number;
}

/** Collaborator the lifecycle uses to read and write pull request comments. */
export interface CodeHost {
  currentUser(): Promise<HostUser>;
  listComments(target: PullRequestTarget): Promise<HostComment[]>;
  createComment(target: PullRequestTarget, body: string): Promise<HostComment>;
  deleteComment(owner: string, repo: string, commentId: number): Promise<void>;
}
