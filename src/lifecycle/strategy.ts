import { fatal } from "../errors.js";
import type { HostComment } from "../github/types.js";
import { removeStaleComments } from "./cleanup.js";
import type {
  CleanupReport,
  CommentOrder,
  PublishRequest,
  PublishResult,
  PublishStrategy,
} from "./types.js";

function nothingRemoved(): CleanupReport {
  return { deleted: [], failures: [] };
}

function createComment(req: PublishRequest): Promise<HostComment> {
  return fatal("PUBLISH", "failed to create comment", () =>
    req.codeHost.createComment(req.target, req.body),
  );
}

/** Remove stale comments, then post. */
export const deleteThenCreate: PublishStrategy = {
  order: "delete-then-create",
  async publish(req: PublishRequest): Promise<PublishResult> {
    const cleanup = req.keep
      ? nothingRemoved()
      : await removeStaleComments(req.codeHost, req.target, req.author, req.labels, req.log);
    const comment = await createComment(req);
    return { comment, cleanup };
  },
};

/** Post first, then remove stale comments other than the one just posted. */
export const createThenDelete: PublishStrategy = {
  order: "create-then-delete",
  async publish(req: PublishRequest): Promise<PublishResult> {
    const comment = await createComment(req);
    const cleanup = req.keep
      ? nothingRemoved()
      : await removeStaleComments(
          req.codeHost,
          req.target,
          req.author,
          req.labels,
          req.log,
          comment.id,
        );
    return { comment, cleanup };
  },
};

const STRATEGIES: Record<CommentOrder, PublishStrategy> = {
  "delete-then-create": deleteThenCreate,
  "create-then-delete": createThenDelete,
};

export function strategyFor(order: CommentOrder): PublishStrategy {
  return STRATEGIES[order];
}
