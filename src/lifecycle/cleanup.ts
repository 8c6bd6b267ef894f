/**
 * Stale comment removal. Best-effort throughout: a failed list or delete is
 * logged and reported, never thrown.
 */

import { errorMessage, settle } from "../errors.js";
import type { CodeHost, HostComment, PullRequestTarget } from "../github/types.js";
import type { Logger } from "../util/log.js";
import { hasLabelMarkers, type Labels } from "./marker.js";
import type { CleanupReport } from "./types.js";

/**
 * Comments this plugin instance owns: same author and carrying every label.
 * `excludeId` protects a comment that was just created.
 */
export function findStaleComments(
  comments: readonly HostComment[],
  author: string,
  labels: Labels,
  excludeId?: number,
): HostComment[] {
  return comments.filter(
    (c) =>
      c.id !== excludeId &&
      c.author === author &&
      hasLabelMarkers(c.body, labels),
  );
}

export async function removeStaleComments(
  codeHost: CodeHost,
  target: PullRequestTarget,
  author: string,
  labels: Labels,
  log: Logger,
  excludeId?: number,
): Promise<CleanupReport> {
  const report: CleanupReport = { deleted: [], failures: [] };

  const listed = await settle(() => codeHost.listComments(target));
  if (!listed.ok) {
    const message = errorMessage(listed.error);
    log(`failed to list existing comments: ${message}`);
    report.failures.push({ commentId: null, message });
    return report;
  }

  for (const comment of findStaleComments(listed.value, author, labels, excludeId)) {
    const removed = await settle(() =>
      codeHost.deleteComment(target.owner, target.repo, comment.id),
    );
    if (!removed.ok) {
      const message = errorMessage(removed.error);
      log(`failed to delete comment ${comment.url}: ${message}`);
      report.failures.push({ commentId: comment.id, message });
      continue;
    }
    log(`deleted comment ${comment.url}`);
    report.deleted.push(comment.id);
  }
  return report;
}
