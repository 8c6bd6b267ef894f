/**
 * Comment renderer. Maps a TemplateContext onto the compiled comment template.
 */

import { STATUS_PASSING } from "../drone/types.js";
import { buildLabelMarkers } from "../lifecycle/marker.js";
import { COMMENT_TEMPLATE, type CommentFields } from "./commentTemplate.js";
import { renderTemplate, type TemplateValues } from "./template.js";
import type { TemplateContext } from "./types.js";

const GITHUB_URL = "https://github.com";
const SHORT_SHA_LENGTH = 7;
const GLYPH_PASSING = ":white_check_mark:";
const GLYPH_NOT_PASSING = ":x:";

export function shortSha(sha: string): string {
  return sha.slice(0, SHORT_SHA_LENGTH);
}

/** Link to the step's page in the Drone UI. */
export function buildUrl(ctx: TemplateContext): string {
  return [
    ctx.droneServer,
    ctx.repoOwner,
    ctx.repoName,
    ctx.buildNumber,
    ctx.stageNumber,
    ctx.stepNumber,
  ].join("/");
}

export function commitUrl(ctx: TemplateContext): string {
  return `${GITHUB_URL}/${ctx.repoOwner}/${ctx.repoName}/pull/${ctx.pullRequest}/commits/${ctx.sha}`;
}

export function commentValues(ctx: TemplateContext): TemplateValues<CommentFields> {
  return {
    markers: buildLabelMarkers(ctx.labels),
    glyph: ctx.status === STATUS_PASSING ? GLYPH_PASSING : GLYPH_NOT_PASSING,
    buildUrl: buildUrl(ctx),
    buildNumber: String(ctx.buildNumber),
    stageName: ctx.stageName,
    stepName: ctx.stepName,
    status: ctx.status,
    shortSha: shortSha(ctx.sha),
    commitUrl: commitUrl(ctx),
    logs: ctx.logs,
  };
}

export function renderComment(ctx: TemplateContext): string {
  return renderTemplate(COMMENT_TEMPLATE, commentValues(ctx));
}
