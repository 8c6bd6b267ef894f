import { compileTemplate } from "./template.js";

export const COMMENT_FIELDS = {
  markers: "lines",
  glyph: "text",
  buildUrl: "text",
  buildNumber: "text",
  stageName: "text",
  stepName: "text",
  status: "text",
  shortSha: "text",
  commitUrl: "text",
  logs: "lines",
} as const;

export type CommentFields = typeof COMMENT_FIELDS;

const FENCE = "```";

export const COMMENT_TEMPLATE_SOURCE = [
  "{{markers}}",
  "{{glyph}} [Build #{{buildNumber}} {{stageName}}/{{stepName}}]({{buildUrl}}) {{status}} on commit [`{{shortSha}}`]({{commitUrl}})",
  "",
  `${FENCE}text`,
  "{{logs}}",
  FENCE,
].join("\n");

// Compiled at load time: a broken template stops the process before any API call.
export const COMMENT_TEMPLATE = compileTemplate("comment", COMMENT_TEMPLATE_SOURCE, COMMENT_FIELDS);
