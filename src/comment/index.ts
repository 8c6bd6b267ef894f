export { renderComment, commentValues, buildUrl, commitUrl, shortSha } from "./render.js";
export { COMMENT_TEMPLATE, COMMENT_TEMPLATE_SOURCE, COMMENT_FIELDS } from "./commentTemplate.js";
export type { CommentFields } from "./commentTemplate.js";
export { compileTemplate, renderTemplate, TemplateError } from "./template.js";
export type {
  CompiledTemplate,
  FieldKind,
  FieldSpec,
  TemplateValue,
  TemplateValues,
} from "./template.js";
export { createTemplateContext } from "./types.js";
export type { TemplateContext } from "./types.js";
