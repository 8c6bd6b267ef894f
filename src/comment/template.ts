/**
 * Minimal line-oriented template language for comment bodies.
 *
 *   {{name}}   inline field, replaced by its text value
 *   {{name}}   alone on a line, for a "lines" field: one output line per element,
 *              no line at all when the list is empty
 *
 * Templates are compiled once; every syntax or field error surfaces from
 * compileTemplate, so rendering a compiled template with complete values cannot fail.
 */

import { PluginError } from "../errors.js";

const OPEN = "{{";
const CLOSE = "}}";
const FIELD_NAME = /^[A-Za-z][A-Za-z0-9]*$/;

export type FieldKind = "text" | "lines";
export type FieldSpec = Readonly<Record<string, FieldKind>>;
export type TemplateValue = string | readonly string[];
export type TemplateValues<F extends FieldSpec> = Readonly<Record<keyof F & string, TemplateValue>>;

type Segment<F extends FieldSpec> =
  | { kind: "literal"; text: string }
  | { kind: "field"; name: keyof F & string };

type TemplateLine<F extends FieldSpec> =
  | { kind: "inline"; segments: Segment<F>[] }
  | { kind: "block"; name: keyof F & string };

export interface CompiledTemplate<F extends FieldSpec> {
  readonly name: string;
  readonly fields: F;
  readonly lines: readonly TemplateLine<F>[];
}

export class TemplateError extends PluginError {
  constructor(
    readonly template: string,
    readonly line: number,
    detail: string,
  ) {
    super("TEMPLATE", `template ${template}:${line}: ${detail}`);
    this.name = "TemplateError";
  }
}

function isField<F extends FieldSpec>(fields: F, name: string): name is keyof F & string {
  return Object.prototype.hasOwnProperty.call(fields, name);
}

function parseSegments<F extends FieldSpec>(
  templateName: string,
  lineNo: number,
  text: string,
  fields: F,
): Segment<F>[] {
  const segments: Segment<F>[] = [];
  let rest = text;
  while (rest.length > 0) {
    const open = rest.indexOf(OPEN);
    if (open < 0) {
      segments.push({ kind: "literal", text: rest });
      break;
    }
    if (open > 0) segments.push({ kind: "literal", text: rest.slice(0, open) });
    const close = rest.indexOf(CLOSE, open + OPEN.length);
    if (close < 0) {
      throw new TemplateError(templateName, lineNo, `unterminated "${OPEN}"`);
    }
    const name = rest.slice(open + OPEN.length, close).trim();
    if (!FIELD_NAME.test(name)) {
      throw new TemplateError(templateName, lineNo, `invalid field name "${name}"`);
    }
    if (!isField(fields, name)) {
      throw new TemplateError(templateName, lineNo, `unknown field "${name}"`);
    }
    segments.push({ kind: "field", name });
    rest = rest.slice(close + CLOSE.length);
  }
  return segments;
}

export function compileTemplate<F extends FieldSpec>(
  name: string,
  source: string,
  fields: F,
): CompiledTemplate<F> {
  const lines: TemplateLine<F>[] = [];
  source.split("\n").forEach((text, i) => {
    const lineNo = i + 1;
    const segments = parseSegments(name, lineNo, text, fields);
    const only = segments.length === 1 ? segments[0] : undefined;
    if (only?.kind === "field" && fields[only.name] === "lines") {
      lines.push({ kind: "block", name: only.name });
      return;
    }
    for (const segment of segments) {
      if (segment.kind === "field" && fields[segment.name] === "lines") {
        throw new TemplateError(name, lineNo, `lines field "${segment.name}" must be alone on its line`);
      }
    }
    lines.push({ kind: "inline", segments });
  });
  return { name, fields, lines };
}

function asLines(value: TemplateValue): readonly string[] {
  return typeof value === "string" ? [value] : value;
}

function asText(value: TemplateValue): string {
  return typeof value === "string" ? value : value.join("\n");
}

export function renderTemplate<F extends FieldSpec>(
  template: CompiledTemplate<F>,
  values: TemplateValues<F>,
): string {
  const out: string[] = [];
  for (const line of template.lines) {
    if (line.kind === "block") {
      out.push(...asLines(values[line.name]));
      continue;
    }
    out.push(
      line.segments
        .map((s) => (s.kind === "literal" ? s.text : asText(values[s.name])))
        .join(""),
    );
  }
  return out.join("\n");
}
