/**
 * .drone-comment.yml loader. Optional defaults for the plugin settings;
 * PLUGIN_* environment variables override anything set here.
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "yaml";
import { PluginError } from "../errors.js";
import type { CommentOrder, CommentPolicy } from "../lifecycle/types.js";

export const DEFAULT_SETTINGS_FILE = ".drone-comment.yml";

const ALLOWED_KEYS = new Set(["stage", "step", "keep", "verbatim", "when", "order"]);
export const VALID_POLICIES: readonly CommentPolicy[] = ["success", "failure", "always"];
export const VALID_ORDERS: readonly CommentOrder[] = ["delete-then-create", "create-then-delete"];

const TRUE_VALUES = new Set(["1", "t", "T", "TRUE", "true", "True"]);

/** Boolean setting; anything unparseable reads as false. */
export function parseBool(value: string): boolean {
  return TRUE_VALUES.has(value);
}

export interface FileSettings {
  stage?: string;
  step?: string;
  keep?: boolean;
  verbatim?: boolean;
  when?: CommentPolicy;
  order?: CommentOrder;
}

export function isCommentPolicy(v: string): v is CommentPolicy {
  return (VALID_POLICIES as readonly string[]).includes(v);
}

export function isCommentOrder(v: string): v is CommentOrder {
  return (VALID_ORDERS as readonly string[]).includes(v);
}

function configError(path: string, detail: string): PluginError {
  return new PluginError("CONFIG", `${path}: ${detail}`);
}

/**
 * Parse settings file content. Unknown keys or invalid values throw.
 * An empty document yields no settings.
 */
export function parseSettings(content: string, path: string): FileSettings {
  let raw: unknown;
  try {
    raw = parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw configError(path, `invalid YAML: ${msg}`);
  }

  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw configError(path, "root must be a mapping");
  }

  const obj = raw as Record<string, unknown>;
  for (const key of Object.keys(obj)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw configError(path, `unknown key "${key}"`);
    }
  }

  const settings: FileSettings = {};

  for (const key of ["stage", "step"] as const) {
    const v = obj[key];
    if (v === undefined) continue;
    if (typeof v !== "string" || v.trim() === "") {
      throw configError(path, `${key} must be a non-empty string`);
    }
    settings[key] = v.trim();
  }

  // Same leniency as PLUGIN_KEEP / PLUGIN_VERBATIM: unparseable reads as false.
  for (const key of ["keep", "verbatim"] as const) {
    const v = obj[key];
    if (v === undefined) continue;
    if (typeof v === "boolean") settings[key] = v;
    else if (typeof v === "string") settings[key] = parseBool(v.trim());
    else settings[key] = false;
  }

  const when = obj.when;
  if (when !== undefined) {
    if (typeof when !== "string" || !isCommentPolicy(when)) {
      throw configError(path, `when must be one of ${VALID_POLICIES.join(", ")}`);
    }
    settings.when = when;
  }

  const order = obj.order;
  if (order !== undefined) {
    if (typeof order !== "string" || !isCommentOrder(order)) {
      throw configError(path, `order must be one of ${VALID_ORDERS.join(", ")}`);
    }
    settings.order = order;
  }

  return settings;
}

/**
 * Load settings from `explicitPath` (must exist) or from the default file in
 * `cwd` (may be absent).
 */
export function loadSettingsFile(cwd: string, explicitPath?: string): FileSettings {
  if (explicitPath !== undefined && explicitPath !== "") {
    const path = isAbsolute(explicitPath) ? explicitPath : join(cwd, explicitPath);
    if (!existsSync(path)) {
      throw configError(explicitPath, "settings file not found");
    }
    return parseSettings(readFileSync(path, "utf8"), explicitPath);
  }

  const path = join(cwd, DEFAULT_SETTINGS_FILE);
  if (!existsSync(path)) return {};
  return parseSettings(readFileSync(path, "utf8"), DEFAULT_SETTINGS_FILE);
}
