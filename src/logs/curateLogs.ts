/**
 * Log curation: raw step output → lines shown inside the comment's code fence.
 */

/** Lines echoed by `set -x` style execution start with this. */
const COMMAND_ECHO_PREFIX = "+";

function stripTrailingNewlines(line: string): string {
  return line.replace(/(?:\r?\n)+$/, "");
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Drop leading and trailing blank lines. Blank lines with content on both
 * sides are kept.
 */
export function trimBlankLines(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start])) start++;
  while (end > start && isBlank(lines[end - 1])) end--;
  return lines.slice(start, end);
}

export function curateLogs(lines: readonly string[], verbatim: boolean): string[] {
  const kept: string[] = [];
  for (const raw of lines) {
    const line = stripTrailingNewlines(raw);
    if (!verbatim && line.startsWith(COMMAND_ECHO_PREFIX)) continue;
    kept.push(line);
  }
  return trimBlankLines(kept);
}
