/**
 * Comment identity markers. Each label is an invisible markdown line:
 *   [//]: # (key=value)
 * Parsed with fixed prefix/suffix matching so log text can never be read as a pattern.
 */

export const MARKER_PREFIX = "[//]: # (";
export const MARKER_SUFFIX = ")";
const SEPARATOR = "=";

export type Labels = Readonly<Record<string, string>>;

/** One marker line per label, keys sorted so identical labels give identical bytes. */
export function buildLabelMarkers(labels: Labels): string[] {
  return Object.keys(labels)
    .sort()
    .map((key) => `${MARKER_PREFIX}${key}${SEPARATOR}${labels[key]}${MARKER_SUFFIX}`);
}

function parseMarkerLine(line: string): [string, string] | null {
  if (!line.startsWith(MARKER_PREFIX) || !line.endsWith(MARKER_SUFFIX)) return null;
  const inner = line.slice(MARKER_PREFIX.length, line.length - MARKER_SUFFIX.length);
  const eq = inner.indexOf(SEPARATOR);
  if (eq < 1) return null;
  return [inner.slice(0, eq).trim(), inner.slice(eq + 1).trim()];
}

/** All markers found in the body. A repeated key keeps its last value. */
export function parseLabelMarkers(body: string): Map<string, string> {
  const found = new Map<string, string>();
  for (const line of body.split(/\r?\n/)) {
    const pair = parseMarkerLine(line);
    if (pair) found.set(pair[0], pair[1]);
  }
  return found;
}

/**
 * True if every given label appears in the body with the same value.
 * Extra markers in the body are ignored.
 */
export function hasLabelMarkers(body: string, labels: Labels): boolean {
  const found = parseLabelMarkers(body);
  return Object.entries(labels).every(([key, value]) => found.get(key) === value);
}
