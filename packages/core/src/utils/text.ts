// String normalization helpers for model output

const CONTROL_CHARS = /[\x00-\x1f\x7f-\x9f]/g;
const EDGE_QUOTES = /^["'\s]+|["'\s]+$/g;

/**
 * Trim and remove control characters
 */
export function cleanStr(input: string): string {
  return input.trim().replace(CONTROL_CHARS, '');
}

/**
 * Normalize an entity name into its identity key.
 * Idempotent: canonicalizeName(canonicalizeName(x)) === canonicalizeName(x)
 */
export function canonicalizeName(input: string): string {
  return cleanStr(input).replace(EDGE_QUOTES, '').toUpperCase();
}

/**
 * Remove surrounding quotes without changing case
 */
export function stripQuotes(input: string): string {
  return cleanStr(input).replace(EDGE_QUOTES, '');
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split on any of the literal markers, dropping blank pieces
 */
export function splitByMarkers(content: string, markers: readonly string[]): string[] {
  if (markers.length === 0) {
    return [content];
  }
  const pattern = new RegExp(markers.map(escapeRegExp).join('|'));
  return content
    .split(pattern)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function isFloatString(value: string): boolean {
  return /^[-+]?[0-9]*\.?[0-9]+$/.test(value);
}

/**
 * Order-independent key for an undirected edge
 */
export function edgeKey(a: string, b: string): string {
  return sortedPair(a, b).join('\u0001');
}

export function sortedPair(a: string, b: string): [string, string] {
  return a <= b ? [a, b] : [b, a];
}
