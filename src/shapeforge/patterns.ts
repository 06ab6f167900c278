import type { MatchPattern } from "./types.js";

/**
 * Contents of a ```json fenced block, then the widest brace-delimited span.
 */
export const DEFAULT_MATCH_PATTERNS: readonly RegExp[] = [
  /```json(.*?)```/gs,
  /\{.*\}/gs,
];

/**
 * Compile a pattern into a fresh global RegExp so `matchAll` never shares
 * `lastIndex` state with the caller's instance.
 */
function toGlobalRegExp(pattern: MatchPattern): RegExp {
  if (typeof pattern === "string") {
    return new RegExp(pattern, "gs");
  }
  const flags = pattern.global ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

/**
 * Find every match of each pattern in `text`.
 *
 * Patterns are separate passes over the same text: all matches of the first
 * pattern come before any match of the second. When a pattern has a capturing
 * group the first group is returned instead of the whole match. Every result
 * is trimmed.
 */
export function findPatterns(
  text: string,
  patterns: MatchPattern | readonly MatchPattern[]
): string[] {
  const list =
    typeof patterns === "string" || patterns instanceof RegExp
      ? [patterns]
      : patterns;

  const results: string[] = [];
  for (const pattern of list) {
    for (const match of text.matchAll(toGlobalRegExp(pattern))) {
      const found = match.length > 1 ? (match[1] ?? "") : match[0];
      results.push(found.trim());
    }
  }

  return results;
}
