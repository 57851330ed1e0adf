/**
 * Leak detector: find placeholder tokens that survived restore.
 * Any hit means the rewritten content must not be published.
 */

import type { LeakPatternList } from "./types.js";

/** Current angle-bracket format first, then formats used by earlier releases. */
export const DEFAULT_LEAK_PATTERNS: LeakPatternList = [
  "<<<TPL_LABEL_\\d+>>>",
  "__TPL_LABEL_\\d+__",
  "\\*\\*TPL_LABEL_\\d+\\*\\*",
];

export function buildLeakRegex(patterns: LeakPatternList): RegExp | undefined {
  const sources = patterns.filter((p) => p.length > 0);
  if (sources.length === 0) {
    return undefined;
  }
  return new RegExp(sources.map((p) => `(?:${p})`).join("|"), "g");
}

/** Returns leaked token strings in document order; empty means clean. */
export function detectLeakedTokens(
  content: string,
  patterns: LeakPatternList = DEFAULT_LEAK_PATTERNS
): string[] {
  const regex = buildLeakRegex(patterns);
  if (!content || !regex) {
    return [];
  }
  return Array.from(content.matchAll(regex), (m) => m[0]);
}
