/**
 * Single-pass text sanitizer.
 * All rules are compiled into one alternation so decoded output is never scanned again
 * (e.g. "&amp;lt;" becomes "&lt;", not "<").
 */

import type {
  SanitizationRuleSet,
  TextSanitizer,
} from "./types.js";

export const DEFAULT_SANITIZATION_RULES: SanitizationRuleSet = [
  { pattern: "\u2018", replacement: "'" },
  { pattern: "\u2019", replacement: "'" },
  { pattern: "\u201C", replacement: '"' },
  { pattern: "\u201D", replacement: '"' },
  { pattern: "&quot;", replacement: '"' },
  { pattern: "&#34;", replacement: '"' },
  { pattern: "&apos;", replacement: "'" },
  { pattern: "&#39;", replacement: "'" },
  { pattern: "&amp;", replacement: "&" },
  { pattern: "&lt;", replacement: "<" },
  { pattern: "&gt;", replacement: ">" },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildLookup(rules: SanitizationRuleSet): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const rule of rules) {
    // First rule for a pattern wins, matching the alternation order below.
    if (!lookup.has(rule.pattern)) {
      lookup.set(rule.pattern, rule.replacement);
    }
  }
  return lookup;
}

function compileRules(rules: SanitizationRuleSet): RegExp | undefined {
  const sources = rules
    .filter((rule) => rule.pattern.length > 0)
    .map((rule) => escapeRegExp(rule.pattern));
  if (sources.length === 0) {
    return undefined;
  }
  return new RegExp(sources.join("|"), "g");
}

/** Compile a rule set once and reuse it for many strings. */
export function createTextSanitizer(
  rules: SanitizationRuleSet = DEFAULT_SANITIZATION_RULES
): TextSanitizer {
  const lookup = buildLookup(rules);
  const regex = compileRules(rules);

  function sanitize(text: string): string;
  function sanitize(text: string | null): string | null;
  function sanitize(text: string | null): string | null {
    if (text === null || text === "" || !regex) {
      return text;
    }
    return text.replace(regex, (match) => lookup.get(match) ?? match);
  }

  return sanitize;
}

/** One-shot form of {@link createTextSanitizer}. */
export function sanitizeText(
  text: string,
  rules?: SanitizationRuleSet
): string;
export function sanitizeText(
  text: string | null,
  rules?: SanitizationRuleSet
): string | null;
export function sanitizeText(
  text: string | null,
  rules: SanitizationRuleSet = DEFAULT_SANITIZATION_RULES
): string | null {
  return createTextSanitizer(rules)(text);
}
