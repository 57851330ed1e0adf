/**
 * Stage 0 Text Sanitizer types.
 * Normalizes typographic quotes and HTML entities that models emit inside prompt strings.
 */

/** One literal replacement: every occurrence of `pattern` becomes `replacement`. */
export interface SanitizationRule {
  pattern: string;
  replacement: string;
}

/**
 * Ordered rules applied in a single pass over the input.
 * Text produced by one rule is never re-examined by another in the same call.
 */
export type SanitizationRuleSet = readonly SanitizationRule[];

/** Compiled sanitizer; keeps null and empty input as they are. */
export interface TextSanitizer {
  (text: string): string;
  (text: string | null): string | null;
}
