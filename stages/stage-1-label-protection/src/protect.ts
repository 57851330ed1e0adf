/**
 * Protector: replace whole-line template labels with positional tokens.
 */

import type { LabelCatalogue, ProtectedContent } from "./types.js";

export const TOKEN_PREFIX = "<<<TPL_LABEL_";
export const TOKEN_SUFFIX = ">>>";

/** Angle-bracket fences; markdown-aware models rewrite `__x__` into `**x**`. */
export function formatToken(index: number): string {
  return `${TOKEN_PREFIX}${index}${TOKEN_SUFFIX}`;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function buildLabelRegex(catalogue: LabelCatalogue): RegExp | undefined {
  const alternatives = catalogue
    .map((label) => label.trim())
    .filter((label) => label.length > 0)
    .map(escapeRegExp);
  if (alternatives.length === 0) {
    return undefined;
  }
  // Indentation is kept outside the token; the label and any trailing blanks go into the map.
  // A CR before the line break stays in the content.
  return new RegExp(
    `^([ \\t]*)((?:${alternatives.join("|")})[ \\t]*)(?=\\r?$)`,
    "gm"
  );
}

/**
 * Replace every full-line occurrence of a catalogue label with the next token.
 * Tokens are numbered from 0 in order of appearance; each call starts a fresh map.
 */
export function protectTemplateLabels(
  content: string,
  catalogue: LabelCatalogue
): ProtectedContent {
  const tokenMap = new Map<string, string>();
  const regex = buildLabelRegex(catalogue);
  if (!content || !regex) {
    return { content, tokenMap };
  }

  let index = 0;
  const protectedText = content.replace(
    regex,
    (_match: string, indent: string, line: string) => {
      const token = formatToken(index++);
      tokenMap.set(token, line);
      return `${indent}${token}`;
    }
  );

  return { content: protectedText, tokenMap };
}
