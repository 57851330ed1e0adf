/**
 * Normalizer: collapse decorated renderings of a label back to its canonical text.
 *
 * Only bold markers and a `###` heading prefix are repaired. Other wrappings are left
 * alone: they are neither restored here nor reported as leaks.
 */

import { escapeRegExp } from "./protect.js";
import type { LabelCatalogue } from "./types.js";

function buildNormalizeRegex(label: string): RegExp {
  const literal = escapeRegExp(label.replace(/^\*+|\*+$/g, ""));
  return new RegExp(
    `^([ \\t]*)(?:\\*\\*|###[ \\t]+)?${literal}(?:\\*\\*)?[ \\t]*(?=\\r?$)`,
    "gim"
  );
}

export function normalizeTemplateLabels(
  content: string,
  catalogue: LabelCatalogue
): string {
  if (!content) {
    return content;
  }

  let normalized = content;
  for (const entry of catalogue) {
    const label = entry.trim();
    if (!label) continue;
    normalized = normalized.replace(
      buildNormalizeRegex(label),
      (_match: string, indent: string) => `${indent}${label}`
    );
  }
  return normalized;
}
