/**
 * Lenient JSON decoding for model output.
 * Models often leave a comma before `]` or `}`; those are dropped before JSON.parse.
 */

import type { DecodeResult } from "./types.js";

const TRAILING_COMMA = /,(\s*[\]}])/g;

export function stripTrailingCommas(json: string): string {
  return json.replace(TRAILING_COMMA, "$1");
}

export function decodeJson(text: string, lenient: boolean = true): DecodeResult {
  if (!text.trim()) {
    return { success: false, errors: ["Empty JSON text"] };
  }
  const source = lenient ? stripTrailingCommas(text) : text;
  try {
    return { success: true, data: JSON.parse(source) as unknown };
  } catch (err) {
    const msg = err instanceof Error ? err.message : "JSON parse failed";
    return { success: false, errors: [msg] };
  }
}
