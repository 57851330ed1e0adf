/**
 * Extract JSON from raw LLM content.
 *
 * Strategies, first success wins:
 * 1. a ```json fenced block
 * 2. the last generic ``` fenced block (reasoning usually precedes the answer)
 * 3. the first `{` up to the brace that brings the depth back to zero
 *
 * A fenced block with nothing inside does not count as a success.
 * Brace counting does not look inside string literals.
 */

import type { ExtractResult } from "./types.js";

const FENCE = "```";
const JSON_FENCE = "```json";

function extractJsonFence(text: string): string | undefined {
  const opener = text.indexOf(JSON_FENCE);
  if (opener < 0) {
    return undefined;
  }
  const start = opener + JSON_FENCE.length;
  const end = text.indexOf(FENCE, start);
  if (end < 0) {
    return undefined;
  }
  return text.slice(start, end).trim() || undefined;
}

function extractLastFence(text: string): string | undefined {
  const closing = text.lastIndexOf(FENCE);
  if (closing < FENCE.length) {
    return undefined;
  }
  const opening = text.lastIndexOf(FENCE, closing - FENCE.length);
  if (opening < 0) {
    return undefined;
  }
  return text.slice(opening + FENCE.length, closing).trim() || undefined;
}

function findMatchingBraceEnd(text: string, startIndex: number): number {
  let depth = 0;
  for (let i = startIndex; i < text.length; i++) {
    const c = text[i];
    if (c === "{") {
      depth++;
    } else if (c === "}") {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function extractBraceMatch(text: string): ExtractResult {
  const startIndex = text.indexOf("{");
  if (startIndex < 0) {
    return { found: false, reason: "No JSON object found in content" };
  }
  const endIndex = findMatchingBraceEnd(text, startIndex);
  if (endIndex < 0) {
    return { found: false, reason: "Unclosed JSON brace" };
  }
  return {
    found: true,
    json: text.slice(startIndex, endIndex + 1),
    strategy: "brace_match",
  };
}

/** Locate JSON text in raw LLM content and report which strategy found it. */
export function extractJson(content: string | null | undefined): ExtractResult {
  const text = content?.trim() ?? "";
  if (!text) {
    return { found: false, reason: "Empty content" };
  }

  const fenced = extractJsonFence(text);
  if (fenced !== undefined) {
    return { found: true, json: fenced, strategy: "json_fence" };
  }

  const lastBlock = extractLastFence(text);
  if (lastBlock !== undefined) {
    return { found: true, json: lastBlock, strategy: "last_fence" };
  }

  return extractBraceMatch(text);
}

/** String form of {@link extractJson}: the JSON text, or "" when none is found. */
export function extractJsonFromLlmResponse(
  content: string | null | undefined
): string {
  const result = extractJson(content);
  return result.found ? result.json : "";
}
