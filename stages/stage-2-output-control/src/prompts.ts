/**
 * Example-prompt responses: `{ "<tool name>": ["prompt", ...] }`.
 *
 * Only the first key is kept. The model is asked about one tool at a time, so any
 * further keys are answers nobody requested.
 */

import {
  createTextSanitizer,
  type TextSanitizer,
} from "../../stage-0-text-sanitizer/src/index.js";
import { createOutputController } from "./controller.js";
import type {
  ExtractionStrategy,
  JsonSchema,
  OutputController,
  ParsedPromptsResponse,
  PromptsDocument,
} from "./types.js";

export const PROMPTS_RESPONSE_SCHEMA: JsonSchema = {
  type: "object",
  additionalProperties: {
    type: "array",
    items: { type: "string" },
  },
};

export interface PromptsParserDeps {
  /** Defaults to a lenient controller. */
  outputController?: OutputController;
  /** Applied to every prompt; defaults to the standard rule set. */
  sanitizer?: TextSanitizer;
}

export type PromptsParseResult =
  | { success: true; data: ParsedPromptsResponse; strategy: ExtractionStrategy }
  | { success: false; errors: string[] };

/** Take the first entry of a decoded document and sanitize its prompts. */
export function buildPromptsResponse(
  document: PromptsDocument,
  sanitizer: TextSanitizer = createTextSanitizer()
): ParsedPromptsResponse | null {
  const first = Object.entries(document)[0];
  if (!first) {
    return null;
  }
  const [toolName, prompts] = first;
  return { toolName, prompts: prompts.map((p) => sanitizer(p)) };
}

/** Like {@link parsePromptsResponse} but says why nothing came back. */
export function parsePromptsResponseDetailed(
  raw: string | null | undefined,
  deps: PromptsParserDeps = {}
): PromptsParseResult {
  const controller = deps.outputController ?? createOutputController();
  const parsed = controller.parseAndValidate<PromptsDocument>(raw, {
    schema: PROMPTS_RESPONSE_SCHEMA,
  });
  if (!parsed.success) {
    return { success: false, errors: parsed.errors };
  }

  const response = buildPromptsResponse(parsed.data, deps.sanitizer);
  if (!response) {
    return { success: false, errors: ["JSON object has no keys"] };
  }
  return { success: true, data: response, strategy: parsed.strategy };
}

/** Raw model text -> first tool's sanitized prompts, or null. Never throws. */
export function parsePromptsResponse(
  raw: string | null | undefined,
  deps: PromptsParserDeps = {}
): ParsedPromptsResponse | null {
  const result = parsePromptsResponseDetailed(raw, deps);
  return result.success ? result.data : null;
}
