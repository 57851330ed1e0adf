/**
 * Output Controller: extract JSON from raw LLM content, decode it leniently and
 * optionally validate it against JSON Schema.
 */

import { decodeJson } from "./lenient.js";
import { extractJson } from "./parse.js";
import type {
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseOptions,
  ParseResult,
} from "./types.js";
import { validateAgainstSchema } from "./validate.js";

export function createOutputController(
  config: OutputControllerConfig = {}
): OutputController {
  const defaultLenient = config.lenient ?? true;
  const snippetLength = config.rawSnippetLength ?? 500;

  function parseAndValidate(
    content: string | null | undefined,
    options?: ParseOptions
  ): ParseResult<unknown>;
  function parseAndValidate<T>(
    content: string | null | undefined,
    options: ParseAndValidateOptions
  ): ParseResult<T>;
  function parseAndValidate<T>(
    content: string | null | undefined,
    options?: ParseOptions & Partial<ParseAndValidateOptions>
  ): ParseResult<T> | ParseResult<unknown> {
    const extract = extractJson(content);
    if (!extract.found) {
      return {
        success: false,
        errors: [extract.reason],
        raw: (content ?? "").slice(0, snippetLength),
      };
    }

    const decoded = decodeJson(extract.json, options?.lenient ?? defaultLenient);
    if (!decoded.success) {
      return {
        success: false,
        errors: decoded.errors,
        raw: extract.json.slice(0, snippetLength),
      };
    }

    const schema = options?.schema;
    if (!schema) {
      return { success: true, data: decoded.data, strategy: extract.strategy };
    }

    const validation = validateAgainstSchema<T>(decoded.data, schema);
    if (!validation.valid) {
      return {
        success: false,
        errors: validation.errors,
        raw: extract.json.slice(0, snippetLength),
      };
    }

    return { success: true, data: validation.data, strategy: extract.strategy };
  }

  return { parseAndValidate };
}
