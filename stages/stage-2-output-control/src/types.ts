/**
 * Stage 2 Output Control types.
 * LLM is treated as untrusted: all output is extracted, parsed and validated before use,
 * and every failure comes back as a value, never as an exception.
 */

import type { SchemaObject } from "ajv";

/** JSON Schema (draft-07 style) for constraining structured output. */
export type JsonSchema = SchemaObject;

/** Which extraction strategy located the JSON text. */
export type ExtractionStrategy = "json_fence" | "last_fence" | "brace_match";

/** Result of locating JSON text inside raw LLM content. */
export type ExtractResult =
  | { found: true; json: string; strategy: ExtractionStrategy }
  | { found: false; reason: string };

/** Result of decoding JSON text. */
export type DecodeResult =
  | { success: true; data: unknown }
  | { success: false; errors: string[] };

/** Result of extracting, decoding and validating raw LLM content. */
export type ParseResult<T = unknown> =
  | { success: true; data: T; strategy: ExtractionStrategy }
  | { success: false; errors: string[]; raw?: string };

/** Result of validating decoded data against a schema. */
export type ValidationResult<T = unknown> =
  | { valid: true; data: T }
  | { valid: false; errors: string[] };

/** Options for a single parse. */
export interface ParseOptions {
  /** Repair trailing commas before decoding. Defaults to the controller setting. */
  lenient?: boolean;
}

/** Options for parsing and validating structured output. */
export interface ParseAndValidateOptions extends ParseOptions {
  /** JSON Schema to validate against. */
  schema: JsonSchema;
}

/** Configuration for the output controller. */
export interface OutputControllerConfig {
  /** Whether to repair trailing commas before decoding (default true). */
  lenient?: boolean;
  /** How much of the offending text to keep in a failed result (default 500). */
  rawSnippetLength?: number;
}

/** Output controller: parse and validate LLM content. */
export interface OutputController {
  /** Extract and decode JSON from raw content. */
  parseAndValidate(
    content: string | null | undefined,
    options?: ParseOptions
  ): ParseResult<unknown>;
  /** Extract, decode and validate JSON from raw content against a schema. */
  parseAndValidate<T>(
    content: string | null | undefined,
    options: ParseAndValidateOptions
  ): ParseResult<T>;
}

/** Decoded prompt document: tool name -> example prompts. */
export type PromptsDocument = Record<string, string[]>;

/** Canonical example-prompt record for one tool. */
export interface ParsedPromptsResponse {
  toolName: string;
  prompts: string[];
}
