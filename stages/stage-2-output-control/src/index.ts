export { createOutputController } from "./controller.js";
export { decodeJson, stripTrailingCommas } from "./lenient.js";
export { extractJson, extractJsonFromLlmResponse } from "./parse.js";
export {
  buildPromptsResponse,
  parsePromptsResponse,
  parsePromptsResponseDetailed,
  PROMPTS_RESPONSE_SCHEMA,
  type PromptsParserDeps,
  type PromptsParseResult,
} from "./prompts.js";
export { validateAgainstSchema } from "./validate.js";
export type {
  DecodeResult,
  ExtractionStrategy,
  ExtractResult,
  JsonSchema,
  OutputController,
  OutputControllerConfig,
  ParseAndValidateOptions,
  ParseOptions,
  ParsedPromptsResponse,
  ParseResult,
  PromptsDocument,
  ValidationResult,
} from "./types.js";
