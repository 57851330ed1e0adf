/**
 * Pipeline A: protect template labels, let the model rewrite the document, then
 * restore, normalize and check for leaks. A truncated response or any leaked token
 * publishes the original document instead.
 */

import {
  DEFAULT_LEAK_PATTERNS,
  detectLeakedTokens,
  normalizeTemplateLabels,
  protectTemplateLabels,
  restoreTemplateLabels,
  type ProtectedContent,
} from "../../stage-1-label-protection/src/index.js";
import { createConsoleLogger, nowIso } from "./logger.js";
import type {
  ContentRewritePipeline,
  ContentRewritePipelineConfig,
  FinalizeRewriteInput,
  ModelResponse,
  RewriteCompletion,
  RewriteOutcome,
} from "./types.js";

/** OpenAI-compatible, Anthropic and Gemini spellings of "hit the token limit". */
export const DEFAULT_TRUNCATION_REASONS: readonly string[] = [
  "length",
  "max_tokens",
  "MAX_TOKENS",
];

export function isTruncated(
  response: ModelResponse,
  truncationReasons: readonly string[] = DEFAULT_TRUNCATION_REASONS
): boolean {
  if (response.truncated === true) {
    return true;
  }
  return (
    response.finishReason !== undefined &&
    truncationReasons.includes(response.finishReason)
  );
}

export function createContentRewritePipeline(
  config: ContentRewritePipelineConfig
): ContentRewritePipeline {
  const leakPatterns = config.leakPatterns ?? DEFAULT_LEAK_PATTERNS;
  const truncationReasons =
    config.truncationReasons ?? DEFAULT_TRUNCATION_REASONS;
  const logger = config.logger ?? createConsoleLogger(config.logLevel);

  function prepare(content: string): ProtectedContent {
    return protectTemplateLabels(content, config.catalogue);
  }

  function finalize(input: FinalizeRewriteInput): RewriteOutcome {
    const { documentId, original, prepared, response } = input;

    if (isTruncated(response, truncationReasons)) {
      logger.logWarning({
        timestamp: nowIso(),
        documentId,
        pipeline: "content-rewrite",
        event: "rewrite_fallback",
        reason: "truncated",
        finishReason: response.finishReason,
      });
      return {
        status: "fallback",
        reason: "truncated",
        content: original,
        leakedTokens: [],
      };
    }

    const restored = restoreTemplateLabels(response.content, prepared.tokenMap);
    const normalized = normalizeTemplateLabels(restored, config.catalogue);
    const leakedTokens = detectLeakedTokens(normalized, leakPatterns);

    if (leakedTokens.length > 0) {
      logger.logWarning({
        timestamp: nowIso(),
        documentId,
        pipeline: "content-rewrite",
        event: "rewrite_fallback",
        reason: "leaked_tokens",
        leakedTokens,
      });
      return {
        status: "fallback",
        reason: "leaked_tokens",
        content: original,
        leakedTokens,
      };
    }

    logger.logInfo({
      timestamp: nowIso(),
      documentId,
      pipeline: "content-rewrite",
      event: "rewrite_applied",
      labelCount: prepared.tokenMap.size,
    });
    return { status: "rewritten", content: normalized };
  }

  async function run(
    documentId: string,
    content: string,
    complete: RewriteCompletion
  ): Promise<RewriteOutcome> {
    const prepared = prepare(content);
    const response = await complete(prepared.content);
    return finalize({ documentId, original: content, prepared, response });
  }

  return { prepare, finalize, run };
}
