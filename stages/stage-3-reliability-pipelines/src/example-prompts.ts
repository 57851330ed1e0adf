/**
 * Pipeline B: raw model text -> first tool's sanitized example prompts, or null.
 */

import { createTextSanitizer } from "../../stage-0-text-sanitizer/src/index.js";
import {
  createOutputController,
  parsePromptsResponseDetailed,
  type ParsedPromptsResponse,
} from "../../stage-2-output-control/src/index.js";
import { createConsoleLogger, nowIso } from "./logger.js";
import {
  DEFAULT_TEMPLATE_PLACEHOLDERS,
  findUnresolvedTemplateTokens,
} from "./template-check.js";
import type {
  ExamplePromptsPipeline,
  ExamplePromptsPipelineConfig,
  PromptsCompletion,
} from "./types.js";

export function createExamplePromptsPipeline(
  config: ExamplePromptsPipelineConfig = {}
): ExamplePromptsPipeline {
  const sanitizer = createTextSanitizer(config.sanitizationRules);
  const outputController = createOutputController({ lenient: true });
  const placeholders = config.placeholders ?? DEFAULT_TEMPLATE_PLACEHOLDERS;
  const logger = config.logger ?? createConsoleLogger(config.logLevel);

  function parse(
    documentId: string,
    raw: string | null | undefined
  ): ParsedPromptsResponse | null {
    const result = parsePromptsResponseDetailed(raw, {
      outputController,
      sanitizer,
    });
    if (!result.success) {
      logger.logWarning({
        timestamp: nowIso(),
        documentId,
        pipeline: "example-prompts",
        event: "prompts_missing",
        errors: result.errors,
      });
      return null;
    }

    logger.logInfo({
      timestamp: nowIso(),
      documentId,
      pipeline: "example-prompts",
      event: "prompts_extracted",
      strategy: result.strategy,
      toolName: result.data.toolName,
      promptCount: result.data.prompts.length,
    });
    return result.data;
  }

  function checkRequest(documentId: string, prompt: string): boolean {
    const problems = findUnresolvedTemplateTokens(prompt, placeholders);
    if (problems.length === 0) {
      return true;
    }
    logger.logWarning({
      timestamp: nowIso(),
      documentId,
      pipeline: "example-prompts",
      event: "prompt_template_unresolved",
      problems,
    });
    return false;
  }

  async function run(
    documentId: string,
    prompt: string,
    complete: PromptsCompletion
  ): Promise<ParsedPromptsResponse | null> {
    if (!checkRequest(documentId, prompt)) {
      return null;
    }
    const raw = await complete(prompt);
    return parse(documentId, raw);
  }

  return { parse, checkRequest, run };
}
