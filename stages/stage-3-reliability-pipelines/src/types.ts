/**
 * Stage 3 Reliability Pipelines types.
 * Pipeline A guards markdown rewrites; Pipeline B turns model text into example prompts.
 */

import type { LogLevel } from "../../../config/index.js";
import type {
  LabelCatalogue,
  LeakPatternList,
  ProtectedContent,
} from "../../stage-1-label-protection/src/index.js";
import type { ParsedPromptsResponse } from "../../stage-2-output-control/src/index.js";
import type { SanitizationRuleSet } from "../../stage-0-text-sanitizer/src/index.js";

export type PipelineName = "content-rewrite" | "example-prompts";

export type PipelineEvent =
  | "rewrite_applied"
  | "rewrite_fallback"
  | "prompts_extracted"
  | "prompts_missing"
  | "prompt_template_unresolved";

export interface PipelineLogEntry {
  timestamp: string;
  documentId: string;
  pipeline: PipelineName;
  event: PipelineEvent;
  [field: string]: unknown;
}

export interface PipelineLogger {
  logInfo(entry: PipelineLogEntry): void;
  logWarning(entry: PipelineLogEntry): void;
}

/** Text returned by the model call, plus what the provider said about how it ended. */
export interface ModelResponse {
  content: string;
  finishReason?: string;
  /** Set by hosts that detect truncation themselves. */
  truncated?: boolean;
}

export type FallbackReason = "truncated" | "leaked_tokens";

export type RewriteOutcome =
  | { status: "rewritten"; content: string }
  | {
      status: "fallback";
      reason: FallbackReason;
      /** The pre-protection original. */
      content: string;
      leakedTokens: string[];
    };

export interface FinalizeRewriteInput {
  documentId: string;
  original: string;
  prepared: ProtectedContent;
  response: ModelResponse;
}

/** Sends protected markdown to the model; retries and timeouts are the caller's. */
export type RewriteCompletion = (protectedContent: string) => Promise<ModelResponse>;

export interface ContentRewritePipelineConfig {
  catalogue: LabelCatalogue;
  leakPatterns?: LeakPatternList;
  /** finishReason values that mean the output was cut off. */
  truncationReasons?: readonly string[];
  logger?: PipelineLogger;
  logLevel?: LogLevel;
}

export interface ContentRewritePipeline {
  prepare(content: string): ProtectedContent;
  finalize(input: FinalizeRewriteInput): RewriteOutcome;
  run(
    documentId: string,
    content: string,
    complete: RewriteCompletion
  ): Promise<RewriteOutcome>;
}

/** Sends a fully rendered request to the model and returns its raw text. */
export type PromptsCompletion = (prompt: string) => Promise<string>;

export interface ExamplePromptsPipelineConfig {
  sanitizationRules?: SanitizationRuleSet;
  /** Template tokens that must not survive into a request. */
  placeholders?: readonly string[];
  logger?: PipelineLogger;
  logLevel?: LogLevel;
}

export interface ExamplePromptsPipeline {
  parse(documentId: string, raw: string | null | undefined): ParsedPromptsResponse | null;
  checkRequest(documentId: string, prompt: string): boolean;
  run(
    documentId: string,
    prompt: string,
    complete: PromptsCompletion
  ): Promise<ParsedPromptsResponse | null>;
}
