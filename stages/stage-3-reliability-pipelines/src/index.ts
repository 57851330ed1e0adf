export { createExamplePromptsPipeline } from "./example-prompts.js";
export { createConsoleLogger } from "./logger.js";
export {
  createContentRewritePipeline,
  DEFAULT_TRUNCATION_REASONS,
  isTruncated,
} from "./rewrite.js";
export {
  DEFAULT_TEMPLATE_PLACEHOLDERS,
  findUnresolvedTemplateTokens,
} from "./template-check.js";
export {
  ConfigError,
  loadGlobalConfig,
  loadLabelCatalogue,
  loadLeakPatterns,
  loadReliabilityConfig,
  resolveLogLevel,
} from "../../../config/index.js";
export type {
  GlobalConfig,
  LogLevel,
  ReliabilityConfig,
} from "../../../config/index.js";
export type {
  ContentRewritePipeline,
  ContentRewritePipelineConfig,
  ExamplePromptsPipeline,
  ExamplePromptsPipelineConfig,
  FallbackReason,
  FinalizeRewriteInput,
  ModelResponse,
  PipelineEvent,
  PipelineLogEntry,
  PipelineLogger,
  PipelineName,
  PromptsCompletion,
  RewriteCompletion,
  RewriteOutcome,
} from "./types.js";
