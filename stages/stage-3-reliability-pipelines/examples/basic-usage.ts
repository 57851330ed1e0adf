/**
 * Stage 3 Reliability Pipelines basic usage, with a local stand-in for the model call:
 * - Pipeline A: rewrite a document, once cleanly and once with a mangled token
 * - Pipeline B: turn a chatty model answer into example prompts
 */

import {
  createContentRewritePipeline,
  createExamplePromptsPipeline,
  loadReliabilityConfig,
  type ModelResponse,
} from "../src/index.js";

const DOCUMENT = `# advisor recommendation list

List advisor recommendations.

Required parameters:
--subscription  The subscription ID

Example prompts include:
- "List all recommendations"
`;

async function main() {
  const config = loadReliabilityConfig();
  const rewrite = createContentRewritePipeline({
    catalogue: config.catalogue,
    leakPatterns: config.leakPatterns,
    logLevel: config.logLevel,
  });

  const clean = await rewrite.run("advisor-list.md", DOCUMENT, (text) =>
    Promise.resolve<ModelResponse>({
      content: text.replace("List advisor", "Lists Advisor"),
      finishReason: "stop",
    })
  );
  console.log("clean rewrite:", clean);

  const mangled = await rewrite.run("advisor-list.md", DOCUMENT, (text) =>
    Promise.resolve<ModelResponse>({
      content: text.replace("<<<TPL_LABEL_0>>>", "__TPL_LABEL_0__"),
      finishReason: "stop",
    })
  );
  console.log("mangled rewrite:", mangled.status);

  const prompts = createExamplePromptsPipeline({ logLevel: config.logLevel });
  const result = await prompts.run(
    "storage account list",
    "Generate 2 example prompts for storage account list.",
    () =>
      Promise.resolve(
        'STEP 1...\n```json\n{"storage account list": ["List my storage accounts", "Show storage accounts in &lt;resource-group&gt;"]}\n```\nVERIFICATION: ok'
      )
  );
  console.log("example prompts:", result);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
