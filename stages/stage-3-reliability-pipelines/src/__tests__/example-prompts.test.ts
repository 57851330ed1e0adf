import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  createExamplePromptsPipeline,
  findUnresolvedTemplateTokens,
} from "../index.js";
import { createRecordingLogger } from "./helpers.js";

describe("createExamplePromptsPipeline", () => {
  it("extracts the fenced answer after reasoning steps", () => {
    const logger = createRecordingLogger();
    const pipeline = createExamplePromptsPipeline({ logger });
    const raw =
      'STEP 1...\n```json\n{"storage account list": ["a","b"]}\n```\nVERIFICATION: ok';

    const result = pipeline.parse("storage account list", raw);

    assert.deepEqual(result, {
      toolName: "storage account list",
      prompts: ["a", "b"],
    });
    assert.deepEqual(logger.entries, [
      {
        level: "info",
        entry: {
          documentId: "storage account list",
          pipeline: "example-prompts",
          event: "prompts_extracted",
          strategy: "json_fence",
          toolName: "storage account list",
          promptCount: 2,
        },
      },
    ]);
  });

  it("keeps the first tool and drops the rest", () => {
    const pipeline = createExamplePromptsPipeline({
      logger: createRecordingLogger(),
    });

    assert.deepEqual(
      pipeline.parse("tool", '{"tool":["p1","p2"],"tool2":["p3"]}'),
      { toolName: "tool", prompts: ["p1", "p2"] }
    );
  });

  it("returns null and warns when the model sent no JSON", () => {
    const logger = createRecordingLogger();
    const pipeline = createExamplePromptsPipeline({ logger });

    const result = pipeline.parse(
      "monitor alert list",
      "Just plain text with no JSON at all."
    );

    assert.equal(result, null);
    assert.deepEqual(logger.entries, [
      {
        level: "warn",
        entry: {
          documentId: "monitor alert list",
          pipeline: "example-prompts",
          event: "prompts_missing",
          errors: ["No JSON object found in content"],
        },
      },
    ]);
  });

  it("sanitizes prompts with the configured rules", () => {
    const pipeline = createExamplePromptsPipeline({
      sanitizationRules: [{ pattern: "&nbsp;", replacement: " " }],
      logger: createRecordingLogger(),
    });

    assert.deepEqual(
      pipeline.parse("t", '{"t": ["a&nbsp;b &amp; c"]}'),
      { toolName: "t", prompts: ["a b &amp; c"] }
    );
  });

  it("sanitizes prompts with the default rules", () => {
    const pipeline = createExamplePromptsPipeline({
      logger: createRecordingLogger(),
    });

    assert.deepEqual(
      pipeline.parse("t", '{"t": ["it’s “ok” &amp; done"]}'),
      { toolName: "t", prompts: ['it\'s "ok" & done'] }
    );
  });

  it("sends a rendered request and parses the answer", async () => {
    const pipeline = createExamplePromptsPipeline({
      logger: createRecordingLogger(),
    });
    const sent: string[] = [];

    const result = await pipeline.run(
      "keyvault secret list",
      "Generate 2 prompts for keyvault secret list using <vault-name>.",
      (prompt) => {
        sent.push(prompt);
        return Promise.resolve(
          '{"keyvault secret list": ["List secrets in <vault-name>", "Show secrets",]}'
        );
      }
    );

    assert.deepEqual(sent, [
      "Generate 2 prompts for keyvault secret list using <vault-name>.",
    ]);
    assert.deepEqual(result, {
      toolName: "keyvault secret list",
      prompts: ["List secrets in <vault-name>", "Show secrets"],
    });
  });

  it("does not call the model when the request still has template tokens", async () => {
    const logger = createRecordingLogger();
    const pipeline = createExamplePromptsPipeline({ logger });
    let calls = 0;

    const result = await pipeline.run(
      "aks cluster list",
      "Generate {PROMPT_COUNT} prompts for aks cluster list.",
      () => {
        calls++;
        return Promise.resolve("{}");
      }
    );

    assert.equal(result, null);
    assert.equal(calls, 0);
    assert.deepEqual(logger.entries, [
      {
        level: "warn",
        entry: {
          documentId: "aks cluster list",
          pipeline: "example-prompts",
          event: "prompt_template_unresolved",
          problems: ["Unreplaced placeholder: {PROMPT_COUNT}"],
        },
      },
    ]);
  });

  it("checks requests against the configured placeholders", () => {
    const pipeline = createExamplePromptsPipeline({
      placeholders: ["%TOOL%"],
      logger: createRecordingLogger(),
    });

    assert.equal(pipeline.checkRequest("t", "Prompts for {TOOL_NAME}"), true);
    assert.equal(pipeline.checkRequest("t", "Prompts for %TOOL%"), false);
  });
});

describe("findUnresolvedTemplateTokens", () => {
  it("reports an empty prompt", () => {
    assert.deepEqual(findUnresolvedTemplateTokens(""), ["Prompt is empty"]);
  });

  it("accepts a rendered prompt with angle-bracket placeholders", () => {
    assert.deepEqual(
      findUnresolvedTemplateTokens("List secrets in vault <vault-name>"),
      []
    );
  });

  it("reports simple placeholders in list order", () => {
    assert.deepEqual(
      findUnresolvedTemplateTokens("{PROMPT_COUNT} prompts for {TOOL_NAME}"),
      [
        "Unreplaced placeholder: {TOOL_NAME}",
        "Unreplaced placeholder: {PROMPT_COUNT}",
      ]
    );
  });

  it("reports Handlebars blocks and expressions", () => {
    const prompt = "{{#each PARAMETERS}}\n- {{name}}\n{{/each}}\n{{#if x}}a{{else}}b{{/if}}";

    assert.deepEqual(findUnresolvedTemplateTokens(prompt), [
      "Unreplaced Handlebars block: {{#each PARAMETERS}}",
      "Unreplaced Handlebars block: {{/each}}",
      "Unreplaced Handlebars block: {{#if x}}",
      "Unreplaced Handlebars block: {{else}}",
      "Unreplaced Handlebars block: {{/if}}",
      "Unreplaced Handlebars expression: {{name}}",
    ]);
  });

  it("ignores JSON-like double braces", () => {
    assert.deepEqual(findUnresolvedTemplateTokens('Example: {{"a": 1}}'), []);
  });
});
