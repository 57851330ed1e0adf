/**
 * Stage 2 Output Control basic usage:
 * - locate JSON in model text (```json fence, last fence, brace matching)
 * - decode it leniently and validate it with JSON Schema
 * - build a one-tool example-prompt record
 */

import {
  createOutputController,
  extractJson,
  parsePromptsResponse,
  type JsonSchema,
} from "../src/index.js";

const RESPONSES = [
  'STEP 1: read parameters\n```json\n{"storage account list": ["List storage accounts", "Show accounts in rg-prod",]}\n```\nVERIFICATION: ok',
  'Notes:\n```\nnot json\n```\n```\n{"advisor recommendation list": ["List recommendations"]}\n```',
  'Here you go: {"tool": ["p1", "p2"], "tool2": ["p3"]} Hope this helps.',
  "Just plain text with no JSON at all.",
];

interface CountOutput {
  count: number;
}

const COUNT_SCHEMA: JsonSchema = {
  type: "object",
  properties: { count: { type: "integer", minimum: 0 } },
  required: ["count"],
  additionalProperties: false,
};

function main() {
  for (const raw of RESPONSES) {
    const extract = extractJson(raw);
    console.log("\nextract:", extract);
    console.log("prompts:", parsePromptsResponse(raw));
  }

  const controller = createOutputController();
  const good = controller.parseAndValidate<CountOutput>('{"count": 3}', {
    schema: COUNT_SCHEMA,
  });
  const bad = controller.parseAndValidate<CountOutput>('{"count": -1}', {
    schema: COUNT_SCHEMA,
  });
  console.log("\nschema (good):", good);
  console.log("schema (bad):", bad);
}

main();
