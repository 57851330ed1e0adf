/**
 * Stage 1 Label Protection basic usage:
 * - swap template labels for tokens before an LLM rewrite
 * - restore and normalize what comes back
 * - detect tokens the model mangled
 */

import { loadLabelCatalogue } from "../../../config/index.js";
import {
  detectLeakedTokens,
  normalizeTemplateLabels,
  protectTemplateLabels,
  restoreTemplateLabels,
} from "../src/index.js";

const DOCUMENT = `# keyvault secret list

List secrets in a key vault.

Required parameters:
--vault-name  The key vault name

Example prompts include:
- "List all secrets in vault <vault-name>"
`;

function main() {
  const catalogue = loadLabelCatalogue();
  const prepared = protectTemplateLabels(DOCUMENT, catalogue);
  console.log("---------- protected ----------");
  console.log(prepared.content);
  console.log("token map:", Object.fromEntries(prepared.tokenMap));

  // A model that bolds one label and reformats another token.
  const aiOutput = prepared.content
    .replace("<<<TPL_LABEL_0>>>", "**<<<TPL_LABEL_0>>>**")
    .replace("<<<TPL_LABEL_1>>>", "**TPL_LABEL_1**");

  const restored = restoreTemplateLabels(aiOutput, prepared.tokenMap);
  const normalized = normalizeTemplateLabels(restored, catalogue);
  console.log("---------- restored + normalized ----------");
  console.log(normalized);
  console.log("leaked:", detectLeakedTokens(normalized));
}

main();
