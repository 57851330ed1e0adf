/**
 * Stage 0 Text Sanitizer basic usage:
 * - normalize smart quotes and HTML entities in model-written prompts
 * - show that one pass never decodes twice
 */

import { createTextSanitizer, sanitizeText } from "../src/index.js";

function main() {
  const samples = [
    "it’s “ok” &amp; done",
    "List &quot;secrets&quot; in vault &apos;x&apos; &amp; show &lt;y&gt;",
    "Escaped twice: &amp;lt;tag&amp;gt;",
    "Nothing to change here",
  ];

  for (const sample of samples) {
    console.log(`${JSON.stringify(sample)} -> ${JSON.stringify(sanitizeText(sample))}`);
  }

  const nbsp = createTextSanitizer([{ pattern: "&nbsp;", replacement: " " }]);
  console.log("custom rules:", nbsp("a&nbsp;b"));
}

main();
