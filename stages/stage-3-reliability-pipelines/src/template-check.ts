/**
 * Checks that a rendered request has no template syntax left in it before it is sent.
 * Angle-bracket placeholders such as `<subscription>` are intentional and pass.
 */

export const DEFAULT_TEMPLATE_PLACEHOLDERS: readonly string[] = [
  "{TOOL_NAME}",
  "{TOOL_COMMAND}",
  "{TOOL_DESCRIPTION}",
  "{ACTION_VERB}",
  "{RESOURCE_TYPE}",
  "{PROMPT_COUNT}",
];

// {{#each ...}}, {{/each}}, {{#if ...}}, {{/if}}, {{else}}
const HANDLEBARS_BLOCK = /\{\{(?:[#/](?:each|if)\b[\s\S]*?|else)\}\}/g;

// {{name}} only; JSON-ish text like {{"a": 1}} is not a template expression.
const HANDLEBARS_EXPRESSION = /\{\{(?!else\}\})[A-Za-z_]\w*\}\}/g;

/** Returns the problems found; empty means the request is fully rendered. */
export function findUnresolvedTemplateTokens(
  prompt: string,
  placeholders: readonly string[] = DEFAULT_TEMPLATE_PLACEHOLDERS
): string[] {
  if (!prompt) {
    return ["Prompt is empty"];
  }

  const problems: string[] = [];
  for (const placeholder of placeholders) {
    if (prompt.includes(placeholder)) {
      problems.push(`Unreplaced placeholder: ${placeholder}`);
    }
  }
  for (const match of prompt.matchAll(HANDLEBARS_BLOCK)) {
    problems.push(`Unreplaced Handlebars block: ${match[0]}`);
  }
  for (const match of prompt.matchAll(HANDLEBARS_EXPRESSION)) {
    problems.push(`Unreplaced Handlebars expression: ${match[0]}`);
  }
  return problems;
}
