/**
 * Restorer: literal token -> original replacement.
 */

import type { TokenMap } from "./types.js";

export function restoreTemplateLabels(
  content: string,
  tokenMap: TokenMap
): string {
  if (!content || tokenMap.size === 0) {
    return content;
  }

  let restored = content;
  for (const [token, original] of tokenMap) {
    // split/join keeps this a literal replace-all; `$` in labels stays as-is.
    restored = restored.split(token).join(original);
  }
  return restored;
}
