export { detectLeakedTokens, DEFAULT_LEAK_PATTERNS } from "./leak.js";
export { normalizeTemplateLabels } from "./normalize.js";
export {
  formatToken,
  protectTemplateLabels,
  TOKEN_PREFIX,
  TOKEN_SUFFIX,
} from "./protect.js";
export { restoreTemplateLabels } from "./restore.js";
export type {
  LabelCatalogue,
  LeakPatternList,
  ProtectedContent,
  TokenMap,
} from "./types.js";
