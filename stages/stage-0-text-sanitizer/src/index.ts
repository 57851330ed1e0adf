export {
  createTextSanitizer,
  DEFAULT_SANITIZATION_RULES,
  sanitizeText,
} from "./sanitizer.js";
export type {
  SanitizationRule,
  SanitizationRuleSet,
  TextSanitizer,
} from "./types.js";
