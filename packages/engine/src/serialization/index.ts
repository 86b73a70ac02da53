export {
  parseRewriteRuleJson,
  serializeRewriteRuleJson,
  validateRewriteRuleDefinition,
} from "./rule-json";
export {
  boundaryFromText,
  boundaryToText,
  parseRewriteRuleText,
  serializeRewriteRule,
  serializeRewriteRuleDefinition,
} from "./rule-text";
