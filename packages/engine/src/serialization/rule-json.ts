/**
 * Structured (JSON) form of rewrite rules, validated with the contracts
 * schema.
 */

import {
  AutomatonError,
  Err,
  Ok,
  Result,
  type RewriteRuleDefinition,
  RewriteRuleDefinitionSchema,
} from "@cellforge/contracts";
import type { RewriteRule } from "../rules";

/**
 * Validate an already-decoded value. Missing `chance` and `priority` get
 * their defaults.
 */
export function validateRewriteRuleDefinition(
  value: unknown,
): Result<RewriteRuleDefinition, AutomatonError> {
  const parsed = RewriteRuleDefinitionSchema.safeParse(value);
  if (!parsed.success) {
    return Err(
      AutomatonError.parseFailed("Invalid rewrite rule definition", {
        errors: parsed.error.issues,
      }),
    );
  }
  return Ok(parsed.data);
}

export function parseRewriteRuleJson(text: string): Result<RewriteRuleDefinition, AutomatonError> {
  return Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e) =>
      AutomatonError.parseFailed(
        `Rule JSON is malformed: ${e instanceof Error ? e.message : String(e)}`,
      ),
  ).flatMap(validateRewriteRuleDefinition);
}

export function serializeRewriteRuleJson(
  rule: RewriteRule | RewriteRuleDefinition,
  space: number = 2,
): string {
  const definition = "toDefinition" in rule ? rule.toDefinition() : rule;
  return JSON.stringify(definition, null, space);
}
