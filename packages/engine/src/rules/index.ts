/**
 * Rules module - stencil, rewrite and composite rules.
 */

import type { CompositeRule } from "./composite-rule";
import type { RewriteRule } from "./rewrite-rule";
import type { StencilRule } from "./stencil-rule";

export { CompositeRule } from "./composite-rule";
export { Pattern, type PatternInit } from "./pattern";
export {
  type Replacement,
  type ReplacementGroup,
  RewriteRule,
  type RewriteRuleOptions,
  type RewriteStepReport,
} from "./rewrite-rule";
export {
  type StencilExtents,
  StencilRule,
  type StencilRuleOptions,
  type StencilTransform,
  type StencilWindow,
} from "./stencil-rule";
export type { Rule, RuleKind, RuleOptions } from "./types";

/**
 * The rule kinds shipped with the engine, discriminated by `kind`.
 */
export type BuiltInRule = StencilRule | RewriteRule | CompositeRule;
