/**
 * Falling sand with fire and ash.
 *
 * Sand falls one or two cells and slides off stacks and 45 degree slopes.
 * Fire drifts upward, ignites neighbouring sand and sometimes decays to
 * ash; ash falls, stacks and ignites sand it touches. Sources keep spawning
 * fire above themselves.
 */

import type { Cell } from "../core/grid";
import type { Rgba } from "../automaton/automaton";
import { RewriteRule, type RewriteRuleOptions } from "../rules";
import { validateRewriteRuleDefinition } from "../serialization/rule-json";
import sandDefinition from "./data/sand.json";

export const SandCell = {
  EMPTY: 0,
  /** `'A'` */
  ASH: 36,
  /** `'F'` */
  FIRE: 41,
  /** `'S'` */
  SOURCE: 54,
  /** `'X'` */
  SAND: 59,
} as const;

export const SAND_COLORS: ReadonlyMap<Cell, Rgba> = new Map<Cell, Rgba>([
  [SandCell.EMPTY, [61, 159, 184, 255]],
  [SandCell.SAND, [224, 210, 159, 255]],
  [SandCell.FIRE, [224, 105, 54, 255]],
  [SandCell.ASH, [184, 182, 182, 255]],
  [SandCell.SOURCE, [128, 25, 14, 255]],
]);

/**
 * Build the sand rule. Both axes use the border sentinel, so nothing falls
 * through the floor or wraps around the sides.
 */
export function sandRule(
  options: Omit<RewriteRuleOptions, "patterns" | "boundaries"> = {},
): RewriteRule {
  return validateRewriteRuleDefinition(sandDefinition)
    .flatMap((definition) =>
      RewriteRule.fromDefinition(definition, { id: "sand", ...options }),
    )
    .getOrThrow();
}
