/**
 * Composite rule: an ordered sequence of rules applied one after another
 * within a single step.
 */

import type { MutableCellGrid } from "../core/grid";
import type { Rule } from "./types";

export class CompositeRule implements Rule {
  readonly kind = "composite" as const;
  private readonly ruleList: Rule[];

  constructor(rules: readonly Rule[] = []) {
    this.ruleList = [...rules];
  }

  get rules(): readonly Rule[] {
    return this.ruleList;
  }

  add(rule: Rule): this {
    this.ruleList.push(rule);
    return this;
  }

  transform(grid: MutableCellGrid): void {
    for (const rule of this.ruleList) {
      rule.transform(grid);
    }
  }
}
