import { type RandomGenerator, SeededRandom } from "@cellforge/contracts";
import { describe, expect, it } from "vitest";
import { Boundary, CellCode, Grid } from "../src/core/grid";
import { sandRule } from "../src/presets";
import { Pattern, RewriteRule } from "../src/rules";
import { createStepTrace } from "../src/trace";

const SAND = 59;
const EMPTY = 0;
const W = CellCode.WILDCARD;

// Passes every chance below 1 and never swaps during the shuffle, so groups
// keep their scan order.
const inOrder: RandomGenerator = { next: () => 0.999 };
// Passes every chance above 0.
const always: RandomGenerator = { next: () => 0 };

const sentinel = Boundary.both(Boundary.sentinel());

function rows(values: number[][]): Grid {
  return Grid.fromRows(values).getOrThrow();
}

const fall = Pattern.create({ before: [[SAND], [EMPTY]], after: [[EMPTY], [SAND]] }).getOrThrow();

describe("Pattern", () => {
  it("defaults chance to 1 and priority to 0", () => {
    expect(fall.chance).toBe(1);
    expect(fall.priority).toBe(0);
    expect(fall.rows).toBe(2);
    expect(fall.cols).toBe(1);
  });

  it("rejects templates of different shapes", () => {
    const result = Pattern.create({ before: [[1, 2]], after: [[1], [2]] });
    expect(result.error.code).toBe("PATTERN_SHAPE_MISMATCH");
    expect(result.error.details).toEqual({
      before: { rows: 1, cols: 2 },
      after: { rows: 2, cols: 1 },
    });
  });

  it("rejects chances outside [0, 1] and non-finite priorities", () => {
    expect(Pattern.create({ before: [[1]], after: [[2]], chance: 1.5 }).error.message).toBe(
      "Pattern chance must be within [0, 1], got 1.5",
    );
    expect(Pattern.create({ before: [[1]], after: [[2]], priority: Number.NaN }).error.code).toBe(
      "PATTERN_INVALID",
    );
  });

  it("wraps template errors", () => {
    const result = Pattern.create({ before: [[1, 2], [3]], after: [[1, 2], [3, 4]] });
    expect(result.error.code).toBe("PATTERN_INVALID");
    expect(result.error.details?.side).toBe("before");
  });

  it("detects inert patterns", () => {
    expect(Pattern.create({ before: [[1]], after: [[W]] }).getOrThrow().isInert()).toBe(true);
    expect(fall.isInert()).toBe(false);
  });

  it("compares numbers within a tolerance", () => {
    const a = Pattern.create({ before: [[1]], after: [[2]], chance: 0.3 }).getOrThrow();
    const b = Pattern.create({ before: [[1]], after: [[2]], chance: 0.1 + 0.2 }).getOrThrow();
    expect(a.equals(b)).toBe(false);
    expect(a.equals(b, 1e-9)).toBe(true);
  });
});

describe("RewriteRule", () => {
  describe("matching", () => {
    it("lets sand fall by one cell", () => {
      const grid = rows([[SAND], [EMPTY], [EMPTY]]);
      new RewriteRule({ patterns: [fall], boundaries: sentinel }).transform(grid);
      expect(grid.toRows()).toEqual([[EMPTY], [SAND], [EMPTY]]);
    });

    it("anchors sentinel windows only where they fit", () => {
      const rule = new RewriteRule({
        patterns: [Pattern.create({ before: [[0]], after: [[1]] }).getOrThrow()],
        boundaries: sentinel,
        random: inOrder,
      });
      const groups = rule.findMatches(new Grid(2, 2));
      expect(groups.map((g) => [g.anchorRow, g.anchorCol])).toEqual([
        [0, 0],
        [0, 1],
        [1, 0],
        [1, 1],
      ]);
      expect(groups[0]).toEqual({
        priority: 0,
        patternIndex: 0,
        anchorRow: 0,
        anchorCol: 0,
        cells: [{ row: 0, col: 0, value: 1 }],
      });
    });

    it("wraps periodic windows and maps cells back into the grid", () => {
      const rule = new RewriteRule({
        patterns: [Pattern.create({ before: [[0, 0]], after: [[1, 2]] }).getOrThrow()],
        random: inOrder,
      });
      const groups = rule.findMatches(new Grid(2, 2));
      expect(groups).toHaveLength(4);
      expect(groups[3].cells).toEqual([
        { row: 1, col: 1, value: 1 },
        { row: 1, col: 0, value: 2 },
      ]);
    });

    it("matches across the seam only under periodic boundaries", () => {
      const swap = Pattern.create({ before: [[37, 36]], after: [[1, 2]] }).getOrThrow();

      const periodic = rows([[36, 37]]);
      new RewriteRule({ patterns: [swap], random: inOrder }).transform(periodic);
      expect(periodic.toRows()).toEqual([[2, 1]]);

      const bounded = rows([[36, 37]]);
      new RewriteRule({ patterns: [swap], boundaries: sentinel, random: inOrder }).transform(
        bounded,
      );
      expect(bounded.toRows()).toEqual([[36, 37]]);
    });

    it("finds no anchors for a pattern larger than the grid", () => {
      const wide = Pattern.create({ before: [[0, 0]], after: [[1, 1]] }).getOrThrow();
      const rule = new RewriteRule({ patterns: [wide], random: inOrder });
      expect(rule.findMatches(new Grid(3, 1))).toEqual([]);
    });

    it("treats wildcards as match-anything and leave-alone", () => {
      const pattern = Pattern.create({ before: [[W, 5]], after: [[W, 6]] }).getOrThrow();
      const grid = rows([[3, 5]]);
      new RewriteRule({ patterns: [pattern], random: inOrder }).transform(grid);
      expect(grid.toRows()).toEqual([[3, 6]]);
    });

    it("never changes the grid with an all-wildcard after template", () => {
      const trace = createStepTrace(true);
      const inert = Pattern.create({ before: [[W]], after: [[W]] }).getOrThrow();
      const rule = new RewriteRule({ id: "inert", patterns: [inert], random: always, trace });
      const grid = rows([
        [1, 2],
        [3, 4],
      ]);

      const report = rule.apply(grid);

      expect(grid.toRows()).toEqual([
        [1, 2],
        [3, 4],
      ]);
      expect(report.candidates).toBe(0);
      const warning = trace.getEvents().find((e) => e.eventType === "warning");
      expect(warning?.source).toBe("inert");
    });

    it("rolls the chance before comparing templates", () => {
      const unlikely = Pattern.create({
        before: [[SAND], [EMPTY]],
        after: [[EMPTY], [SAND]],
        chance: 0.5,
      }).getOrThrow();
      let draws = 0;
      const counting: RandomGenerator = {
        next: () => {
          draws++;
          return 0.999;
        },
      };

      // 3 anchors in a 4x1 sentinel column, one roll each, no template match needed.
      const rule = new RewriteRule({ patterns: [unlikely], boundaries: sentinel, random: counting });
      expect(rule.findMatches(rows([[0], [0], [0], [0]]))).toEqual([]);
      expect(draws).toBe(3);
    });

    it("never applies a pattern with zero chance", () => {
      const never = Pattern.create({ before: [[0]], after: [[1]], chance: 0 }).getOrThrow();
      const grid = new Grid(3, 3);
      new RewriteRule({ patterns: [never], random: always }).transform(grid);
      expect(grid.countCells(0)).toBe(9);
    });
  });

  describe("conflict resolution", () => {
    const right = Pattern.create({ before: [[1, 0]], after: [[0, 1]] }).getOrThrow();
    const left = Pattern.create({ before: [[0, 1]], after: [[1, 0]] }).getOrThrow();

    it("approves only one of two overlapping groups", () => {
      const grid = rows([[1, 0, 1]]);
      const report = new RewriteRule({
        patterns: [right, left],
        boundaries: sentinel,
        random: inOrder,
      }).apply(grid);

      expect(grid.toRows()).toEqual([[0, 1, 1]]);
      expect(report.candidates).toBe(2);
      expect(report.approved).toBe(1);
      expect(report.rejected).toBe(1);
      expect(report.cellsWritten).toBe(2);
      expect(report.approvedGroups[0].patternIndex).toBe(0);
    });

    it("prefers higher priorities", () => {
      const urgentLeft = Pattern.create({ before: [[0, 1]], after: [[1, 0]], priority: 1 }).getOrThrow();
      const grid = rows([[1, 0, 1]]);
      new RewriteRule({ patterns: [right, urgentLeft], boundaries: sentinel, random: inOrder }).transform(
        grid,
      );
      expect(grid.toRows()).toEqual([[1, 1, 0]]);
    });

    it("keeps every step exclusive whatever the shuffle", () => {
      for (let seed = 1; seed <= 20; seed++) {
        const grid = rows([[1, 0, 1]]);
        const report = new RewriteRule({
          patterns: [right, left],
          boundaries: sentinel,
          random: new SeededRandom(seed),
        }).apply(grid);

        expect(report.approved).toBe(1);
        expect([
          [0, 1, 1],
          [1, 1, 0],
        ]).toContainEqual(grid.getRow(0));
      }
    });

    it("breaks equal-priority ties by the shuffle, not by pattern order", () => {
      const outcomes = new Set<string>();
      for (let seed = 1; seed <= 64; seed++) {
        const grid = rows([[1, 0, 1]]);
        new RewriteRule({ patterns: [right, left], boundaries: sentinel, random: new SeededRandom(seed) }).transform(
          grid,
        );
        outcomes.add(grid.getRow(0).join(""));
      }
      expect([...outcomes].sort()).toEqual(["011", "110"]);
    });

    describe("overlapping matches of one pattern", () => {
      const pair = Pattern.create({ before: [[0, 0]], after: [[2, 2]] }).getOrThrow();

      it("approves exactly one group", () => {
        const grid = rows([[0, 0, 0]]);
        const report = new RewriteRule({ patterns: [pair], boundaries: sentinel, random: inOrder }).apply(grid);

        expect(report.candidates).toBe(2);
        expect(report.approved).toBe(1);
        expect(report.rejected).toBe(1);
        expect(report.approvedGroups[0].anchorCol).toBe(0);
        expect(grid.toRows()).toEqual([[2, 2, 0]]);
      });

      it("lets either anchor win depending on the shuffle", () => {
        const outcomes = new Set<string>();
        for (let seed = 1; seed <= 64; seed++) {
          const grid = rows([[0, 0, 0]]);
          const report = new RewriteRule({
            patterns: [pair],
            boundaries: sentinel,
            random: new SeededRandom(seed),
          }).apply(grid);
          expect(report.approved).toBe(1);
          outcomes.add(grid.getRow(0).join(""));
        }
        expect([...outcomes].sort()).toEqual(["022", "220"]);
      });
    });

    it("is deterministic when nothing conflicts and every chance is 1", () => {
      const results = [3, 99, 12345].map((seed) => {
        const grid = rows([
          [SAND, 0, SAND],
          [0, 0, 0],
          [0, 0, 0],
        ]);
        new RewriteRule({ patterns: [fall], boundaries: sentinel, random: new SeededRandom(seed) }).transform(
          grid,
        );
        return grid.toRows();
      });

      for (const result of results) {
        expect(result).toEqual([
          [0, 0, 0],
          [SAND, 0, SAND],
          [0, 0, 0],
        ]);
      }
    });

    it("reproduces runs from the same seed", () => {
      const start = () =>
        rows([
          [1, 0, 1, 0, 1, 0],
          [0, 1, 0, 1, 0, 1],
        ]);
      const a = start();
      const b = start();
      const ruleA = new RewriteRule({ patterns: [right, left], random: new SeededRandom(7) });
      const ruleB = new RewriteRule({ patterns: [right, left], random: new SeededRandom(7) });

      for (let i = 0; i < 10; i++) {
        ruleA.transform(a);
        ruleB.transform(b);
      }
      expect(a.equals(b)).toBe(true);
    });
  });

  describe("tracing", () => {
    it("records the outcome of each step", () => {
      const trace = createStepTrace(true);
      const grid = rows([[1, 0, 1]]);
      new RewriteRule({
        id: "shift",
        patterns: [
          Pattern.create({ before: [[1, 0]], after: [[0, 1]] }).getOrThrow(),
          Pattern.create({ before: [[0, 1]], after: [[1, 0]] }).getOrThrow(),
        ],
        boundaries: sentinel,
        random: inOrder,
        trace,
      }).transform(grid);

      expect(trace.getRewriteTotals()).toEqual({
        candidates: 2,
        approved: 1,
        rejected: 1,
        cellsWritten: 2,
      });
    });
  });

  describe("definitions", () => {
    it("round-trips through its structured definition", () => {
      const rule = new RewriteRule({ patterns: [fall], boundaries: sentinel, random: inOrder });
      const definition = rule.toDefinition();
      expect(definition).toEqual({
        rowBoundary: { kind: "sentinel", symbol: 126 },
        colBoundary: { kind: "sentinel", symbol: 126 },
        patterns: [{ chance: 1, priority: 0, before: [[59], [0]], after: [[0], [59]] }],
      });

      const rebuilt = RewriteRule.fromDefinition(definition, { random: inOrder }).getOrThrow();
      expect(rebuilt.patterns[0].equals(fall)).toBe(true);
      expect(rebuilt.boundaries).toEqual(sentinel);
    });

    it("appends patterns after construction", () => {
      const rule = new RewriteRule({ random: inOrder });
      rule.addPattern(fall);
      expect(rule.patterns).toHaveLength(1);
    });
  });
});

describe("sand preset", () => {
  it("lets sand fall one cell when the long fall fails its roll", () => {
    const grid = rows([[SAND], [EMPTY], [EMPTY]]);
    sandRule({ random: inOrder }).transform(grid);
    expect(grid.toRows()).toEqual([[EMPTY], [SAND], [EMPTY]]);
  });

  it("prefers the two-cell fall when it passes", () => {
    const grid = rows([[SAND], [EMPTY], [EMPTY]]);
    sandRule({ random: always }).transform(grid);
    expect(grid.toRows()).toEqual([[EMPTY], [EMPTY], [SAND]]);
  });

  it("loads every pattern", () => {
    expect(sandRule({ random: inOrder }).patterns).toHaveLength(28);
  });
});
