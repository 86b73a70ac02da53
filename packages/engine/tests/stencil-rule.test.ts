import { describe, expect, it } from "vitest";
import { AutomatonBuilder } from "../src/automaton";
import { Boundary, Grid } from "../src/core/grid";
import { gameOfLife } from "../src/presets";
import { StencilRule } from "../src/rules";
import { createStepTrace } from "../src/trace";

describe("StencilRule", () => {
  describe("create", () => {
    it("expands a single extent to a square window", () => {
      const rule = StencilRule.create({ extents: 2, transform: (w) => w.center() }).getOrThrow();
      expect(rule.extents).toEqual({ up: 2, right: 2, down: 2, left: 2 });
      expect(rule.windowRows).toBe(5);
      expect(rule.windowCols).toBe(5);
      expect(rule.kind).toBe("stencil");
    });

    it("rejects negative or fractional extents", () => {
      const negative = StencilRule.create({ extents: -1, transform: (w) => w.center() });
      expect(negative.error.code).toBe("STENCIL_EXTENTS_INVALID");
      expect(negative.error.details).toEqual({ direction: "up", value: -1 });

      const fractional = StencilRule.create({
        extents: { up: 0, right: 0.5, down: 0, left: 0 },
        transform: (w) => w.center(),
      });
      expect(fractional.error.details).toEqual({ direction: "right", value: 0.5 });
    });

    it("checks the window against a grid size", () => {
      const rule = StencilRule.create({ extents: 2, transform: (w) => w.center() }).getOrThrow();
      expect(rule.validateFor(5, 5).isOk()).toBe(true);
      const tooSmall = rule.validateFor(4, 6);
      expect(tooSmall.error.code).toBe("WINDOW_EXCEEDS_GRID");
      expect(tooSmall.error.details).toEqual({ windowRows: 5, windowCols: 5, rows: 4, cols: 6 });
    });
  });

  describe("transform", () => {
    it("places the target cell at (up, left) in the window", () => {
      const seen: Array<[number, number, number, number]> = [];
      const rule = StencilRule.create({
        extents: { up: 1, right: 0, down: 0, left: 2 },
        transform: (window) => {
          seen.push([window.rows, window.cols, window.centerRow, window.centerCol]);
          return window.center();
        },
      }).getOrThrow();

      rule.transform(new Grid(3, 3));
      expect(seen[0]).toEqual([2, 3, 1, 2]);
      expect(seen).toHaveLength(9);
    });

    it("reads only the previous generation", () => {
      // Copy the left neighbour: an in-place update would smear the 1 along the row.
      const rule = StencilRule.create({
        extents: { up: 0, right: 0, down: 0, left: 1 },
        transform: (window) => window.getUnsafe(0, 0),
      }).getOrThrow();
      const grid = Grid.fromRows([[1, 0, 0, 0]]).getOrThrow();

      rule.transform(grid);
      expect(grid.toRows()).toEqual([[0, 1, 0, 0]]);
    });

    it("fills out-of-bounds window cells with the sentinel", () => {
      const rule = StencilRule.create({
        extents: 1,
        boundaries: Boundary.both(Boundary.sentinel(7)),
        transform: (window) => window.getUnsafe(0, 0),
      }).getOrThrow();
      const grid = Grid.fromRows([
        [1, 2],
        [3, 4],
      ]).getOrThrow();

      rule.transform(grid);
      expect(grid.toRows()).toEqual([
        [7, 7],
        [7, 1],
      ]);
    });

    it("throws when the transform returns a non-cell value", () => {
      const rule = StencilRule.create({ id: "broken", extents: 0, transform: () => 300 }).getOrThrow();
      expect(() => rule.transform(new Grid(1, 1))).toThrow(
        "Invalid cell value: 300 (expected an integer in 0..255)",
      );
    });

    it("records one stencil event per step when traced", () => {
      const trace = createStepTrace(true);
      const rule = StencilRule.create({
        id: "identity",
        extents: 0,
        trace,
        transform: (w) => w.center(),
      }).getOrThrow();

      rule.transform(new Grid(2, 3));
      const types = trace.getEvents().map((e) => e.eventType);
      expect(types).toEqual(["start", "stencil", "end"]);
      const stencil = trace.getEvents()[1];
      expect(stencil.eventType === "stencil" && stencil.data.cells).toBe(6);
    });
  });

  describe("game of life", () => {
    it("turns a wrapped vertical line into two horizontal ones on a torus", () => {
      const grid = Grid.fromRows([
        [0, 0, 1, 0, 0],
        [0, 0, 1, 0, 0],
        [0, 0, 0, 0, 0],
        [0, 0, 1, 0, 0],
        [0, 0, 1, 0, 0],
      ]).getOrThrow();

      gameOfLife().transform(grid);

      expect(grid.toRows()).toEqual([
        [0, 1, 1, 1, 0],
        [0, 0, 0, 0, 0],
        [0, 0, 0, 0, 0],
        [0, 0, 0, 0, 0],
        [0, 1, 1, 1, 0],
      ]);
    });

    it("oscillates a blinker against dead borders", () => {
      const automaton = new AutomatonBuilder()
        .fromCells([0, 0, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0], 4)
        .withRule(gameOfLife({ boundaries: Boundary.both(Boundary.sentinel(0)) }))
        .build()
        .getOrThrow();

      for (let i = 0; i < 5; i++) {
        automaton.nextStep();
      }
      expect(automaton.state.toRows()).toEqual([
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [1, 1, 1, 0],
        [0, 0, 0, 0],
      ]);

      automaton.nextStep();
      expect(automaton.state.toRows()).toEqual([
        [0, 0, 0, 0],
        [0, 1, 0, 0],
        [0, 1, 0, 0],
        [0, 1, 0, 0],
      ]);
    });

    it("uses custom alive and dead values", () => {
      const grid = Grid.fromRows([
        [5, 5, 5],
        [5, 9, 5],
        [5, 9, 5],
      ]).getOrThrow();
      // Two live cells: both die, nothing is born.
      gameOfLife({ alive: 9, dead: 5, boundaries: Boundary.both(Boundary.sentinel(5)) }).transform(
        grid,
      );
      expect(grid.countCells(5)).toBe(9);
    });
  });
});
