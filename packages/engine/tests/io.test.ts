import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { Boundary, Grid } from "../src/core/grid";
import {
  gridFromText,
  gridToText,
  readGridFile,
  readRuleFile,
  writeGridFile,
  writeRuleFile,
} from "../src/io";
import { Pattern, RewriteRule } from "../src/rules";

describe("text grids", () => {
  it("reads one row per line and ignores a trailing newline", () => {
    expect(gridFromText("X \n  \n").getOrThrow().toRows()).toEqual([
      [59, 0],
      [0, 0],
    ]);
  });

  it("pads short lines to the longest one", () => {
    expect(gridFromText("abc\r\nd\r\n").getOrThrow().toRows()).toEqual([
      [10, 11, 12],
      [13, 0, 0],
    ]);
  });

  it("reports unknown symbols with their position", () => {
    const result = gridFromText("ab\nc#");
    expect(result.error.code).toBe("SYMBOL_UNKNOWN");
    expect(result.error.message).toBe('Unknown symbol "#" at line 2, column 2');
    expect(result.error.details).toEqual({ symbol: "#", row: 1, col: 1 });
  });

  it("rejects empty text", () => {
    expect(gridFromText("").error.code).toBe("GRID_DIMENSIONS_INVALID");
  });

  it("writes rows without a trailing newline", () => {
    const grid = Grid.fromRows([
      [59, 0],
      [1, 36],
    ]).getOrThrow();
    expect(gridToText(grid).value).toBe("X \n1A");
  });

  it("fails on cells without a symbol", () => {
    expect(gridToText(new Grid(1, 1, 100)).error.code).toBe("SYMBOL_UNKNOWN");
  });
});

describe("files", () => {
  let dir = "";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "cellforge-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const rule = new RewriteRule({
    patterns: [Pattern.create({ before: [[59], [0]], after: [[0], [59]] }).getOrThrow()],
    boundaries: Boundary.both(Boundary.sentinel()),
    random: { next: () => 0.999 },
  });

  it("writes and reads a grid", async () => {
    const path = join(dir, "grid.txt");
    const grid = Grid.fromRows([
      [59, 0, 41],
      [0, 0, 54],
    ]).getOrThrow();

    expect((await writeGridFile(path, grid)).isOk()).toBe(true);
    expect(await readFile(path, "utf8")).toBe("X F\n  S\n");
    expect((await readGridFile(path)).getOrThrow().equals(grid)).toBe(true);
  });

  it("writes and reads rule text", async () => {
    const path = join(dir, "fall.cel");
    expect((await writeRuleFile(path, rule)).isOk()).toBe(true);
    expect(await readFile(path, "utf8")).toBe("Symbol:_;\n\nSymbol:_;\n\n1;\n0;\nX\n ;\n \nX;\n");
    expect((await readRuleFile(path)).value).toEqual(rule.toDefinition());
  });

  it("uses the structured format for .json files", async () => {
    const path = join(dir, "fall.json");
    expect((await writeRuleFile(path, rule)).isOk()).toBe(true);
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual(rule.toDefinition());
    expect((await readRuleFile(path)).value).toEqual(rule.toDefinition());
  });

  it("reports missing files", async () => {
    const path = join(dir, "missing.txt");
    const result = await readGridFile(path);
    expect(result.error.code).toBe("IO_FAILED");
    expect(result.error.details).toEqual({ path, operation: "read" });
  });
});
