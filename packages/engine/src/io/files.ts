/**
 * File helpers for text grids and rule files.
 *
 * Rule files ending in `.json` use the structured format; anything else is
 * read and written as rule text.
 */

import { readFile, writeFile } from "node:fs/promises";
import {
  AutomatonError,
  Err,
  Result,
  type RewriteRuleDefinition,
} from "@cellforge/contracts";
import type { Grid, ReadonlyCellGrid } from "../core/grid";
import type { RewriteRule } from "../rules";
import { parseRewriteRuleJson, serializeRewriteRuleJson } from "../serialization/rule-json";
import { parseRewriteRuleText, serializeRewriteRule } from "../serialization/rule-text";
import { gridFromText, gridToText } from "./text-grid";

function ioFailed(operation: "read" | "write", path: string) {
  return (e: unknown) =>
    new AutomatonError(
      "IO_FAILED",
      `Failed to ${operation} ${path}: ${e instanceof Error ? e.message : String(e)}`,
      { path, operation },
    );
}

function isJsonPath(path: string): boolean {
  return path.toLowerCase().endsWith(".json");
}

async function readText(path: string): Promise<Result<string, AutomatonError>> {
  return Result.fromPromise(readFile(path, "utf8"), ioFailed("read", path));
}

async function writeText(path: string, text: string): Promise<Result<void, AutomatonError>> {
  return Result.fromPromise(writeFile(path, text, "utf8"), ioFailed("write", path));
}

export async function readGridFile(path: string): Promise<Result<Grid, AutomatonError>> {
  return (await readText(path)).flatMap(gridFromText);
}

export async function writeGridFile(
  path: string,
  grid: ReadonlyCellGrid,
): Promise<Result<void, AutomatonError>> {
  const text = gridToText(grid);
  if (text.isErr()) return Err(text.error);
  return writeText(path, `${text.value}\n`);
}

export async function readRuleFile(
  path: string,
): Promise<Result<RewriteRuleDefinition, AutomatonError>> {
  const text = await readText(path);
  return text.flatMap(isJsonPath(path) ? parseRewriteRuleJson : parseRewriteRuleText);
}

export async function writeRuleFile(
  path: string,
  rule: RewriteRule,
): Promise<Result<void, AutomatonError>> {
  if (isJsonPath(path)) {
    return writeText(path, `${serializeRewriteRuleJson(rule)}\n`);
  }
  const text = serializeRewriteRule(rule);
  if (text.isErr()) return Err(text.error);
  return writeText(path, text.value);
}
