/**
 * Text format for rewrite rules.
 *
 * ```text
 * <row boundary>;\n\n<col boundary>;\n\n[<pattern>(;\n\n<pattern>)*;\n]
 * pattern = <chance>;\n<priority>;\n<before rows>;\n<after rows>
 * ```
 *
 * Boundaries are written `Periodic` or `Symbol:<char>`. Template rows are
 * symbol strings joined by `\n`. A rule without patterns is the header only,
 * ending in `;\n\n`.
 */

import {
  AutomatonError,
  Err,
  Ok,
  type PatternDefinition,
  Result,
  type RewriteRuleDefinition,
} from "@cellforge/contracts";
import { type BoundaryPolicy, type Cell, cellToSymbol, symbolToCell } from "../core/grid";
import { cellsToText } from "../io/text-grid";
import type { RewriteRule } from "../rules";
import { validateRewriteRuleDefinition } from "./rule-json";

const SECTION_SEPARATOR = ";\n\n";
const FIELD_SEPARATOR = ";\n";
const TERMINATOR = ";\n";
const PERIODIC_TEXT = "Periodic";
const SYMBOL_PREFIX = "Symbol:";

// ============================================================================
// Boundaries
// ============================================================================

export function boundaryToText(policy: BoundaryPolicy): Result<string, AutomatonError> {
  if (policy.kind === "periodic") return Ok(PERIODIC_TEXT);

  const symbol = cellToSymbol(policy.symbol);
  if (symbol === undefined) {
    return Err(
      new AutomatonError(
        "SYMBOL_UNKNOWN",
        `Sentinel value ${policy.symbol} has no text symbol`,
        { value: policy.symbol },
      ),
    );
  }
  return Ok(`${SYMBOL_PREFIX}${symbol}`);
}

export function boundaryFromText(text: string): Result<BoundaryPolicy, AutomatonError> {
  if (text === PERIODIC_TEXT) return Ok({ kind: "periodic" });

  if (text.startsWith(SYMBOL_PREFIX)) {
    const symbolText = text.slice(SYMBOL_PREFIX.length);
    const symbol = symbolToCell(symbolText);
    if (symbol !== undefined) {
      return Ok({ kind: "sentinel", symbol });
    }
  }

  return Err(
    new AutomatonError(
      "BOUNDARY_INVALID",
      `Invalid boundary "${text}": expected "${PERIODIC_TEXT}" or "${SYMBOL_PREFIX}<char>"`,
      { text },
    ),
  );
}

// ============================================================================
// Serialization
// ============================================================================

function templateToText(rows: readonly (readonly Cell[])[]): Result<string, AutomatonError> {
  return Result.all(rows.map((row) => cellsToText(row))).map((lines) => lines.join("\n"));
}

/**
 * Render a rule definition as text.
 */
export function serializeRewriteRuleDefinition(
  definition: RewriteRuleDefinition,
): Result<string, AutomatonError> {
  const sections: string[] = [];

  for (const policy of [definition.rowBoundary, definition.colBoundary]) {
    const text = boundaryToText(policy);
    if (text.isErr()) return Err(text.error);
    sections.push(text.value);
  }

  for (const pattern of definition.patterns) {
    const before = templateToText(pattern.before);
    if (before.isErr()) return Err(before.error);
    const after = templateToText(pattern.after);
    if (after.isErr()) return Err(after.error);

    sections.push(
      [String(pattern.chance), String(pattern.priority), before.value, after.value].join(
        FIELD_SEPARATOR,
      ),
    );
  }

  // A header without blocks keeps its section separator.
  if (sections.length === 2) return Ok(sections.join(SECTION_SEPARATOR) + SECTION_SEPARATOR);
  return Ok(sections.join(SECTION_SEPARATOR) + TERMINATOR);
}

/**
 * Render a rule as text. Fails when a template or sentinel cell has no
 * symbol.
 */
export function serializeRewriteRule(rule: RewriteRule): Result<string, AutomatonError> {
  return serializeRewriteRuleDefinition(rule.toDefinition());
}

// ============================================================================
// Parsing
// ============================================================================

function parseNumber(
  text: string,
  field: "chance" | "priority",
  patternIndex: number,
): Result<number, AutomatonError> {
  const value = Number(text);
  if (text.trim() === "" || !Number.isFinite(value)) {
    return Err(
      AutomatonError.parseFailed(`Pattern ${patternIndex}: ${field} "${text}" is not a number`, {
        pattern: patternIndex,
        field,
        text,
      }),
    );
  }
  return Ok(value);
}

function parseTemplate(
  text: string,
  side: "before" | "after",
  patternIndex: number,
): Result<Cell[][], AutomatonError> {
  const rows: Cell[][] = [];
  const lines = text.split("\n");

  for (let line = 0; line < lines.length; line++) {
    const cells: Cell[] = [];
    for (const symbol of lines[line]) {
      const cell = symbolToCell(symbol);
      if (cell === undefined) {
        return Err(
          new AutomatonError(
            "SYMBOL_UNKNOWN",
            `Pattern ${patternIndex}: unknown symbol "${symbol}" in ${side} template`,
            { pattern: patternIndex, side, line, symbol },
          ),
        );
      }
      cells.push(cell);
    }
    rows.push(cells);
  }

  return Ok(rows);
}

function parsePatternBlock(
  block: string,
  patternIndex: number,
): Result<PatternDefinition, AutomatonError> {
  const fields = block.split(FIELD_SEPARATOR);
  if (fields.length !== 4) {
    return Err(
      AutomatonError.parseFailed(
        `Pattern ${patternIndex}: expected 4 fields (chance, priority, before, after), found ${fields.length}`,
        { pattern: patternIndex, fields: fields.length },
      ),
    );
  }

  const [chanceText, priorityText, beforeText, afterText] = fields;
  return parseNumber(chanceText, "chance", patternIndex).flatMap((chance) =>
    parseNumber(priorityText, "priority", patternIndex).flatMap((priority) =>
      parseTemplate(beforeText, "before", patternIndex).flatMap((before) =>
        parseTemplate(afterText, "after", patternIndex).map((after) => ({
          chance,
          priority,
          before,
          after,
        })),
      ),
    ),
  );
}

/**
 * Parse the text format into a validated rule definition. `\r\n` line
 * endings and one trailing newline after the terminator are accepted, so a
 * header-only rule may end in `;\n\n`.
 *
 * @example
 * ```typescript
 * const definition = parseRewriteRuleText(
 *   "Symbol:_;\n\nSymbol:_;\n\n1;\n0;\nX\n ;\n \nX;\n",
 * ).getOrThrow();
 * ```
 */
export function parseRewriteRuleText(
  text: string,
): Result<RewriteRuleDefinition, AutomatonError> {
  const crlfFree = text.replace(/\r\n/g, "\n");
  const normalized = crlfFree.endsWith(SECTION_SEPARATOR) ? crlfFree.slice(0, -1) : crlfFree;
  if (!normalized.endsWith(TERMINATOR)) {
    return Err(AutomatonError.parseFailed(`Rule text must end with ";\\n"`));
  }

  const sections = normalized.slice(0, -TERMINATOR.length).split(SECTION_SEPARATOR);
  if (sections.length < 2) {
    return Err(
      AutomatonError.parseFailed("Rule text needs a row boundary and a column boundary", {
        sections: sections.length,
      }),
    );
  }

  const [rowText, colText, ...blocks] = sections;
  const rowBoundary = boundaryFromText(rowText);
  if (rowBoundary.isErr()) return Err(rowBoundary.error);
  const colBoundary = boundaryFromText(colText);
  if (colBoundary.isErr()) return Err(colBoundary.error);

  const patterns: PatternDefinition[] = [];
  for (let index = 0; index < blocks.length; index++) {
    const pattern = parsePatternBlock(blocks[index], index);
    if (pattern.isErr()) return Err(pattern.error);
    patterns.push(pattern.value);
  }

  return validateRewriteRuleDefinition({
    rowBoundary: rowBoundary.value,
    colBoundary: colBoundary.value,
    patterns,
  });
}
