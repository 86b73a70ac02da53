import { z } from "zod";

const UINT8_MAX = 0xff;

/**
 * A single cell value: an unsigned 8-bit integer.
 */
export const CellValueSchema = z
  .number()
  .int({ error: "Cell values must be integers" })
  .min(0, { error: "Cell values must be non-negative" })
  .max(UINT8_MAX, { error: "Cell values must fit in 8 bits" });

export const BoundaryPolicySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("periodic") }),
  z.object({ kind: z.literal("sentinel"), symbol: CellValueSchema }),
]);

/**
 * Rectangular block of cells, row-major. At least 1x1.
 */
export const CellBlockSchema = z
  .array(z.array(CellValueSchema).min(1, { error: "Rows cannot be empty" }))
  .min(1, { error: "A cell block needs at least one row" })
  .superRefine((rows, ctx) => {
    const width = rows[0]?.length ?? 0;
    rows.forEach((row, index) => {
      if (row.length !== width) {
        ctx.addIssue({
          code: "custom",
          message: `Row ${index} has ${row.length} cells, expected ${width}`,
          path: [index],
        });
      }
    });
  });

export const PatternDefinitionSchema = z
  .object({
    chance: z
      .number()
      .min(0, { error: "Chance must be at least 0" })
      .max(1, { error: "Chance cannot exceed 1" })
      .default(1),
    priority: z.number().default(0),
    before: CellBlockSchema,
    after: CellBlockSchema,
  })
  .superRefine((data, ctx) => {
    const beforeCols = data.before[0]?.length ?? 0;
    const afterCols = data.after[0]?.length ?? 0;
    if (data.before.length !== data.after.length || beforeCols !== afterCols) {
      ctx.addIssue({
        code: "custom",
        message: `Pattern before (${data.before.length}x${beforeCols}) and after (${data.after.length}x${afterCols}) must have the same dimensions`,
        path: ["after"],
      });
    }
  });

/**
 * Structured (key-value) form of a rewrite rule.
 */
export const RewriteRuleDefinitionSchema = z.object({
  rowBoundary: BoundaryPolicySchema,
  colBoundary: BoundaryPolicySchema,
  patterns: z.array(PatternDefinitionSchema),
});

export type BoundaryPolicyDefinition = z.infer<typeof BoundaryPolicySchema>;
export type CellBlock = z.infer<typeof CellBlockSchema>;
export type PatternDefinition = z.infer<typeof PatternDefinitionSchema>;
export type PatternDefinitionInput = z.input<typeof PatternDefinitionSchema>;
export type RewriteRuleDefinition = z.infer<typeof RewriteRuleDefinitionSchema>;
export type RewriteRuleDefinitionInput = z.input<
  typeof RewriteRuleDefinitionSchema
>;
