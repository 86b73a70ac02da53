import { z } from "zod";

const UINT32_MAX = 0xffffffff;

export const StepModeSchema = z.enum(["immediate", "limited"]);

/**
 * Driver configuration. Optional fields get their defaults on parse.
 */
export const AutomatonConfigSchema = z.object({
  stepMode: StepModeSchema.default("immediate"),
  minIntervalMs: z
    .number()
    .min(0, { error: "Minimum step interval must be non-negative" })
    .default(0),
  trace: z.boolean().default(false),
  seed: z
    .number()
    .int()
    .min(0, { error: "Seed must be a non-negative integer" })
    .max(UINT32_MAX, { error: "Seed must fit in uint32" })
    .optional(),
});

export type StepModeName = z.infer<typeof StepModeSchema>;
export type AutomatonConfigInput = z.input<typeof AutomatonConfigSchema>;
export type AutomatonConfig = z.infer<typeof AutomatonConfigSchema>;
