import {
  type AutomatonConfig,
  type AutomatonConfigInput,
  AutomatonConfigSchema,
  AutomatonError,
  Err,
  Ok,
  randomUint32,
  type Result,
} from "@cellforge/contracts";

/**
 * Driver configuration with every default filled in, including the seed.
 */
export interface ValidatedAutomatonConfig extends AutomatonConfig {
  readonly seed: number;
}

/**
 * Validate a config and fill its defaults. A missing seed is drawn from the
 * system random source so the resolved config always reproduces the run.
 */
export function resolveAutomatonConfig(
  input: AutomatonConfigInput = {},
): Result<ValidatedAutomatonConfig, AutomatonError> {
  const parsed = AutomatonConfigSchema.safeParse(input);
  if (!parsed.success) {
    return Err(
      AutomatonError.configInvalid("Invalid automaton configuration", {
        errors: parsed.error.issues,
      }),
    );
  }

  return Ok({ ...parsed.data, seed: parsed.data.seed ?? randomUint32() });
}
