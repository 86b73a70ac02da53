/**
 * Error codes for automaton construction, stepping and serialization.
 * Using discriminated union for type-safe error handling.
 */
export type AutomatonErrorCode =
  | "CONFIG_INVALID"
  | "GRID_DIMENSIONS_INVALID"
  | "GRID_RAGGED"
  | "CELL_OUT_OF_BOUNDS"
  | "CELL_VALUE_INVALID"
  | "PATTERN_SHAPE_MISMATCH"
  | "PATTERN_INVALID"
  | "STENCIL_EXTENTS_INVALID"
  | "WINDOW_EXCEEDS_GRID"
  | "BOUNDARY_INVALID"
  | "SYMBOL_UNKNOWN"
  | "PARSE_FAILED"
  | "IO_FAILED";

/**
 * Unified error type for all automaton operations.
 *
 * @example
 * ```typescript
 * const error = new AutomatonError(
 *   "CELL_OUT_OF_BOUNDS",
 *   "Cell (7, 2) is outside a 5x5 grid",
 *   { row: 7, col: 2, rows: 5, cols: 5 }
 * );
 * ```
 */
export class AutomatonError extends Error {
  readonly name = "AutomatonError";

  constructor(
    public readonly code: AutomatonErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    // Maintains proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AutomatonError);
    }
  }

  static configInvalid(message: string, details?: Record<string, unknown>): AutomatonError {
    return new AutomatonError("CONFIG_INVALID", message, details);
  }

  /**
   * Out-of-bounds cell access. Carries the offending coordinate and the
   * grid's actual dimensions.
   */
  static outOfBounds(row: number, col: number, rows: number, cols: number): AutomatonError {
    return new AutomatonError(
      "CELL_OUT_OF_BOUNDS",
      `Cell (${row}, ${col}) is out of bounds for grid of size (${rows}, ${cols})`,
      { row, col, rows, cols },
    );
  }

  static cellValueInvalid(value: unknown, details?: Record<string, unknown>): AutomatonError {
    return new AutomatonError(
      "CELL_VALUE_INVALID",
      `Invalid cell value: ${String(value)} (expected an integer in 0..255)`,
      { value, ...details },
    );
  }

  static parseFailed(message: string, details?: Record<string, unknown>): AutomatonError {
    return new AutomatonError("PARSE_FAILED", message, details);
  }

  /**
   * Check if an unknown error is an AutomatonError.
   */
  static isAutomatonError(error: unknown): error is AutomatonError {
    return error instanceof AutomatonError;
  }

  toJSON(): {
    name: string;
    code: AutomatonErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}
