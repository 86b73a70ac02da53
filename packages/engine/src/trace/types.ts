/**
 * Step trace types for debugging and observability.
 */

/**
 * Outcome of one rewrite step's conflict resolution.
 */
export interface RewriteStats {
  /** Non-empty replacement groups produced by matching. */
  readonly candidates: number;
  readonly approved: number;
  readonly rejected: number;
  readonly cellsWritten: number;
}

export interface CellSetData {
  readonly row: number;
  readonly col: number;
  readonly value: number;
  readonly changed: boolean;
}

export type StepTraceEvent =
  | { readonly timestamp: number; readonly source: string; readonly eventType: "start" }
  | {
      readonly timestamp: number;
      readonly source: string;
      readonly eventType: "end";
      readonly data: { readonly durationMs: number };
    }
  | {
      readonly timestamp: number;
      readonly source: string;
      readonly eventType: "stencil";
      readonly data: { readonly cells: number };
    }
  | {
      readonly timestamp: number;
      readonly source: string;
      readonly eventType: "rewrite";
      readonly data: RewriteStats;
    }
  | {
      readonly timestamp: number;
      readonly source: string;
      readonly eventType: "cell-set";
      readonly data: CellSetData;
    }
  | {
      readonly timestamp: number;
      readonly source: string;
      readonly eventType: "warning";
      readonly data: { readonly message: string };
    };

export type StepTraceEventType = StepTraceEvent["eventType"];

/**
 * Collector handed to rules and the automaton. The no-op implementation is
 * used unless tracing is switched on.
 */
export interface StepTrace {
  readonly enabled: boolean;
  start(source: string): void;
  end(source: string, durationMs: number): void;
  stencil(source: string, cells: number): void;
  rewrite(source: string, stats: RewriteStats): void;
  cellSet(source: string, data: CellSetData): void;
  warning(source: string, message: string): void;
  getEvents(): readonly StepTraceEvent[];
  /** Sum of every rewrite event recorded so far. */
  getRewriteTotals(): RewriteStats;
  clear(): void;
}
