/**
 * Step trace collector implementation.
 */

import type { CellSetData, RewriteStats, StepTrace, StepTraceEvent } from "./types";

const EMPTY_REWRITE_STATS: RewriteStats = {
  candidates: 0,
  approved: 0,
  rejected: 0,
  cellsWritten: 0,
};

/**
 * Default trace collector implementation
 */
export class DefaultStepTrace implements StepTrace {
  readonly enabled: boolean;
  private readonly events: StepTraceEvent[] = [];
  private readonly startTime: number;

  constructor(enabled: boolean = false) {
    this.enabled = enabled;
    this.startTime = performance.now();
  }

  private now(): number {
    return performance.now() - this.startTime;
  }

  start(source: string): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "start" });
  }

  end(source: string, durationMs: number): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "end", data: { durationMs } });
  }

  stencil(source: string, cells: number): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "stencil", data: { cells } });
  }

  rewrite(source: string, stats: RewriteStats): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "rewrite", data: stats });
  }

  cellSet(source: string, data: CellSetData): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "cell-set", data });
  }

  warning(source: string, message: string): void {
    if (!this.enabled) return;
    this.events.push({ timestamp: this.now(), source, eventType: "warning", data: { message } });
  }

  getEvents(): readonly StepTraceEvent[] {
    return this.events;
  }

  getRewriteTotals(): RewriteStats {
    let candidates = 0;
    let approved = 0;
    let rejected = 0;
    let cellsWritten = 0;

    for (const event of this.events) {
      if (event.eventType !== "rewrite") continue;
      candidates += event.data.candidates;
      approved += event.data.approved;
      rejected += event.data.rejected;
      cellsWritten += event.data.cellsWritten;
    }

    return { candidates, approved, rejected, cellsWritten };
  }

  clear(): void {
    this.events.length = 0;
  }
}

/**
 * No-op trace collector for production
 */
export class NoOpStepTrace implements StepTrace {
  readonly enabled = false;

  start(_source: string): void {}
  end(_source: string, _durationMs: number): void {}
  stencil(_source: string, _cells: number): void {}
  rewrite(_source: string, _stats: RewriteStats): void {}
  cellSet(_source: string, _data: CellSetData): void {}
  warning(_source: string, _message: string): void {}
  getEvents(): readonly StepTraceEvent[] {
    return [];
  }
  getRewriteTotals(): RewriteStats {
    return EMPTY_REWRITE_STATS;
  }
  clear(): void {}
}

/**
 * Shared no-op instance for rules constructed without a collector.
 */
export const NO_OP_TRACE: StepTrace = new NoOpStepTrace();

/**
 * Create a trace collector based on configuration
 */
export function createStepTrace(enabled: boolean): StepTrace {
  return enabled ? new DefaultStepTrace(true) : new NoOpStepTrace();
}
