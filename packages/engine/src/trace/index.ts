export { createStepTrace, DefaultStepTrace, NO_OP_TRACE, NoOpStepTrace } from "./trace";
export type {
  CellSetData,
  RewriteStats,
  StepTrace,
  StepTraceEvent,
  StepTraceEventType,
} from "./types";
