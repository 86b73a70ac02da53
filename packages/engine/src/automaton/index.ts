export {
  Automaton,
  type AutomatonOptions,
  type Clock,
  type Rgba,
  type StepMode,
  systemClock,
} from "./automaton";
export { AutomatonBuilder, type CellKey } from "./builder";
export { resolveAutomatonConfig, type ValidatedAutomatonConfig } from "./config";
