export { readGridFile, readRuleFile, writeGridFile, writeRuleFile } from "./files";
export { cellsToText, gridFromText, gridToText } from "./text-grid";
