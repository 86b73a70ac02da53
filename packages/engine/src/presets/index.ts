export { type GameOfLifeOptions, gameOfLife } from "./game-of-life";
export { type Rule90Options, rule90 } from "./rule90";
export { SAND_COLORS, SandCell, sandRule } from "./sand";
