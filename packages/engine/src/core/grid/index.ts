/**
 * Grid module - cells, boundaries and the grid container.
 */

export * from "./boundary";
export * from "./cell";
export { Grid } from "./grid";
export * from "./types";
