import type { ReadonlyCellGrid } from "../grid/types";
import { FNV64Hasher } from "./fnv64";

/**
 * Deterministic fingerprint of a grid: dimensions followed by every cell.
 * Two grids share a checksum exactly when they are equal (barring collisions).
 */
export function gridChecksum(grid: ReadonlyCellGrid): string {
  return new FNV64Hasher()
    .updateInt32(grid.rows)
    .updateInt32(grid.cols)
    .updateBytes(grid.getRawDataCopy())
    .digest();
}
