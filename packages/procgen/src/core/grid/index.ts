/**
 * Grid module - 2D grid data structures and algorithms.
 */

export { BitGrid } from "./bit-grid";
export * from "./flood-fill";
export { Grid } from "./grid";
export * from "./types";
