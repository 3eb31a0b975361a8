/**
 * Core module - primitives shared by the walker and the passes.
 */

export * from "./geometry";
export * from "./grid";
export * from "./hash";
export * from "./kernel";
export * from "./random";
