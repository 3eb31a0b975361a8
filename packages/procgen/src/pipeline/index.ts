/**
 * Pipeline module - post-processing passes and tracing.
 */

export * from "./post-process";
export * from "./trace";
export * from "./types";
