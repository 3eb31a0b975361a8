/**
 * Procedural generation of hookable tunnel levels.
 *
 * A seeded walker carves tunnels between the waypoints of a map skeleton;
 * post-processing adds shortcuts, platforms and the start and finish rooms.
 *
 * @example
 * ```typescript
 * import { generateLevel } from "@tunnelgen/procgen";
 *
 * const result = generateLevel({ seed: 12345, maxSteps: 5000 });
 *
 * if (result.isOk()) {
 *   const { artifact } = result.value;
 *   console.log(`Walked ${artifact.steps} steps, ${artifact.skips.length} skips`);
 * }
 * ```
 */

// Core modules
export * from "./core";
// High-level API
export * from "./api";
export * from "./generator";
// Pass Library
export * as passes from "./passes";
// Pipeline
export * from "./pipeline";
export * from "./skips";
// Validation
export * from "./validation";
export * from "./walker";
