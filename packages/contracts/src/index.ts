export * from "./defaults";
export * from "./providers";
export * from "./random/rng";
export * from "./random/seeded-random";
export * from "./schemas/map-skeleton";
export * from "./schemas/profile";
export * from "./types/error";
export * from "./types/result";
export * from "./utils/builder";
