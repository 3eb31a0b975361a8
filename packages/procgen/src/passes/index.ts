export * from "./carve-rooms";
export * from "./fix-edge-bugs";
export * from "./generate-skips";
export * from "./place-platforms";
export * from "./remove-freeze-blobs";
