export * from "./kernel";
export * from "./stamp";
