export * from "./kernel-schedule";
export * from "./shifts";
export * from "./subwaypoints";
export * from "./walker";
