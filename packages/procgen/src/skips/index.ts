export * from "./skip-tracker";
