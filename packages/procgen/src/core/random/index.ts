export * from "./weighted-sampler";
