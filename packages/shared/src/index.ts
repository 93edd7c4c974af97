export * from "./errors/index.js";
export * from "./locale/index.js";
export * from "./runtime/bounded-map.js";
export * from "./runtime/clock.js";
export * from "./runtime/id-generator.js";
export * from "./time.js";
