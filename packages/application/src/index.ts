export * from "./category-resolver.js";
export * from "./default-instance.js";
export * from "./errors.js";
export * from "./events.js";
export * from "./factories.js";
export * from "./json-file-message-source.js";
export * from "./message-formatter.js";
export * from "./message-pipeline.js";
export * from "./message-source.js";
export * from "./object-factory.js";
