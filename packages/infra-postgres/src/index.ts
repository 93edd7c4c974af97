export * from "./pool.js";
export * from "./postgres-message-source.js";
