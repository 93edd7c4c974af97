export * from "./schemas/common.js";
export * from "./schemas/descriptor.js";
export * from "./schemas/events.js";
export * from "./schemas/message-source.js";
export * from "./schemas/translate-api.js";
