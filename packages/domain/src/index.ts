export * from "./category-pattern.js";
export * from "./icu-message.js";
export * from "./message-text.js";
