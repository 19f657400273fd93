export * from "./codec.js";
export * from "./query.js";
export * from "./documents.js";
