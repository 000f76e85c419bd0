export * from "./errors.js";
export * from "./filters.js";
export * from "./validation.js";
