export * from "./errors.js";
export * from "./events.js";
export * from "./serialize.js";
export * from "./validation.js";
