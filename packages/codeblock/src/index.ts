export * from "./types.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./parsing.js";
export * from "./python.js";
export * from "./examples.js";
export * from "./compose.js";
export * from "./instructions.js";
