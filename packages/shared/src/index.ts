export * from "./types.js";
export * from "./age.js";
export * from "./config.js";
export * from "./logger.js";
