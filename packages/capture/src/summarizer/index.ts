export * from "./command.js";
export * from "./prompts.js";
export * from "./summarizer.js";
