export * from "./transcript/entries.js";
export * from "./transcript/parser.js";
export * from "./summarizer/index.js";
export * from "./hooks/index.js";
