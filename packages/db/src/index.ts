export * from "./schema.js";
export * from "./client.js";
export * from "./ranking.js";
export * from "./store.js";
