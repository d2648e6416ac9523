export * from "./guards.js";
export * from "./metadata.js";
export * from "./status.js";
export * from "./tracking.js";
