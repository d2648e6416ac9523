export * from "./builtin.js";
export * from "./config.js";
export * from "./constants.js";
export * from "./errors.js";
export * from "./identity.js";
export * from "./keyed-set.js";
export * from "./metadata.js";
export * from "./package.js";
export * from "./text.js";
export * from "./user-var.js";
export * from "./utils/logger.js";
export * from "./version.js";
