export * from "./clock.js";
export * from "./factory.js";
export * from "./http.js";
export * from "./logger.js";
export * from "./tokens.js";
