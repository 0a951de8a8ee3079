export * from "./assertion.js";
export * from "./config.js";
