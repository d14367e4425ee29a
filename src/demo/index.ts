export * from "./shared.js";
export * from "./timeout.js";
export * from "./cancel.js";
export * from "./deadline.js";
export * from "./value.js";
