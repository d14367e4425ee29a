export * from "./core/index.js";
export * from "./context/index.js";
