// Main programmatic API entry point
export * from "./api/index.js";
