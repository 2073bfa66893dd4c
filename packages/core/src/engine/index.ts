export * from "./tool-executor.js";
export * from "./orchestrator.js";
