export * from "./model.js";
export * from "./stream-accumulator.js";
