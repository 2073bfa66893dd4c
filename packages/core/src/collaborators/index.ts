export * from "./types.js";
export * from "./html.js";
export * from "./page-fetcher.js";
export * from "./duckduckgo.js";
export * from "./google.js";
