/**
 * @citeline/core - Research orchestration engine
 *
 * Main entry point with all essential exports
 */

// ============================================================================
// Engine
// ============================================================================
export { createResearchEngine } from "./engine.js";
export type { ResearchEngine, ResearchEngineOptions } from "./engine.js";
export * from "./engine/index.js";
export * from "./config.js";
export * from "./prompts.js";

// ============================================================================
// Session state
// ============================================================================
export * from "./session/session.js";

// ============================================================================
// Tools
// ============================================================================
export * from "./tool/tool.js";
export * from "./tool/registry.js";
export * from "./tool/builtin/index.js";

// ============================================================================
// Model contract
// ============================================================================
export * from "./model/index.js";

// ============================================================================
// Citations
// ============================================================================
export * from "./citations/index.js";

// ============================================================================
// Collaborators
// ============================================================================
export * from "./collaborators/index.js";
