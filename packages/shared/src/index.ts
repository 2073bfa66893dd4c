/**
 * # Citeline Shared Types
 *
 * Platform-independent definitions used by every citeline package:
 *
 * - **Protocol** - client messages (validated) and server events
 * - **Transcript** - conversation turns, tool calls and results, sources, notes
 * - **Errors** - tool-level and turn-level error classes
 *
 * @module @citeline/shared
 */

export * from "./errors.js";
export * from "./transcript.js";
export * from "./protocol.js";
