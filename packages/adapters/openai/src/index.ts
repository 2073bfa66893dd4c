/**
 * # Citeline OpenAI Adapter
 *
 * Streams chat completions with function calling and maps them onto the
 * research loop's model deltas.
 *
 * ```typescript
 * import { openai } from "@citeline/openai";
 *
 * const engine = createResearchEngine({ model: openai({ model: "gpt-4o-mini" }) });
 * ```
 *
 * @module @citeline/openai
 */
export * from "./openai.js";
export * from "./types.js";
