/**
 * Research engine configuration.
 *
 * @module @citeline/core/config
 */

import { z } from "zod";

export const ResearchConfigSchema = z.object({
  /** Tool-dispatch rounds allowed per user turn */
  maxSteps: z.number().int().positive().default(8),
  maxSearchResults: z.number().int().positive().default(5),
  /** Characters of page text handed to the model */
  maxContentLength: z.number().int().positive().default(3000),
  /** Bound on each search or fetch call */
  requestTimeoutMs: z.number().int().positive().default(10_000),
  /** Bound on one streamed model call */
  modelTimeoutMs: z.number().int().positive().default(120_000),
  /** Appended to the built-in system prompt */
  systemPromptSuffix: z.string().optional(),
});

export type ResearchConfig = z.output<typeof ResearchConfigSchema>;
export type ResearchConfigInput = z.input<typeof ResearchConfigSchema>;

export function resolveResearchConfig(input: ResearchConfigInput = {}): ResearchConfig {
  return ResearchConfigSchema.parse(input);
}
