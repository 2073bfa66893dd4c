/**
 * Model contract.
 *
 * The research loop talks to an LLM through `ResearchModel.stream()`, which
 * yields provider-neutral `ModelDelta`s. Adapters map their provider's chunks
 * onto these deltas; `StreamAccumulator` turns them back into a finished
 * response (text plus tool calls).
 *
 * @module @citeline/core/model
 */

import type { Turn } from "@citeline/shared";

export type StopReason = "stop" | "tool_use" | "max_tokens" | "content_filter" | "other";

export interface UsageStats {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Tool as presented to the model: name, description and a JSON Schema object
 * for its arguments.
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ModelInput {
  system: string;
  transcript: readonly Turn[];
  tools: readonly ToolSpec[];
  signal?: AbortSignal;
}

/**
 * Normalized stream delta.
 *
 * Tool calls arrive either in parts (`tool_call_start` + `tool_call_delta`
 * carrying argument JSON fragments) or whole (`tool_call`).
 */
export type ModelDelta =
  | { type: "text"; delta: string }
  | { type: "tool_call_start"; id: string; name: string }
  | { type: "tool_call_delta"; id: string; delta: string }
  | { type: "tool_call"; id: string; name: string; input: unknown }
  | { type: "message_end"; stopReason: StopReason; usage?: UsageStats }
  | { type: "usage"; usage: Partial<UsageStats> }
  | { type: "error"; error: Error | string; code?: string };

/**
 * The LLM turn service.
 */
export interface ResearchModel {
  /** Model identifier, for logs and the health endpoint */
  readonly id: string;

  stream(input: ModelInput): AsyncIterable<ModelDelta>;
}
