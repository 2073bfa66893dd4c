import type { ChatCompletionChunk } from "openai/resources/chat/completions";
import type { StopReason } from "@citeline/core";

export type OpenAIFinishReason = NonNullable<ChatCompletionChunk.Choice["finish_reason"]>;

export const STOP_REASON_MAP: Record<OpenAIFinishReason, StopReason> = {
  stop: "stop",
  length: "max_tokens",
  tool_calls: "tool_use",
  content_filter: "content_filter",
  function_call: "tool_use",
};

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_TOKENS = 4096;
