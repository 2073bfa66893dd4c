/**
 * OpenAI Adapter
 *
 * LLM turn service over streaming chat completions with function calling.
 */

import { OpenAI, type ClientOptions } from "openai";
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import type { ModelDelta, ModelInput, ResearchModel, ToolSpec, UsageStats } from "@citeline/core";
import { Logger } from "@citeline/kernel";
import type { Turn } from "@citeline/shared";
import { DEFAULT_MAX_TOKENS, DEFAULT_OPENAI_MODEL, STOP_REASON_MAP } from "./types.js";

const log = Logger.for("OpenAIAdapter");

/**
 * The slice of the SDK client the adapter calls.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<AsyncIterable<ChatCompletionChunk>>;
    };
  };
}

export interface OpenAIAdapterConfig {
  apiKey?: string;
  baseURL?: string;
  organization?: string;
  /** @default "gpt-4o-mini" */
  model?: string;
  /** @default 4096 */
  maxTokens?: number;
  temperature?: number;
  /** Pre-built client; the connection options above are then ignored */
  client?: ChatCompletionsClient;
}

// ============================================================================
// Factory Function
// ============================================================================

export function createOpenAIModel(config: OpenAIAdapterConfig = {}): ResearchModel {
  const client: ChatCompletionsClient = config.client ?? new OpenAI(buildClientOptions(config));
  const model = config.model ?? DEFAULT_OPENAI_MODEL;
  const maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    id: model,

    async *stream(input: ModelInput): AsyncGenerator<ModelDelta> {
      const tools = input.tools.map(toOpenAITool);
      const params: ChatCompletionCreateParamsStreaming = {
        model,
        messages: toOpenAIMessages(input.system, input.transcript),
        max_tokens: maxTokens,
        stream: true,
        stream_options: { include_usage: true },
        ...(config.temperature !== undefined ? { temperature: config.temperature } : {}),
        ...(tools.length > 0 ? { tools, tool_choice: "auto" as const } : {}),
      };

      log.debug({ model, messages: params.messages.length, tools: tools.length }, "chat completion");

      const stream = await client.chat.completions.create(params, { signal: input.signal });
      const mapChunk = createChunkMapper();

      for await (const chunk of stream) {
        yield* mapChunk(chunk);
      }
    },
  };
}

/**
 * Convenience factory.
 *
 * @example
 * ```typescript
 * const model = openai({ model: "gpt-4o-mini" });
 * const engine = createResearchEngine({ model });
 * ```
 */
export function openai(config?: OpenAIAdapterConfig): ResearchModel {
  return createOpenAIModel(config);
}

// ============================================================================
// Helper Functions
// ============================================================================

export function buildClientOptions(config: OpenAIAdapterConfig): ClientOptions {
  const apiKey = config.apiKey ?? process.env["OPENAI_API_KEY"];
  const baseURL = config.baseURL ?? process.env["OPENAI_BASE_URL"];
  const organization = config.organization ?? process.env["OPENAI_ORGANIZATION"];

  return {
    ...(apiKey !== undefined ? { apiKey } : {}),
    ...(baseURL !== undefined ? { baseURL } : {}),
    ...(organization !== undefined ? { organization } : {}),
  };
}

function toUsage(usage: ChatCompletionChunk["usage"]): UsageStats | undefined {
  if (!usage) return undefined;
  return {
    inputTokens: usage.prompt_tokens ?? 0,
    outputTokens: usage.completion_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
  };
}

/**
 * Build a stateful chunk mapper for one stream.
 *
 * OpenAI sends a tool call's id only on its first chunk; later argument
 * fragments carry just the index, so ids are tracked by index here.
 */
export function createChunkMapper(): (chunk: ChatCompletionChunk) => ModelDelta[] {
  const toolCallIdByIndex = new Map<number, string>();

  return (chunk) => {
    const deltas: ModelDelta[] = [];
    const choice = chunk.choices[0];

    // Usage-only chunk after finish_reason
    if (!choice) {
      const usage = toUsage(chunk.usage);
      if (usage) deltas.push({ type: "usage", usage });
      return deltas;
    }

    const delta = choice.delta;
    if (delta.content) {
      deltas.push({ type: "text", delta: delta.content });
    }

    for (const toolCall of delta.tool_calls ?? []) {
      if (toolCall.id) {
        toolCallIdByIndex.set(toolCall.index, toolCall.id);
      }
      const id = toolCallIdByIndex.get(toolCall.index) ?? `call_${toolCall.index}`;

      if (toolCall.function?.name !== undefined) {
        deltas.push({ type: "tool_call_start", id, name: toolCall.function.name });
      }
      if (toolCall.function?.arguments) {
        deltas.push({ type: "tool_call_delta", id, delta: toolCall.function.arguments });
      }
    }

    if (choice.finish_reason) {
      const usage = toUsage(chunk.usage);
      deltas.push({
        type: "message_end",
        stopReason: STOP_REASON_MAP[choice.finish_reason] ?? "other",
        ...(usage ? { usage } : {}),
      });
    }

    return deltas;
  };
}

/**
 * Convert the system prompt and transcript to chat completion messages.
 */
export function toOpenAIMessages(
  system: string,
  transcript: readonly Turn[],
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: "system", content: system }];

  for (const turn of transcript) {
    switch (turn.role) {
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;

      case "assistant":
        if (turn.toolCalls && turn.toolCalls.length > 0) {
          messages.push({
            role: "assistant",
            content: turn.content || null,
            tool_calls: turn.toolCalls.map((call) => ({
              id: call.callId,
              type: "function" as const,
              function: {
                name: call.name,
                arguments:
                  typeof call.arguments === "string"
                    ? call.arguments
                    : JSON.stringify(call.arguments ?? {}),
              },
            })),
          });
        } else {
          messages.push({ role: "assistant", content: turn.content });
        }
        break;

      case "tool":
        messages.push({ role: "tool", tool_call_id: turn.toolCallId, content: turn.content });
        break;
    }
  }

  return messages;
}

/**
 * Map a tool spec to OpenAI function format.
 */
export function toOpenAITool(tool: ToolSpec): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    },
  };
}
