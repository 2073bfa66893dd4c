import { describe, it, expect, vi } from "vitest";
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
} from "openai/resources/chat/completions";
import { StreamAccumulator } from "@citeline/core";
import {
  createChunkMapper,
  createOpenAIModel,
  toOpenAIMessages,
  toOpenAITool,
  type ChatCompletionsClient,
} from "./openai.js";

function chunk(
  delta: ChatCompletionChunk.Choice.Delta,
  finishReason: ChatCompletionChunk.Choice["finish_reason"] = null,
): ChatCompletionChunk {
  return {
    id: "chatcmpl-test",
    object: "chat.completion.chunk",
    created: 0,
    model: "gpt-4o-mini",
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  };
}

const usageChunk: ChatCompletionChunk = {
  id: "chatcmpl-test",
  object: "chat.completion.chunk",
  created: 0,
  model: "gpt-4o-mini",
  choices: [],
  usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
};

describe("createChunkMapper", () => {
  it("maps text content", () => {
    const map = createChunkMapper();
    expect(map(chunk({ content: "Hello" }))).toEqual([{ type: "text", delta: "Hello" }]);
    expect(map(chunk({ content: "" }))).toEqual([]);
  });

  it("tracks tool call ids by index across fragments", () => {
    const map = createChunkMapper();

    expect(
      map(
        chunk({
          tool_calls: [{ index: 0, id: "call_abc", function: { name: "search_web", arguments: "" } }],
        }),
      ),
    ).toEqual([{ type: "tool_call_start", id: "call_abc", name: "search_web" }]);

    expect(map(chunk({ tool_calls: [{ index: 0, function: { arguments: '{"query":' } }] }))).toEqual([
      { type: "tool_call_delta", id: "call_abc", delta: '{"query":' },
    ]);
  });

  it("maps the finish reason and a trailing usage chunk", () => {
    const map = createChunkMapper();

    expect(map(chunk({}, "tool_calls"))).toEqual([{ type: "message_end", stopReason: "tool_use" }]);
    expect(map(usageChunk)).toEqual([
      { type: "usage", usage: { inputTokens: 12, outputTokens: 3, totalTokens: 15 } },
    ]);
  });
});

describe("toOpenAIMessages", () => {
  it("converts the transcript with tool calls and results", () => {
    const messages = toOpenAIMessages("Be helpful.", [
      { role: "user", content: "Tides?" },
      {
        role: "assistant",
        content: "",
        toolCalls: [{ callId: "call_1", name: "search_web", arguments: { query: "tides" } }],
      },
      { role: "tool", content: '{"success":true}', toolCallId: "call_1", name: "search_web" },
      { role: "assistant", content: "The moon [1]." },
    ]);

    expect(messages).toEqual([
      { role: "system", content: "Be helpful." },
      { role: "user", content: "Tides?" },
      {
        role: "assistant",
        content: null,
        tool_calls: [
          {
            id: "call_1",
            type: "function",
            function: { name: "search_web", arguments: '{"query":"tides"}' },
          },
        ],
      },
      { role: "tool", tool_call_id: "call_1", content: '{"success":true}' },
      { role: "assistant", content: "The moon [1]." },
    ]);
  });

  it("sends unparseable arguments back verbatim", () => {
    const [, message] = toOpenAIMessages("s", [
      {
        role: "assistant",
        content: "",
        toolCalls: [{ callId: "c", name: "search_web", arguments: "{broken" }],
      },
    ]);

    expect(message).toMatchObject({
      tool_calls: [{ function: { arguments: "{broken" } }],
    });
  });
});

describe("toOpenAITool", () => {
  it("wraps a tool spec as a function", () => {
    expect(
      toOpenAITool({
        name: "search_web",
        description: "Search",
        parameters: { type: "object", properties: {} },
      }),
    ).toEqual({
      type: "function",
      function: {
        name: "search_web",
        description: "Search",
        parameters: { type: "object", properties: {} },
      },
    });
  });
});

describe("createOpenAIModel", () => {
  it("streams deltas that assemble into a tool call", async () => {
    const chunks = [
      chunk({ role: "assistant", content: "Let me look. " }),
      chunk({ tool_calls: [{ index: 0, id: "call_1", function: { name: "search_web" } }] }),
      chunk({ tool_calls: [{ index: 0, function: { arguments: '{"query":"tides"}' } }] }),
      chunk({}, "tool_calls"),
      usageChunk,
    ];
    const create = vi.fn(async (_body: ChatCompletionCreateParamsStreaming) => {
      async function* replay() {
        yield* chunks;
      }
      return replay();
    });
    const client: ChatCompletionsClient = { chat: { completions: { create } } };
    const model = createOpenAIModel({ client, model: "gpt-4o-mini", maxTokens: 256 });
    const controller = new AbortController();

    const accumulator = new StreamAccumulator();
    for await (const delta of model.stream({
      system: "Be helpful.",
      transcript: [{ role: "user", content: "Tides?" }],
      tools: [{ name: "search_web", description: "Search", parameters: { type: "object" } }],
      signal: controller.signal,
    })) {
      accumulator.push(delta);
    }

    expect(accumulator.toOutput()).toEqual({
      text: "Let me look. ",
      toolCalls: [{ callId: "call_1", name: "search_web", arguments: { query: "tides" } }],
      stopReason: "tool_use",
      usage: { inputTokens: 12, outputTokens: 3, totalTokens: 15 },
    });

    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gpt-4o-mini",
        max_tokens: 256,
        stream: true,
        stream_options: { include_usage: true },
        tool_choice: "auto",
      }),
      { signal: controller.signal },
    );
    expect(model.id).toBe("gpt-4o-mini");
  });

  it("omits tools when the menu is empty", async () => {
    const create = vi.fn(async (_body: ChatCompletionCreateParamsStreaming) => {
      async function* replay() {
        yield chunk({ content: "Hi" }, "stop");
      }
      return replay();
    });
    const model = createOpenAIModel({ client: { chat: { completions: { create } } } });

    for await (const _delta of model.stream({ system: "s", transcript: [], tools: [] })) {
      // drain
    }

    const body = create.mock.calls[0]?.[0];
    expect(body).not.toHaveProperty("tools");
    expect(body?.model).toBe("gpt-4o-mini");
    expect(body?.max_tokens).toBe(4096);
  });
});
