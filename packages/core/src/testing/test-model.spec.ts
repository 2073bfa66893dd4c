import { describe, it, expect } from "vitest";
import type { ModelDelta, ModelInput } from "../model/model.js";
import { createTestModel } from "./test-model.js";
import { captureAsyncGenerator } from "./async-helpers.js";

function input(signal?: AbortSignal): ModelInput {
  return { system: "system", transcript: [], tools: [], signal };
}

function collect(deltas: AsyncIterable<ModelDelta>): Promise<ModelDelta[]> {
  return captureAsyncGenerator(deltas);
}

describe("createTestModel", () => {
  it("uses the default response when nothing is queued", async () => {
    const model = createTestModel();

    const deltas = await collect(model.stream(input()));

    expect(deltas[0]).toEqual({ type: "text", delta: "Test response" });
    expect(deltas.at(-1)).toMatchObject({ type: "message_end", stopReason: "stop" });
  });

  it("consumes queued responses in order", async () => {
    const model = createTestModel({ defaultResponse: "fallback" });
    model.respondWith(["first"]);
    model.respondWith([{ text: "second" }]);
    expect(model.pending).toBe(2);

    const texts: ModelDelta[] = [];
    for (let i = 0; i < 3; i++) {
      const [first] = await collect(model.stream(input()));
      if (first) texts.push(first);
    }

    expect(texts).toEqual([
      { type: "text", delta: "first" },
      { type: "text", delta: "second" },
      { type: "text", delta: "fallback" },
    ]);
    expect(model.pending).toBe(0);
    expect(model.mocks.stream).toHaveBeenCalledTimes(3);
  });

  it("numbers tool calls and ends with tool_use", async () => {
    const model = createTestModel();
    model.respondWith([
      {
        tool: [
          { name: "search_web", input: { query: "tides" } },
          { id: "custom", name: "take_note", input: "{broken" },
        ],
      },
    ]);

    const deltas = await collect(model.stream(input()));

    expect(deltas.slice(0, 4)).toEqual([
      { type: "tool_call_start", id: "call_test_1", name: "search_web" },
      { type: "tool_call_delta", id: "call_test_1", delta: '{"query":"tides"}' },
      { type: "tool_call_start", id: "custom", name: "take_note" },
      { type: "tool_call_delta", id: "custom", delta: "{broken" },
    ]);
    expect(deltas[4]).toMatchObject({ type: "message_end", stopReason: "tool_use" });
  });

  it("splits text into chunks", async () => {
    const model = createTestModel({ chunkSize: 4 });
    model.respondWith(["abcdefghij"]);

    const deltas = await collect(model.stream(input()));

    expect(deltas.slice(0, 3)).toEqual([
      { type: "text", delta: "abcd" },
      { type: "text", delta: "efgh" },
      { type: "text", delta: "ij" },
    ]);
  });

  it("stalls until the call is aborted", async () => {
    const model = createTestModel();
    model.respondWith(["partial", { stall: true }]);
    const controller = new AbortController();
    const received: ModelDelta[] = [];

    const consumed = (async () => {
      for await (const delta of model.stream(input(controller.signal))) {
        received.push(delta);
      }
    })();
    controller.abort(new Error("stop waiting"));

    await expect(consumed).rejects.toThrow("stop waiting");
    expect(received).toEqual([{ type: "text", delta: "partial" }]);
  });

  it("captures a copy of each input", async () => {
    const model = createTestModel();
    const transcript = [{ role: "user" as const, content: "hello" }];

    await collect(model.stream({ ...input(), transcript }));
    transcript.push({ role: "user", content: "later" });

    expect(model.getCapturedInputs()[0]?.transcript).toEqual([{ role: "user", content: "hello" }]);
  });
});
