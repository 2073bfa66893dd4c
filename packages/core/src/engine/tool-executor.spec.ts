import { describe, it, expect } from "vitest";
import type { ToolCall, ToolResult, ToolUseEvent } from "@citeline/shared";
import { createAbortError } from "@citeline/kernel";
import { ToolExecutor } from "./tool-executor.js";
import { createResearchToolRegistry } from "../tool/registry.js";
import { ResearchSession, type TurnHandle } from "../session/session.js";
import { createMockFetcher, createMockSearch, stallUntilAborted } from "../testing/index.js";
import type { MockPageFetcher, MockSearchProvider } from "../testing/index.js";

function setup(
  overrides: { search?: MockSearchProvider; fetcher?: MockPageFetcher; requestTimeoutMs?: number } = {},
) {
  const search =
    overrides.search ??
    createMockSearch((query) => [
      { url: "https://a.example/", title: "A", snippet: `about ${query}` },
      { url: "https://b.example/", title: "B", snippet: "second" },
    ]);
  const fetcher =
    overrides.fetcher ??
    createMockFetcher({ "https://a.example/": { content: "Page body", title: "Page A" } });

  const executor = new ToolExecutor({
    registry: createResearchToolRegistry(),
    search,
    fetcher,
    limits: {
      maxSearchResults: 5,
      maxContentLength: 20,
      requestTimeoutMs: overrides.requestTimeoutMs ?? 1000,
    },
  });
  const session = new ResearchSession("s1");
  const turn = session.beginTurn();
  return { executor, session, turn, search, fetcher };
}

function call(name: string, args: unknown, callId = "call_1"): ToolCall {
  return { callId, name, arguments: args };
}

async function run(
  executor: ToolExecutor,
  toolCall: ToolCall,
  turn: TurnHandle,
  signal?: AbortSignal,
): Promise<{ events: ToolUseEvent[]; result: ToolResult }> {
  const events: ToolUseEvent[] = [];
  const generator = executor.execute(toolCall, turn, signal);
  while (true) {
    const step = await generator.next();
    if (step.done) return { events, result: step.value };
    events.push(step.value);
  }
}

function payload(result: ToolResult): unknown {
  return JSON.parse(result.content);
}

describe("ToolExecutor", () => {
  it("emits tool_use before running the tool", async () => {
    const { executor, turn, search } = setup();
    const generator = executor.execute(call("search_web", { query: "tides" }), turn);

    const first = await generator.next();
    expect(first.value).toEqual({ type: "tool_use", tool: "search_web", arguments: { query: "tides" } });
    expect(search.search).not.toHaveBeenCalled();

    const last = await generator.next();
    expect(last.done).toBe(true);
    expect(search.search).toHaveBeenCalledTimes(1);
  });

  describe("search_web", () => {
    it("registers each result as a source and returns its index", async () => {
      const { executor, turn, session } = setup();
      const { result } = await run(executor, call("search_web", { query: "tides" }), turn);

      expect(result.success).toBe(true);
      expect(payload(result)).toEqual({
        success: true,
        query: "tides",
        results: [
          { index: 1, url: "https://a.example/", title: "A", snippet: "about tides" },
          { index: 2, url: "https://b.example/", title: "B", snippet: "second" },
        ],
      });
      expect(session.snapshot().sources.map((s) => s.query)).toEqual(["tides", "tides"]);
    });

    it("caps results at maxSearchResults", async () => {
      const hits = Array.from({ length: 8 }, (_, i) => ({
        url: `https://r${i}.example/`,
        title: `R${i}`,
        snippet: "",
      }));
      const { executor, turn, session } = setup({ search: createMockSearch(() => hits) });

      await run(executor, call("search_web", { query: "many" }), turn);

      expect(session.snapshot().sources).toHaveLength(5);
    });

    it("reports an empty result set", async () => {
      const { executor, turn } = setup({ search: createMockSearch(() => []) });
      const { result } = await run(executor, call("search_web", { query: "nothing" }), turn);

      expect(payload(result)).toEqual({
        success: true,
        query: "nothing",
        results: [],
        message: "No results found",
      });
    });

    it("turns a collaborator failure into a failed result", async () => {
      const search = createMockSearch(() => {
        throw new Error("quota exceeded");
      });
      const { executor, turn } = setup({ search });

      const { result } = await run(executor, call("search_web", { query: "x" }), turn);

      expect(result).toEqual({
        callId: "call_1",
        name: "search_web",
        success: false,
        error: "quota exceeded",
        content: JSON.stringify({
          success: false,
          error: "quota exceeded",
          error_type: "COLLABORATOR_FAILED",
        }),
      });
    });

    it("treats an abort-named collaborator error on a live turn as a failure", async () => {
      const search = createMockSearch(() => {
        throw createAbortError("upstream aborted the request");
      });
      const { executor, turn } = setup({ search });

      const { result } = await run(executor, call("search_web", { query: "x" }), turn);

      expect(result.success).toBe(false);
      expect(payload(result)).toEqual({
        success: false,
        error: "upstream aborted the request",
        error_type: "COLLABORATOR_FAILED",
      });
    });
  });

  describe("fetch_page_content", () => {
    it("truncates content and registers the page", async () => {
      const fetcher = createMockFetcher({
        "https://a.example/": { content: "x".repeat(30), title: "Long" },
      });
      const { executor, turn, session } = setup({ fetcher });

      const { result } = await run(executor, call("fetch_page_content", { url: "https://a.example/" }), turn);

      expect(payload(result)).toEqual({
        success: true,
        index: 1,
        url: "https://a.example/",
        title: "Long",
        content: `${"x".repeat(20)}...`,
        truncated: true,
      });
      expect(session.snapshot().sources[0]?.title).toBe("Long");
    });

    it("falls back to the host name as title", async () => {
      const fetcher = createMockFetcher({ "https://a.example/doc": { content: "short" } });
      const { executor, turn } = setup({ fetcher });

      const { result } = await run(
        executor,
        call("fetch_page_content", { url: "https://a.example/doc" }),
        turn,
      );

      expect(payload(result)).toMatchObject({ title: "a.example", content: "short", truncated: false });
    });

    it("reuses the index of a page already found by search", async () => {
      const { executor, turn } = setup();
      await run(executor, call("search_web", { query: "tides" }), turn);

      const { result } = await run(
        executor,
        call("fetch_page_content", { url: "https://a.example/" }, "call_2"),
        turn,
      );

      expect(payload(result)).toMatchObject({ index: 1 });
    });

    it.each([
      ["not a url"],
      ["ftp://files.example/a"],
    ])("rejects %s without calling the fetcher", async (url) => {
      const { executor, turn, fetcher } = setup();
      const { result } = await run(executor, call("fetch_page_content", { url }), turn);

      expect(payload(result)).toMatchObject({ success: false, error_type: "INVALID_URL" });
      expect(fetcher.fetch).not.toHaveBeenCalled();
    });

    it("reports a timeout as a tool-level TIMEOUT", async () => {
      const fetcher = createMockFetcher((_url, signal) => stallUntilAborted(signal));
      const { executor, turn } = setup({ fetcher, requestTimeoutMs: 20 });

      const { result } = await run(
        executor,
        call("fetch_page_content", { url: "https://slow.example/" }),
        turn,
      );

      expect(result.success).toBe(false);
      expect(payload(result)).toEqual({
        success: false,
        error: "fetch_page_content timed out after 20ms",
        error_type: "TIMEOUT",
      });
    });
  });

  describe("take_note", () => {
    it("stores the note with its source", async () => {
      const { executor, turn, session } = setup();
      const { result } = await run(
        executor,
        call("take_note", { note: "  Tides are lunar  ", source_url: "https://a.example/" }),
        turn,
      );

      const note = session.snapshot().notes[0];
      expect(note?.content).toBe("Tides are lunar");
      expect(note?.sourceUrl).toBe("https://a.example/");
      expect(payload(result)).toEqual({
        success: true,
        note_id: note?.id,
        message: "Note saved successfully",
      });
    });

    it("rejects an empty note", async () => {
      const { executor, turn, session } = setup();
      const { result } = await run(executor, call("take_note", { note: "   " }), turn);

      expect(payload(result)).toEqual({
        success: false,
        error: "Note must not be empty",
        error_type: "EMPTY_NOTE",
      });
      expect(session.snapshot().notes).toEqual([]);
    });
  });

  it("echoes a decomposition without calling collaborators", async () => {
    const { executor, turn, search, fetcher } = setup();
    const { result } = await run(
      executor,
      call("decompose_query", { query: "Compare A and B", sub_questions: ["What is A?", "What is B?"] }),
      turn,
    );

    expect(payload(result)).toEqual({
      success: true,
      query: "Compare A and B",
      sub_questions: ["What is A?", "What is B?"],
      message: "Planned 2 sub-question(s). Research each, then synthesize.",
    });
    expect(search.search).not.toHaveBeenCalled();
    expect(fetcher.fetch).not.toHaveBeenCalled();
  });

  it("reports an unknown tool to the model", async () => {
    const { executor, turn } = setup();
    const { events, result } = await run(executor, call("browse", { url: "https://a.example/" }), turn);

    expect(events).toEqual([
      { type: "tool_use", tool: "browse", arguments: { url: "https://a.example/" } },
    ]);
    expect(payload(result)).toEqual({
      success: false,
      error: 'Tool "browse" is not available',
      error_type: "TOOL_NOT_FOUND",
    });
  });

  it("reports schema violations as INVALID_ARGUMENTS", async () => {
    const { executor, turn } = setup();
    const { events, result } = await run(executor, call("search_web", "{not json"), turn);

    expect(events[0]?.arguments).toEqual({});
    expect(payload(result)).toMatchObject({ success: false, error_type: "INVALID_ARGUMENTS" });
    expect(result.error).toMatch(/^Invalid arguments for search_web: /);
  });

  it("rethrows cancellation instead of producing a result", async () => {
    const controller = new AbortController();
    const search = createMockSearch((_query, signal) => stallUntilAborted(signal));
    const { executor, turn } = setup({ search });

    const pending = run(executor, call("search_web", { query: "x" }), turn, controller.signal);
    setTimeout(() => controller.abort(createAbortError("connection closed")), 5);

    await expect(pending).rejects.toThrow("connection closed");
  });

  it("rethrows when the session was cleared under the call", async () => {
    const { executor, turn, session } = setup({
      search: createMockSearch(() => {
        session.clear();
        return [{ url: "https://a.example/", title: "A", snippet: "" }];
      }),
    });

    await expect(run(executor, call("search_web", { query: "x" }), turn)).rejects.toMatchObject({
      name: "AbortError",
    });
    expect(session.snapshot().sources).toEqual([]);
  });
});
