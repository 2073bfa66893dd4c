import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ToolRegistry, createResearchToolRegistry } from "./registry.js";
import { defineTool } from "./tool.js";

describe("ToolRegistry", () => {
  it("registers the four research tools in menu order", () => {
    const registry = createResearchToolRegistry();
    expect(registry.names).toEqual([
      "decompose_query",
      "search_web",
      "fetch_page_content",
      "take_note",
    ]);
  });

  it("resolves known names and rejects unknown ones", () => {
    const registry = createResearchToolRegistry();
    expect(registry.resolve("search_web")?.name).toBe("search_web");
    expect(registry.resolve("browse")).toBeUndefined();
    expect(registry.has("take_note")).toBe(true);
    expect(registry.has("")).toBe(false);
  });

  it("exposes JSON Schema specs for the model", () => {
    const spec = createResearchToolRegistry()
      .specs()
      .find((tool) => tool.name === "fetch_page_content");

    expect(spec?.parameters).toMatchObject({
      type: "object",
      properties: { url: { type: "string" } },
      required: ["url"],
    });
    expect(spec?.parameters).not.toHaveProperty("$schema");
  });

  it("describes parameters for humans", () => {
    const take = createResearchToolRegistry()
      .describe()
      .find((tool) => tool.name === "take_note");

    expect(take?.parameters).toEqual([
      { name: "note", type: "string", required: true, description: "The finding to remember" },
      {
        name: "source_url",
        type: "string",
        required: false,
        description: "URL the finding came from",
      },
    ]);
  });

  it("renders array parameter types", () => {
    const decompose = createResearchToolRegistry()
      .describe()
      .find((tool) => tool.name === "decompose_query");

    expect(decompose?.parameters.find((p) => p.name === "sub_questions")?.type).toBe(
      "array<string>",
    );
  });

  it("replaces a tool registered under the same name", () => {
    const replacement = defineTool({
      name: "take_note",
      description: "Replacement",
      input: z.object({ note: z.string() }),
      handler: () => ({ ok: true }),
    });

    const registry = createResearchToolRegistry().register(replacement);

    expect(registry.names).toHaveLength(4);
    expect(registry.resolve("take_note")?.description).toBe("Replacement");
  });

  it("starts empty when constructed without tools", () => {
    const registry = new ToolRegistry();
    expect(registry.specs()).toEqual([]);
    expect(registry.resolve("search_web")).toBeUndefined();
  });
});
