import { z } from "zod";
import { defineTool } from "../tool.js";

export const searchWebTool = defineTool({
  name: "search_web",
  description:
    "Search the web. Each result carries a citation index; cite it as [index] in the answer.",
  input: z.object({
    query: z.string().trim().min(1).describe("The search query"),
  }),
  handler: async ({ query }, ctx) => {
    const hits = await ctx.bounded("search_web", (signal) => ctx.search.search(query, { signal }));

    const results = hits.slice(0, ctx.limits.maxSearchResults).map((hit) => ({
      index: ctx.turn.addSource({
        url: hit.url,
        title: hit.title,
        snippet: hit.snippet,
        query,
      }),
      url: hit.url,
      title: hit.title,
      snippet: hit.snippet,
    }));

    return {
      query,
      results,
      ...(results.length === 0 ? { message: "No results found" } : {}),
    };
  },
});
