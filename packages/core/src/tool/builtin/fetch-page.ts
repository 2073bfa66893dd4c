import { z } from "zod";
import { ToolError } from "@citeline/shared";
import { defineTool } from "../tool.js";

/**
 * Only absolute http(s) addresses are fetched.
 */
export function parseFetchableUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch (error) {
    throw new ToolError(`Invalid URL: ${raw}`, "INVALID_URL", { cause: error });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ToolError(`Unsupported URL scheme "${url.protocol}" in ${raw}`, "INVALID_URL");
  }
  return url;
}

export function truncateContent(content: string, maxLength: number): string {
  return content.length > maxLength ? `${content.slice(0, maxLength)}...` : content;
}

export const fetchPageContentTool = defineTool({
  name: "fetch_page_content",
  description:
    "Fetch the readable text of a web page. The page becomes a citable source; " +
    "cite it as [index] in the answer.",
  input: z.object({
    url: z.string().describe("Absolute http(s) URL of the page"),
  }),
  handler: async ({ url }, ctx) => {
    const target = parseFetchableUrl(url);
    const page = await ctx.bounded("fetch_page_content", (signal) =>
      ctx.fetcher.fetch(target.toString(), { signal }),
    );

    const title = page.title?.trim() || target.hostname;
    const content = truncateContent(page.content, ctx.limits.maxContentLength);
    const index = ctx.turn.addSource({ url: url.trim(), title });

    return {
      index,
      url: url.trim(),
      title,
      content,
      truncated: content.length !== page.content.length,
    };
  },
});
