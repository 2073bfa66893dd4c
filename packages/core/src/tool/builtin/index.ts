import type { ResearchTool } from "../tool.js";
import { decomposeQueryTool } from "./decompose-query.js";
import { searchWebTool } from "./search-web.js";
import { fetchPageContentTool } from "./fetch-page.js";
import { takeNoteTool } from "./take-note.js";

export { decomposeQueryTool, searchWebTool, fetchPageContentTool, takeNoteTool };
export { parseFetchableUrl, truncateContent } from "./fetch-page.js";

/**
 * The default research tool set, in menu order.
 */
export const researchTools: readonly ResearchTool[] = [
  decomposeQueryTool,
  searchWebTool,
  fetchPageContentTool,
  takeNoteTool,
];
