/**
 * Google Programmable Search (Custom Search JSON API).
 */

import { z } from "zod";
import type { CollaboratorCallOptions, FetchLike, SearchHit, SearchProvider } from "./types.js";

const ENDPOINT = "https://www.googleapis.com/customsearch/v1";

const CustomSearchResponse = z.object({
  items: z
    .array(
      z.object({
        link: z.string(),
        title: z.string().optional(),
        snippet: z.string().optional(),
      }),
    )
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

export interface GoogleSearchOptions {
  apiKey: string;
  /** Programmable Search Engine id */
  cx: string;
  fetchImpl?: FetchLike;
  /** The API returns at most 10 per request */
  maxResults?: number;
}

export class GoogleSearch implements SearchProvider {
  readonly name = "google";
  private readonly options: GoogleSearchOptions;
  private readonly fetchImpl: FetchLike;

  constructor(options: GoogleSearchOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: string, options: CollaboratorCallOptions = {}): Promise<SearchHit[]> {
    const url = new URL(ENDPOINT);
    url.searchParams.set("key", this.options.apiKey);
    url.searchParams.set("cx", this.options.cx);
    url.searchParams.set("q", query);
    url.searchParams.set("num", String(Math.min(this.options.maxResults ?? 10, 10)));

    const response = await this.fetchImpl(url.toString(), { signal: options.signal });
    const body = CustomSearchResponse.parse(await response.json());

    if (!response.ok || body.error) {
      throw new Error(
        `Google search failed: ${body.error?.message ?? `HTTP ${response.status}`}`,
      );
    }

    return (body.items ?? []).map((item) => ({
      url: item.link,
      title: item.title ?? item.link,
      snippet: item.snippet ?? "",
    }));
  }
}
