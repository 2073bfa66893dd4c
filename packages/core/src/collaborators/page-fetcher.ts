/**
 * HTTP page fetcher backed by the platform `fetch`.
 */

import type { CollaboratorCallOptions, FetchLike, FetchedPage, PageFetcher } from "./types.js";
import { extractTitle, htmlToText } from "./html.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (compatible; CitelineResearch/0.3)";

export interface HttpPageFetcherOptions {
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export class HttpPageFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async fetch(url: string, options: CollaboratorCallOptions = {}): Promise<FetchedPage> {
    const response = await this.fetchImpl(url, {
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5",
      },
      redirect: "follow",
      signal: options.signal,
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} fetching ${url}`);
    }

    const contentType = response.headers.get("content-type") ?? "";
    const body = await response.text();

    if (contentType.includes("html") || /^\s*<(!doctype|html)/i.test(body)) {
      const title = extractTitle(body);
      return { url, content: htmlToText(body), ...(title ? { title } : {}) };
    }

    if (contentType === "" || contentType.startsWith("text/") || contentType.includes("json")) {
      return { url, content: body.trim() };
    }

    throw new Error(`Unsupported content type "${contentType}" at ${url}`);
  }
}

export function createHttpPageFetcher(options?: HttpPageFetcherOptions): PageFetcher {
  return new HttpPageFetcher(options);
}
