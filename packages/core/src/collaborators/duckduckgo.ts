/**
 * DuckDuckGo search over its HTML endpoint (no API key required).
 */

import type { CollaboratorCallOptions, FetchLike, SearchHit, SearchProvider } from "./types.js";
import { decodeEntities, stripTags } from "./html.js";
import { DEFAULT_USER_AGENT } from "./page-fetcher.js";

const ENDPOINT = "https://html.duckduckgo.com/html/";

const RESULT_ANCHOR = /<a\b([^>]*\bclass="[^"]*\bresult__a\b[^"]*"[^>]*)>([\s\S]*?)<\/a>/gi;
const SNIPPET = /<(a|div|td)\b[^>]*\bclass="[^"]*\bresult__snippet\b[^"]*"[^>]*>([\s\S]*?)<\/\1>/i;
const HREF = /\bhref="([^"]*)"/i;

/**
 * Turn a result link into the destination URL. DuckDuckGo wraps results in
 * `//duckduckgo.com/l/?uddg=<target>` redirects; ads point at `/y.js`.
 */
export function resolveResultUrl(href: string): string | undefined {
  let raw = decodeEntities(href.trim());
  if (!raw) return undefined;
  if (raw.startsWith("//")) raw = `https:${raw}`;
  else if (!/^[a-z][a-z0-9+.-]*:/i.test(raw)) raw = `https://${raw}`;

  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return undefined;
  }

  if (url.hostname.endsWith("duckduckgo.com")) {
    if (url.pathname.startsWith("/y.js")) return undefined;
    const target = url.searchParams.get("uddg");
    return target ? resolveResultUrl(target) : undefined;
  }

  return url.protocol === "http:" || url.protocol === "https:" ? url.toString() : undefined;
}

export function parseDuckDuckGoResults(html: string, limit = Number.POSITIVE_INFINITY): SearchHit[] {
  const anchors = Array.from(html.matchAll(RESULT_ANCHOR));
  const hits: SearchHit[] = [];

  for (let i = 0; i < anchors.length && hits.length < limit; i++) {
    const anchor = anchors[i];
    if (!anchor) continue;
    const href = HREF.exec(anchor[1] ?? "")?.[1];
    const url = href ? resolveResultUrl(href) : undefined;
    if (!url) continue;

    const start = (anchor.index ?? 0) + anchor[0].length;
    const end = anchors[i + 1]?.index ?? html.length;
    const snippet = SNIPPET.exec(html.slice(start, end))?.[2];

    hits.push({
      url,
      title: stripTags(anchor[2] ?? "") || url,
      snippet: snippet ? stripTags(snippet) : "",
    });
  }

  return hits;
}

export interface DuckDuckGoSearchOptions {
  fetchImpl?: FetchLike;
  userAgent?: string;
  /** Results parsed per query (default 10; the tool applies its own cap) */
  maxResults?: number;
}

export class DuckDuckGoSearch implements SearchProvider {
  readonly name = "duckduckgo";
  private readonly fetchImpl: FetchLike;
  private readonly userAgent: string;
  private readonly maxResults: number;

  constructor(options: DuckDuckGoSearchOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.maxResults = options.maxResults ?? 10;
  }

  async search(query: string, options: CollaboratorCallOptions = {}): Promise<SearchHit[]> {
    const url = new URL(ENDPOINT);
    url.searchParams.set("q", query);

    const response = await this.fetchImpl(url.toString(), {
      headers: { "User-Agent": this.userAgent, Accept: "text/html" },
      signal: options.signal,
    });
    if (!response.ok) {
      throw new Error(`Search request failed with HTTP ${response.status}`);
    }

    return parseDuckDuckGoResults(await response.text(), this.maxResults);
  }
}
