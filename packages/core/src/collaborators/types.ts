/**
 * Contracts for the external services the tools delegate to.
 */

export interface SearchHit {
  url: string;
  title: string;
  snippet: string;
}

export interface CollaboratorCallOptions {
  signal?: AbortSignal;
}

/**
 * Web search. May fail (network, quota); failures become tool-level errors.
 */
export interface SearchProvider {
  readonly name: string;
  search(query: string, options?: CollaboratorCallOptions): Promise<SearchHit[]>;
}

export interface FetchedPage {
  url: string;
  /** Page title, when the document declares one */
  title?: string;
  /** Readable text; may be arbitrarily long, the tool truncates it */
  content: string;
}

export interface PageFetcher {
  fetch(url: string, options?: CollaboratorCallOptions): Promise<FetchedPage>;
}

export type FetchLike = typeof fetch;
