/**
 * Citation Resolver
 *
 * Turns `[n]` markers in a finished answer into links and picks the sources
 * the client should list. Numbering is the session's insertion index and is
 * never compacted: when an entry is dropped for lacking a usable address its
 * marker stays literal and the surviving numbers keep their gaps.
 *
 * @module @citeline/core/citations
 */

import type { CitedSource, SourceEntry } from "@citeline/shared";

export interface CitationResolution {
  /** Answer text with valid markers rewritten as markdown links */
  text: string;
  /** Referenced sources with a valid address, in index order */
  sources: CitedSource[];
}

/** Source shape the resolver accepts; `url` is checked, not trusted. */
export type CitableSource = Pick<SourceEntry, "index" | "title"> & { url?: unknown };

// `[n]` not already part of a markdown link (`[n](...)` or `[[n]](...)`)
const MARKER = /(?<!\[)\[(\d+)\](?!\()/g;

/**
 * True when `url` is a string that parses as an absolute http(s) address.
 */
export function isCitableUrl(url: unknown): url is string {
  if (typeof url !== "string" || url.trim() === "") return false;
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

export function resolveCitations(
  answerText: string,
  sources: readonly CitableSource[],
): CitationResolution {
  const valid = new Map<number, { url: string; title: string }>();
  for (const source of sources) {
    if (isCitableUrl(source.url)) {
      valid.set(source.index, { url: source.url, title: source.title || source.url });
    }
  }

  const referenced = new Set<number>();
  const text = answerText.replace(MARKER, (marker, digits: string) => {
    const index = Number.parseInt(digits, 10);
    const source = valid.get(index);
    if (!source) return marker;
    referenced.add(index);
    return `[[${index}]](${source.url})`;
  });

  const cited = Array.from(referenced)
    .sort((a, b) => a - b)
    .flatMap((index) => {
      const source = valid.get(index);
      return source ? [{ url: source.url, title: source.title }] : [];
    });

  return { text, sources: cited };
}
