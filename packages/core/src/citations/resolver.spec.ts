import { describe, it, expect } from "vitest";
import { isCitableUrl, resolveCitations, type CitableSource } from "./resolver.js";

const sources: CitableSource[] = [
  { index: 1, url: "https://a.example/one", title: "One" },
  { index: 2, url: "https://b.example/two", title: "Two" },
];

describe("isCitableUrl", () => {
  it.each([
    ["https://a.example/", true],
    ["http://a.example/path?q=1", true],
    ["ftp://x", false],
    ["undefined", false],
    ["", false],
    [undefined, false],
    [42, false],
  ])("%s -> %s", (url, expected) => {
    expect(isCitableUrl(url)).toBe(expected);
  });
});

describe("resolveCitations", () => {
  it("rewrites markers as links and lists cited sources in index order", () => {
    const result = resolveCitations("Tides follow the moon [2] and the sun [1].", sources);

    expect(result.text).toBe(
      "Tides follow the moon [[2]](https://b.example/two) and the sun [[1]](https://a.example/one).",
    );
    expect(result.sources).toEqual([
      { url: "https://a.example/one", title: "One" },
      { url: "https://b.example/two", title: "Two" },
    ]);
  });

  it("lists a source once however often it is cited", () => {
    const result = resolveCitations("[1] then [1] again", sources);
    expect(result.sources).toEqual([{ url: "https://a.example/one", title: "One" }]);
  });

  it("omits sources the answer never cites", () => {
    expect(resolveCitations("Only [2].", sources).sources).toEqual([
      { url: "https://b.example/two", title: "Two" },
    ]);
  });

  it("returns no sources for an answer without markers", () => {
    expect(resolveCitations("Paris.", sources)).toEqual({ text: "Paris.", sources: [] });
  });

  it("leaves markers of sources without a valid address literal", () => {
    const mixed: CitableSource[] = [
      { index: 1, url: "undefined", title: "Broken" },
      { index: 2, url: "", title: "Empty" },
      { index: 3, url: "ftp://x", title: "Ftp" },
      { index: 4, url: undefined, title: "Missing" },
      { index: 5, url: "https://e.example/", title: "Good" },
    ];

    const result = resolveCitations("[1] [2] [3] [4] [5]", mixed);

    expect(result.text).toBe("[1] [2] [3] [4] [[5]](https://e.example/)");
    expect(result.sources).toEqual([{ url: "https://e.example/", title: "Good" }]);
  });

  it("keeps original numbering without compacting gaps", () => {
    const gapped: CitableSource[] = [
      { index: 1, url: "undefined", title: "Broken" },
      { index: 3, url: "https://c.example/", title: "Three" },
    ];

    expect(resolveCitations("See [3].", gapped).text).toBe("See [[3]](https://c.example/).");
  });

  it("leaves markers with no matching source untouched", () => {
    expect(resolveCitations("Unknown [9].", sources)).toEqual({ text: "Unknown [9].", sources: [] });
  });

  it("does not rewrite markers that are already links", () => {
    const text = "Already [1](https://a.example/one) and [[2]](https://b.example/two).";
    expect(resolveCitations(text, sources)).toEqual({ text, sources: [] });
  });

  it("falls back to the URL when a source has no title", () => {
    const result = resolveCitations("[1]", [{ index: 1, url: "https://a.example/", title: "" }]);
    expect(result.sources).toEqual([{ url: "https://a.example/", title: "https://a.example/" }]);
  });

  it("is deterministic", () => {
    const first = resolveCitations("A [1], B [2], C [7].", sources);
    const second = resolveCitations("A [1], B [2], C [7].", sources);
    expect(second).toEqual(first);
  });
});
