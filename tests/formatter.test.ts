import { describe, expect, it } from "vitest";
import { formatJson, formatResults, snippet } from "../src/lib/formatter";
import type { RetrievedChunk } from "../src/lib/store";

const hit: RetrievedChunk = {
  documentId: "docA",
  chunkNumber: 3,
  content: "first line\n\nsecond   line",
  metadata: { lang: "en" },
  vectors: [],
  score: 0.5,
};

describe("formatter", () => {
  it("flattens and truncates snippets", () => {
    expect(snippet("  a\n b  ")).toBe("a b");
    const long = snippet("x".repeat(130));
    expect(long).toHaveLength(120);
    expect(long.endsWith("...")).toBe(true);
  });

  it("formats plain results with rank, key and score", () => {
    expect(formatResults([hit, { ...hit, chunkNumber: 4, score: 0.25 }], { isPlain: true, content: false })).toBe(
      "1. docA-3 (score 0.5000)\nfirst line second line\n\n2. docA-4 (score 0.2500)\nfirst line second line",
    );
  });

  it("keeps full content when asked", () => {
    expect(formatResults([hit], { isPlain: true, content: true })).toBe(
      "1. docA-3 (score 0.5000)\nfirst line\n\nsecond   line",
    );
  });

  it("colors the key and score outside plain mode", () => {
    expect(formatResults([hit], { isPlain: false, content: false })).toBe(
      "\x1b[2m1.\x1b[22m \x1b[1m\x1b[34mdocA-3\x1b[39m\x1b[22m \x1b[32m0.5000\x1b[39m\nfirst line second line",
    );
  });

  it("says so when nothing matched", () => {
    expect(formatResults([], { isPlain: true, content: false })).toBe("No results.");
  });

  it("emits snake_case JSON", () => {
    expect(JSON.parse(formatJson([hit]))).toEqual([
      {
        document_id: "docA",
        chunk_number: 3,
        score: 0.5,
        content: "first line\n\nsecond   line",
        metadata: { lang: "en" },
      },
    ]);
  });
});
