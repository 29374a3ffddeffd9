import { describe, expect, it } from "vitest";
import { parseChunkLines, parseChunkRecord, parseQueryEmbedding } from "../src/lib/chunk-input";
import { InvalidArgumentError } from "../src/lib/errors";
import { formatChunkKey, parseChunkKey } from "../src/lib/store";

describe("parseChunkLines", () => {
  it("reads one chunk per non-blank line", () => {
    const text = [
      '{"document_id":"docA","chunk_number":0,"content":"hello","metadata":{"page":1},"embedding":[[0.1,-0.2]]}',
      "",
      '{"document_id":"docA","chunk_number":1,"content":"world","embedding":[0.3,0.4]}',
      '{"document_id":"docB","chunk_number":0,"content":"bare"}',
      "",
    ].join("\n");

    expect(parseChunkLines(text, "chunks.jsonl")).toEqual([
      {
        documentId: "docA",
        chunkNumber: 0,
        content: "hello",
        metadata: { page: 1 },
        embedding: [[0.1, -0.2]],
      },
      { documentId: "docA", chunkNumber: 1, content: "world", metadata: {}, embedding: [0.3, 0.4] },
      { documentId: "docB", chunkNumber: 0, content: "bare", metadata: {}, embedding: null },
    ]);
  });

  it("names the line of invalid JSON", () => {
    expect(() => parseChunkLines('{"document_id":"a"}\n\n{oops', "in.jsonl")).toThrow(
      "in.jsonl:1: chunk_number must be a non-negative integer",
    );
    expect(() => parseChunkLines("\n{oops", "in.jsonl")).toThrow(
      new InvalidArgumentError("in.jsonl:2: invalid JSON"),
    );
  });
});

describe("parseChunkRecord", () => {
  it("rejects malformed records", () => {
    expect(() => parseChunkRecord([], "r")).toThrow("r: expected a JSON object");
    expect(() => parseChunkRecord({ document_id: "", chunk_number: 0, content: "" }, "r")).toThrow(
      "r: document_id must be a non-empty string",
    );
    expect(() => parseChunkRecord({ document_id: "a", chunk_number: 1.5, content: "" }, "r")).toThrow(
      "r: chunk_number must be a non-negative integer",
    );
    expect(() => parseChunkRecord({ document_id: "a", chunk_number: 0, content: 7 }, "r")).toThrow(
      "r: content must be a string",
    );
    expect(() =>
      parseChunkRecord({ document_id: "a", chunk_number: 0, content: "", metadata: [1] }, "r"),
    ).toThrow("r: metadata must be an object of JSON values");
    expect(() =>
      parseChunkRecord({ document_id: "a", chunk_number: 0, content: "", embedding: [[1], 2] }, "r"),
    ).toThrow("r: embedding must be a number array or an array of number arrays");
  });
});

describe("parseQueryEmbedding", () => {
  it("accepts a bare embedding or an object holding one", () => {
    expect(parseQueryEmbedding("[[1,-1],[0,2]]")).toEqual([
      [1, -1],
      [0, 2],
    ]);
    expect(parseQueryEmbedding('{"embedding":[0.5,-0.5]}')).toEqual([0.5, -0.5]);
  });

  it("rejects anything else", () => {
    expect(() => parseQueryEmbedding("not json", "q.json")).toThrow("q.json: invalid JSON");
    expect(() => parseQueryEmbedding('{"vectors":[1]}', "q.json")).toThrow(InvalidArgumentError);
  });
});

describe("chunk keys", () => {
  it("formats and parses document ids containing dashes", () => {
    expect(formatChunkKey({ documentId: "2024-report", chunkNumber: 12 })).toBe("2024-report-12");
    expect(parseChunkKey("2024-report-12")).toEqual({ documentId: "2024-report", chunkNumber: 12 });
  });

  it("rejects strings that are not keys", () => {
    expect(parseChunkKey("docA")).toBeNull();
    expect(parseChunkKey("-3")).toBeNull();
    expect(parseChunkKey("docA-")).toBeNull();
    expect(parseChunkKey("docA-1x")).toBeNull();
  });
});
