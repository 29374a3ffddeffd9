import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

vi.mock("../src/lib/context", () => ({
  createStore: vi.fn(async () => mockStore),
}));

vi.mock("../src/lib/exit", () => ({
  gracefulExit: vi.fn(async () => { }),
}));

const mockStore = {
  querySimilar: vi.fn(async () => [
    {
      documentId: "docA",
      chunkNumber: 0,
      content: "hello\n  world",
      metadata: { page: 2 },
      vectors: [],
      score: 1.5,
    },
  ]),
  close: vi.fn(async () => { }),
};

import { query } from "../src/commands/query";
import { createStore } from "../src/lib/context";
import { gracefulExit } from "../src/lib/exit";

describe("query command", () => {
  let dir: string;
  let log: MockInstance<typeof console.log>;
  let error: MockInstance<typeof console.error>;

  beforeEach(() => {
    vi.clearAllMocks();
    query.exitOverride();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "mvstore-query-"));
    log = vi.spyOn(console, "log").mockImplementation(() => { });
    error = vi.spyOn(console, "error").mockImplementation(() => { });
  });

  afterEach(() => {
    log.mockRestore();
    error.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
    process.exitCode = undefined;
  });

  function writeQuery(body: string): string {
    const file = path.join(dir, "query.json");
    fs.writeFileSync(file, body);
    return file;
  }

  it("prints plain ranked results", async () => {
    const file = writeQuery("[[0.5, -0.5], [1, 1]]");

    await query.parseAsync([file, "--plain"], { from: "user" });

    expect(mockStore.querySimilar).toHaveBeenCalledWith(
      [
        [0.5, -0.5],
        [1, 1],
      ],
      10,
      { documentIds: null },
    );
    expect(log).toHaveBeenCalledWith("1. docA-0 (score 1.5000)\nhello world");
    expect(mockStore.close).toHaveBeenCalledOnce();
    expect(gracefulExit).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it("passes k and the document filter and prints JSON", async () => {
    const file = writeQuery('{"embedding": [0.1, 0.2]}');

    await query.parseAsync([file, "-k", "3", "-d", "docA", "docB", "--json"], { from: "user" });

    expect(mockStore.querySimilar).toHaveBeenCalledWith([0.1, 0.2], 3, {
      documentIds: ["docA", "docB"],
    });
    expect(JSON.parse(String(log.mock.calls[0][0]))).toEqual([
      { document_id: "docA", chunk_number: 0, score: 1.5, content: "hello\n  world", metadata: { page: 2 } },
    ]);
  });

  it("fails without opening the store when the query file is invalid", async () => {
    const file = writeQuery("not json");

    await query.parseAsync([file], { from: "user" });

    expect(createStore).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith("Failed to query:", `${file}: invalid JSON`);
    expect(process.exitCode).toBe(1);
    expect(gracefulExit).toHaveBeenCalledOnce();
  });
});
