import * as fs from "node:fs";
import { Command } from "commander";
import { parseChunkLines } from "../lib/chunk-input";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";
import type { Store } from "../lib/store";

export const ingest = new Command("ingest")
  .description("Store chunks and their multi-vector embeddings from a JSON Lines file")
  .argument("<file>", "JSON Lines file, one chunk per line")
  .option("--keys", "Print the key of every stored chunk", false)
  .action(async (file: string, _options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{ db?: string; keys: boolean }>();

    let store: Store | null = null;
    try {
      const text = await fs.promises.readFile(file, "utf-8");
      const chunks = parseChunkLines(text, file);

      store = await createStore({ dbPath: options.db });
      if (!(await store.initialize())) {
        throw new Error("store initialization failed");
      }

      const { success, storedKeys } = await store.storeEmbeddings(chunks);
      console.log(`Stored ${storedKeys.length} of ${chunks.length} chunks.`);
      if (options.keys) {
        for (const key of storedKeys) console.log(key);
      }
      if (!success) {
        process.exitCode = 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to ingest:", message);
      process.exitCode = 1;
    } finally {
      if (store) await store.close();
      await gracefulExit();
    }
  });
