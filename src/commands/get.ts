import { Command } from "commander";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";
import { formatJson, formatResults } from "../lib/formatter";
import { type ChunkKey, parseChunkKey, type Store } from "../lib/store";

export const get = new Command("get")
  .description("Fetch chunks by key")
  .argument("<keys...>", "Chunk keys as <document_id>-<chunk_number>")
  .option("--json", "Print chunks as JSON", false)
  .action(async (rawKeys: string[], _options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{ db?: string; json: boolean }>();

    let store: Store | null = null;
    try {
      const keys: ChunkKey[] = rawKeys.map((raw) => {
        const key = parseChunkKey(raw);
        if (!key) throw new Error(`"${raw}" is not a <document_id>-<chunk_number> key`);
        return key;
      });

      store = await createStore({ dbPath: options.db });
      const chunks = await store.getChunksById(keys);
      console.log(
        options.json
          ? formatJson(chunks)
          : formatResults(chunks, { isPlain: !process.stdout.isTTY, content: true }),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to get chunks:", message);
      process.exitCode = 1;
    } finally {
      if (store) await store.close();
      await gracefulExit();
    }
  });
