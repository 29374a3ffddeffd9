import * as fs from "node:fs";
import { Command } from "commander";
import { parseQueryEmbedding } from "../lib/chunk-input";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";
import { formatJson, formatResults } from "../lib/formatter";
import type { Store } from "../lib/store";

export const query = new Command("query")
  .description("Rank stored chunks against a multi-vector query with MaxSim")
  .argument("<file>", "JSON file holding the query embedding (a vector or a list of vectors)")
  .option("-k, --top-k <n>", "The maximum number of results to return", "10")
  .option("-d, --doc <documentId...>", "Only rank chunks of these documents")
  .option("-c, --content", "Show full chunk content instead of snippets", false)
  .option("--json", "Print results as JSON", false)
  .option("--plain", "Disable ANSI colors", false)
  .action(async (file: string, _options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{
      db?: string;
      topK: string;
      doc?: string[];
      content: boolean;
      json: boolean;
      plain: boolean;
    }>();

    let store: Store | null = null;
    try {
      const text = await fs.promises.readFile(file, "utf-8");
      const embedding = parseQueryEmbedding(text, file);

      store = await createStore({ dbPath: options.db });
      const results = await store.querySimilar(embedding, Number.parseInt(options.topK, 10), {
        documentIds: options.doc ?? null,
      });

      if (options.json) {
        console.log(formatJson(results));
      } else {
        console.log(
          formatResults(results, {
            isPlain: options.plain || !process.stdout.isTTY,
            content: options.content,
          }),
        );
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to query:", message);
      process.exitCode = 1;
    } finally {
      if (store) await store.close();
      await gracefulExit();
    }
  });
