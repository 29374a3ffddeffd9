import { Command } from "commander";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";
import type { Store } from "../lib/store";

export const deleteDocument = new Command("delete")
  .description("Delete every chunk of a document")
  .argument("<documentId>", "The document whose chunks to delete")
  .action(async (documentId: string, _options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{ db?: string }>();

    let store: Store | null = null;
    try {
      store = await createStore({ dbPath: options.db });
      if (await store.deleteChunksByDocumentId(documentId)) {
        console.log(`Deleted chunks for document ${documentId}.`);
      } else {
        console.error(`Failed to delete chunks for document ${documentId}.`);
        process.exitCode = 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to delete:", message);
      process.exitCode = 1;
    } finally {
      if (store) await store.close();
      await gracefulExit();
    }
  });
