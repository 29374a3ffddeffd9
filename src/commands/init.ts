import { Command } from "commander";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";
import type { Store } from "../lib/store";

export const init = new Command("init")
  .description("Create or upgrade the chunk table and its index")
  .action(async (_options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{ db?: string }>();

    let store: Store | null = null;
    try {
      store = await createStore({ dbPath: options.db });
      if (await store.initialize()) {
        console.log("Store is ready.");
      } else {
        console.error("Failed to initialize the store; see the log above.");
        process.exitCode = 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Failed to initialize:", message);
      process.exitCode = 1;
    } finally {
      if (store) await store.close();
      await gracefulExit();
    }
  });
