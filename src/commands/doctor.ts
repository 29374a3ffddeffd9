import * as fs from "node:fs";
import * as os from "node:os";
import { Command } from "commander";
import { CONFIG, normalizeDatabaseUri } from "../config";
import { createStore } from "../lib/context";
import { gracefulExit } from "../lib/exit";

export const doctor = new Command("doctor")
  .description("Check mvstore configuration and table health")
  .action(async (_options: unknown, cmd: Command) => {
    const options = cmd.optsWithGlobals<{ db?: string }>();
    console.log("🏥 mvstore Doctor\n");

    const dbPath = normalizeDatabaseUri(options.db ?? CONFIG.DB_PATH);
    const dbExists = fs.existsSync(dbPath);
    console.log(`${dbExists ? "✅" : "❌"} Database: ${dbPath}`);
    console.log(`   Table: ${CONFIG.TABLE_NAME}`);
    console.log(`   Dimensions: ${CONFIG.DIMENSIONS} bits`);
    console.log(`   Retries: ${CONFIG.MAX_RETRIES} x ${CONFIG.RETRY_DELAY_MS}ms`);
    console.log(`   Duplicate keys: ${CONFIG.DUPLICATE_POLICY}`);

    if (dbExists) {
      try {
        const store = await createStore({ dbPath: options.db });
        const healthy = await store.checkSchema();
        await store.close();
        console.log(
          healthy
            ? "✅ Table schema matches"
            : "❌ Table missing or outdated; run `mvstore init`",
        );
      } catch (error) {
        const message = error instanceof Error ? error.message : "Unknown error";
        console.log(`❌ Could not inspect table: ${message}`);
      }
    }

    console.log(`\nSystem: ${os.platform()} ${os.arch()} | Node: ${process.version}`);

    await gracefulExit();
  });
