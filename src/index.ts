#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { deleteDocument } from "./commands/delete";
import { doctor } from "./commands/doctor";
import { get } from "./commands/get";
import { ingest } from "./commands/ingest";
import { init } from "./commands/init";
import { query } from "./commands/query";

program
  .name("mvstore")
  .version(
    JSON.parse(
      fs.readFileSync(path.join(__dirname, "../package.json"), {
        encoding: "utf-8",
      }),
    ).version,
  )
  .option(
    "--db <path>",
    "LanceDB directory (defaults to MVSTORE_DB_PATH or ~/.mvstore/data)",
    process.env.MVSTORE_DB_PATH || undefined,
  );

program.addCommand(init);
program.addCommand(ingest);
program.addCommand(query);
program.addCommand(get);
program.addCommand(deleteDocument);
program.addCommand(doctor);

program.parse();
