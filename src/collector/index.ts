#!/usr/bin/env node
import { config } from "../shared/config.js";
import { closePool } from "../shared/db.js";
import { connectRunLog } from "../shared/runLog.js";
import { runCli } from "./cli.js";

const run = async () => {
  const runLog = await connectRunLog(config.dbUrl);

  try {
    process.exitCode = await runCli(process.argv.slice(2), { runLog });
  } finally {
    await closePool();
  }
};

run().catch((err) => {
  console.error("Collector failed:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
