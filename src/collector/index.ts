#!/usr/bin/env node
import { config } from "../shared/config.js";
import { createPgRowSource } from "../shared/db.js";
import { errorMessage } from "../shared/errors.js";
import { parseArgs, USAGE } from "./cli.js";
import { runReportJob } from "./pipeline.js";

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const dbUrl = config.dbUrl || config.requireEnv("DATABASE_URL");
  console.error("Connecting to database...");
  await runReportJob(createPgRowSource(dbUrl), {
    outdir: options.outdir,
    where: options.where,
    umbrellaProjectIds: config.umbrellaProjectIds,
    dryRun: options.dryRun
  });
};

run().catch((err) => {
  const name = err instanceof Error ? err.name : "Error";
  console.error(`${name}: ${errorMessage(err)}`);
  process.exitCode = 1;
});
