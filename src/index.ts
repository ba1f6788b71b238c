#!/usr/bin/env tsx
import "dotenv/config";
import { runCli } from "./cli";
import { logger } from "./logger";

process.exitCode = await runCli(process.argv.slice(2)).catch((error: unknown) => {
  logger.error("Unexpected failure", error);
  return 1;
});
