#!/usr/bin/env node
/**
 * @tallystake/demo: Interactive CLI walkthrough.
 *
 * Loads configuration from the environment and runs the token
 * lifecycle walkthrough in your terminal.
 */

import chalk from "chalk";
import { createLogger, loadConfig } from "@tallystake/token";
import { runWalkthrough } from "./walkthrough.js";

const DELAY_MS = 600;

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({
    level: config.LOG_LEVEL,
    pretty: config.NODE_ENV === "development",
  });

  await runWalkthrough({
    config,
    logger,
    print: (line) => {
      console.log(line);
    },
    delayMs: DELAY_MS,
  });
}

main().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
