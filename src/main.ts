#!/usr/bin/env node
import { Command } from "commander";

import { parsePageSize, resolveLaunch, type CliOptions } from "./cli.js";
import {
  MemoryClipboard,
  SystemClipboard,
  type Clipboard,
} from "./clipboard.js";
import { maskConnectionString } from "./config.js";
import { createDriver } from "./db/drivers/index.js";
import { DriverSession } from "./db/session.js";
import { QueryError, errorMessage } from "./errors.js";
import { log, logToFile } from "./logger.js";
import { QueryStatsStore } from "./stats.js";
import { startWorkspace } from "./ui/app.js";

const VERSION = "0.1.0";

async function run(connectionName: string | undefined, opts: CliOptions) {
  const launch = resolveLaunch(connectionName, opts);
  const target = maskConnectionString(launch.connection);

  const { driver: driverName } = launch.connection;
  log.info(`connecting to ${launch.name} (${driverName} ${target})`);
  const driver = await createDriver(launch.connection, launch.queryTimeout);
  await driver.connect();
  if (!(await driver.ping())) {
    await driver.close();
    throw new QueryError(
      `Connected to ${launch.name} but it does not answer queries.`,
      "CONNECTION",
    );
  }

  const stats = new QueryStatsStore();
  const session = new DriverSession(driver, stats);
  const clipboard: Clipboard =
    launch.clipboard === "memory"
      ? new MemoryClipboard()
      : new SystemClipboard();

  const closeLog = logToFile(launch.logFile);
  log.info(`session started on ${launch.name} (${target})`);
  try {
    await startWorkspace({
      session,
      stats,
      clipboard,
      pageSize: launch.pageSize,
      target,
    });
  } finally {
    log.info("session closed");
    stats.reset();
    await session.close();
    await closeLog();
  }
}

const program = new Command();

program
  .name("querydeck")
  .description(
    "Terminal SQL workspace with a modal editor and a paginated result grid",
  )
  .version(VERSION)
  .argument("[connection]", "Connection name from the config file")
  .option(
    "-c, --config <file>",
    "Config file (default ~/.querydeck/config.json)",
  )
  .option(
    "--url <url>",
    "Connect to a URL or SQLite file instead of a configured connection",
  )
  .option("--page-size <rows>", "Rows per result page", parsePageSize)
  .option(
    "--log-file <file>",
    "Where to write the log while the workspace is open",
  )
  .action(async (connection: string | undefined, opts: CliOptions) => {
    await run(connection, opts);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  log.error(errorMessage(err));
  process.exitCode = 1;
});
