#!/usr/bin/env tsx
/**
 * corridor CLI
 *
 * Usage:
 *   corridor run --classrooms 5 --episodes 3 [--capacity 50] [--seed s] [--ledger path] [--events]
 *   corridor status [--ledger path]
 *   corridor reputation [--ledger path] [--classroom C1]
 *
 * CORRIDOR_* variables may also come from a .env file in the working directory.
 */

import "dotenv/config";
import {
  ConfigError,
  JsonFileLedgerStore,
  LedgerFormatError,
  Simulation,
  consoleLogger,
  errorMessage,
  loadConfig,
  type CorridorConfig,
} from "@corridor/engine";
import { USAGE, UsageError, formatReport, formatReputation, formatStatus, parseCommand, type Command } from "./commands";

const EXIT_CODES = { completed: 0, cancelled: 130, aborted: 1 } as const;

async function run(command: Extract<Command, { kind: "run" }>, config: CorridorConfig): Promise<number> {
  const simulation = new Simulation({ config, logger: consoleLogger("run", config.logLevel) });
  if (command.events) {
    simulation.on((event) => {
      process.stdout.write(`${JSON.stringify(event)}\n`);
    });
  }

  const onInterrupt = () => {
    console.error("Stopping after the current phase...");
    simulation.stop();
  };
  process.once("SIGINT", onInterrupt);
  try {
    const report = await simulation.start(command.classrooms, command.episodes);
    const out = command.events ? console.error : console.log;
    for (const line of formatReport(report)) out(line);
    return EXIT_CODES[report.state];
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}

async function inspect(command: Extract<Command, { kind: "status" | "reputation" }>, config: CorridorConfig): Promise<number> {
  const store = new JsonFileLedgerStore(config.ledgerPath);
  const snapshot = await store.load();
  if (!snapshot) {
    console.log(`No ledger at ${store.getPath()}`);
    return 0;
  }

  const lines =
    command.kind === "status" ? formatStatus(snapshot) : formatReputation(snapshot.reputations, command.classroom);
  for (const line of lines) console.log(line);
  return 0;
}

async function main(): Promise<number> {
  let command: Command;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}`);
      console.error("");
      console.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }

  let config: CorridorConfig;
  try {
    config = loadConfig(process.env, command.overrides);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Configuration error: ${err.message}`);
      return 2;
    }
    throw err;
  }

  try {
    return command.kind === "run" ? await run(command, config) : await inspect(command, config);
  } catch (err) {
    if (err instanceof LedgerFormatError) {
      console.error(`Ledger error: ${err.message}`);
      for (const e of err.errors) console.error(`  ${e.path}: ${e.message}`);
      return 1;
    }
    throw err;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
