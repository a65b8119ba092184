#!/usr/bin/env node
/**
 * Contact book CLI.
 *
 * `contacts` (no args) starts the interactive command loop.
 * `contacts init [dir]` writes a config.yml into the data directory.
 *
 * See `contacts help` for full command listing.
 */

import fs from "node:fs";
import { loadConfig, initDataDir, resolveDataDir as defaultDataDir } from "./config.js";
import { createAppLogger, createNullLogger } from "./logger.js";
import { runRepl } from "./repl.js";
import { createSqliteStore } from "./store.js";
import { todayIn } from "./time.js";
import { errorMessage } from "./errors.js";

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

const VERSION = String(
  JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8")).version,
);

// ---------------------------------------------------------------------------
// Arg parsing helpers
// ---------------------------------------------------------------------------

const argv = process.argv.slice(2);

function flag(name: string): boolean {
  return argv.includes(name);
}

function opt(name: string, fallback?: string): string | undefined {
  const idx = argv.indexOf(name);
  return idx !== -1 ? argv[idx + 1] : fallback;
}

function positional(index: number): string | undefined {
  const nonFlags = argv.filter((a, i) => !a.startsWith("--") && argv[i - 1] !== "--data-dir");
  return nonFlags[index];
}

function resolveDataDir(): string {
  return opt("--data-dir") ?? defaultDataDir();
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdInit(target: string): void {
  if (initDataDir(target)) {
    console.log(`Wrote ${target}/config.yml`);
  } else {
    console.log(`Already initialized: ${target}/config.yml exists.`);
  }
}

async function cmdRun(dataDir: string): Promise<void> {
  const config = loadConfig(dataDir);
  const logger = config.logging.enabled ? createAppLogger(config.data_dir) : createNullLogger();
  const store = createSqliteStore(config.storage.path);

  const book = store.load();
  logger.info("session started", { contacts: book.size, store: store.filePath });

  try {
    await runRepl({
      book,
      store,
      logger,
      today: () => todayIn(config.timezone),
      birthdayWindowDays: config.birthdays.window_days,
    });
  } catch (err) {
    logger.error("session aborted", err);
    throw err;
  }
}

function showHelp(): void {
  const dataDir = defaultDataDir();
  console.log(`
contacts v${VERSION}

Usage: contacts [command] [options]

Commands:
  (none)
    Start the interactive contact book. Type "help" at the prompt for the
    list of contact commands, "exit" or "close" to save and quit.

  init [dir]
    Create the data directory with a default config.yml.

  version
    Show version number.

  help
    Show this help text.

Global options:
  --data-dir <path>  Data directory (default: ${dataDir})
`);
}

// ---------------------------------------------------------------------------
// Main dispatcher
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  if (flag("--version") || flag("-v")) {
    console.log(VERSION);
    return;
  }

  if (flag("--help") || flag("-h")) {
    showHelp();
    return;
  }

  const command = positional(0);

  switch (command) {
    case undefined:
      await cmdRun(resolveDataDir());
      break;

    case "init":
      cmdInit(positional(1) ?? resolveDataDir());
      break;

    case "version":
      console.log(VERSION);
      break;

    case "help":
      showHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'contacts help' for usage.");
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", errorMessage(err));
  process.exit(1);
});
