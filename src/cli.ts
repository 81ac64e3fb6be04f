#!/usr/bin/env node
/**
 * CLI – collect a session in the foreground, export a session log to CSV, or serve
 * the HTTP control surface. Settings come from --config (or audit-collector.config.*
 * in cwd), a .env file in cwd and the environment.
 */
import { resolve } from "node:path";
import {
  getConfigPath,
  loadConfigFromPath,
  loadDotEnv,
  loadServerSettings,
  loadSettings,
} from "./config/index.js";
import type { CollectorConfigFile } from "./config/types.js";
import { defaultCsvPath, exportLogToCsv } from "./core/exporter.js";
import { runInForeground } from "./core/foreground.js";
import { SessionManager } from "./core/SessionManager.js";
import { collectionWindow, sessionNameFrom } from "./core/window.js";
import { isCollectorError } from "./errors.js";
import { logger } from "./logger.js";
import { CollectorHttpServer } from "./server/index.js";

const USAGE = `Usage:
  audit-collector collect --name NAME --from YYYY-MM-DD --to YYYY-MM-DD [--csv]
  audit-collector export --log PATH [--out PATH]
  audit-collector serve [--port PORT] [--host HOST]

Global: --config PATH`;

const argv = process.argv.slice(2);
const command = argv[0];

function flag(name: string): string | null {
  const idx = argv.indexOf(`--${name}`);
  const value = idx >= 0 ? argv[idx + 1] : undefined;
  return value !== undefined && !value.startsWith("--") ? value : null;
}

function hasFlag(name: string): boolean {
  return argv.includes(`--${name}`);
}

function printLine(line: string): void {
  process.stdout.write(`${line}\n`);
}

async function loadConfigFile(): Promise<CollectorConfigFile> {
  loadDotEnv(process.cwd());
  const configPathArg = flag("config");
  const resolved = configPathArg ? resolve(configPathArg) : getConfigPath(process.cwd());
  if (!resolved) return {};
  logger.info({ configPath: resolved }, "Loading config");
  return loadConfigFromPath(resolved);
}

async function collect(): Promise<number> {
  const nameArg = flag("name");
  const from = flag("from");
  const to = flag("to");
  if (!nameArg || !from || !to) {
    logger.error("collect requires --name, --from and --to.");
    printLine(USAGE);
    return 1;
  }
  const sessionName = sessionNameFrom(nameArg);
  if (sessionName === null) {
    logger.error({ name: nameArg }, "Invalid session name.");
    return 1;
  }
  const window = collectionWindow(from, to);
  if (window.windowStartMs > window.windowEndMs) {
    logger.error({ from, to }, "--from must not be after --to.");
    return 1;
  }

  const file = await loadConfigFile();
  const settings = loadSettings(process.env, file);
  const manager = new SessionManager({ settings });
  const started = manager.start({ sessionName, ...window });
  if (!started.ok) {
    logger.error("A collection session is already running.");
    return 1;
  }
  return runInForeground(manager, started.session, {
    exportCsv: hasFlag("csv"),
    write: printLine,
  });
}

async function exportCommand(): Promise<number> {
  const logPath = flag("log");
  if (!logPath) {
    logger.error("export requires --log.");
    printLine(USAGE);
    return 1;
  }
  const csvPath = flag("out") ?? defaultCsvPath(logPath);
  const count = await exportLogToCsv(resolve(logPath), resolve(csvPath));
  printLine(`Exported ${count} records to ${csvPath}`);
  return 0;
}

async function serve(): Promise<number> {
  const file = await loadConfigFile();
  const settings = loadSettings(process.env, file);
  const listen = loadServerSettings(process.env, file);
  const portArg = flag("port");
  const port = portArg !== null ? Number.parseInt(portArg, 10) : listen.port;
  if (Number.isNaN(port)) {
    logger.error({ port: portArg }, "--port must be a number.");
    return 1;
  }
  const server = new CollectorHttpServer({
    settings,
    listen: { port, host: flag("host") ?? listen.host },
  });
  // run() resolves when SIGINT/SIGTERM triggers graceful shutdown
  await server.run();
  return 0;
}

async function main(): Promise<number> {
  logger.debug({ argv: process.argv }, "CLI starting");
  switch (command) {
    case "collect":
      return collect();
    case "export":
      return exportCommand();
    case "serve":
      return serve();
    default:
      printLine(USAGE);
      return command === undefined || command === "--help" ? 0 : 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isCollectorError(err)) {
      logger.error({ code: err.code }, err.message);
      process.exitCode = err.code === "CONFIG_MISSING" || err.code === "CONFIG_INVALID" ? 2 : 1;
      return;
    }
    logger.error({ err }, "audit-collector failed");
    process.exitCode = 1;
  });
