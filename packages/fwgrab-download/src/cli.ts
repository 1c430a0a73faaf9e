#!/usr/bin/env tsx

import { realpathSync } from "node:fs";
import path from "node:path";
import process from "node:process";
import { fileURLToPath } from "node:url";

import {
  CancellationContext,
  createLogger,
  formatHelp,
  handleParseResult,
  loadConfig,
  openFileLogSink,
  parseArgs,
  resolveLogLevel,
  type ArgDef,
  type CancellationOptions,
  type FileLogSink,
  type FwgrabConfig,
  type FwgrabLogger
} from "@fwgrab/common";

import { HttpCatalogClient } from "./catalog.js";
import { runDownloads } from "./orchestrator.js";
import { createProgressReporter } from "./progress.js";
import { summarizeResults } from "./report.js";
import type { CatalogClient, Device, RunOptions } from "./types.js";

export const EXIT_CANCELLED = 130;

interface DownloadCliOptions {
  downloadPath?: string;
  deleteOldFw?: boolean;
  downloadAll?: boolean;
  filterTerm?: string;
  logPath?: string;
  listDeviceNames?: boolean;
  config?: string;
}

const ARG_DEFS: ArgDef[] = [
  {
    name: "--download-path",
    alias: "-p",
    type: "string",
    description: "Directory to download .ipsw files to (default: ./ipsw)"
  },
  {
    name: "--delete-old-fw",
    alias: "-d",
    type: "boolean",
    description: "Delete old firmware files when a newer version is downloaded"
  },
  {
    name: "--download-all",
    alias: "-A",
    type: "boolean",
    description: "Download the latest firmware for all devices",
    conflicts: ["--filter-term", "--list-device-names"]
  },
  {
    name: "--filter-term",
    alias: "-f",
    type: "string",
    description: "Only download devices whose name contains this term (case-sensitive)",
    conflicts: ["--download-all", "--list-device-names"]
  },
  {
    name: "--log-path",
    alias: "-l",
    type: "string",
    description: "Write a diagnostic log to this file"
  },
  {
    name: "--list-device-names",
    alias: "-L",
    type: "boolean",
    description: "List all device names in the catalog and exit",
    conflicts: ["--download-all", "--filter-term"]
  },
  {
    name: "--config",
    alias: "-c",
    type: "string",
    description: "Load an alternate .fwgrab.json file"
  }
];

const SELECTION_FLAGS = ["--download-all", "--filter-term", "--list-device-names"];

const HELP_TEXT = formatHelp(
  "fwgrab (--download-all | --filter-term <term> | --list-device-names) [options]",
  "Download the newest firmware image for each device in the firmware catalog.",
  ARG_DEFS,
  [
    "fwgrab --download-all --download-path ./ipsw",
    "fwgrab -f iPad -d -l ./fwgrab.log",
    "fwgrab --list-device-names"
  ]
);

export function parseDownloadArgs(argv: string[]) {
  return parseArgs<DownloadCliOptions>(argv, ARG_DEFS, { requireOneOf: [SELECTION_FLAGS] });
}

export interface DownloadCliRuntime {
  loadConfig: (configPath?: string) => Promise<FwgrabConfig>;
  createCatalogClient: (config: FwgrabConfig) => CatalogClient;
  createCancellation: (options: CancellationOptions) => CancellationContext;
  openLogSink: (filePath: string) => Promise<FileLogSink>;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  now: () => Date;
}

const defaultRuntime: DownloadCliRuntime = {
  loadConfig: (configPath) => loadConfig(configPath),
  createCatalogClient: (config) => new HttpCatalogClient({ baseUrl: config.catalogUrl }),
  createCancellation: (options) => new CancellationContext(options),
  openLogSink: openFileLogSink,
  stdout: process.stdout,
  stderr: process.stderr,
  now: () => new Date()
};

function mergeRuntime(overrides?: Partial<DownloadCliRuntime>): DownloadCliRuntime {
  if (!overrides) {
    return defaultRuntime;
  }
  return {
    ...defaultRuntime,
    ...overrides
  };
}

export function resolveRunOptions(options: DownloadCliOptions, config: FwgrabConfig): RunOptions {
  return {
    downloadPath: path.resolve(options.downloadPath ?? config.downloadPath),
    deleteStaleFiles: options.deleteOldFw ?? false,
    filter: options.filterTerm,
    logPath: options.logPath,
    stagingPath: config.stagingPath ? path.resolve(config.stagingPath) : undefined,
    verifyChecksums: config.verifyChecksums
  };
}

export async function runDownloadCli(
  argv: string[],
  overrides?: Partial<DownloadCliRuntime>
): Promise<number> {
  const runtime = mergeRuntime(overrides);
  const result = parseDownloadArgs(argv);

  const exitCode = handleParseResult(result, HELP_TEXT, runtime.stdout, runtime.stderr);
  if (exitCode !== undefined) {
    return exitCode;
  }

  const { options } = result;

  let config: FwgrabConfig;
  try {
    config = await runtime.loadConfig(options.config);
  } catch (error) {
    runtime.stderr.write(`Error: ${(error as Error).message}\n`);
    return 1;
  }

  let logSink: FileLogSink | undefined;
  if (options.logPath) {
    try {
      logSink = await runtime.openLogSink(options.logPath);
    } catch (error) {
      runtime.stderr.write(`Error: log-path ${options.logPath} is not a writable file: ${(error as Error).message}\n`);
      return 1;
    }
  }

  const logger = logSink
    ? createLogger("fwgrab", { level: "debug", sink: logSink })
    : createLogger("fwgrab", { level: resolveLogLevel("silent") });

  try {
    return await execute(options, config, logger, runtime);
  } finally {
    await logSink?.close();
  }
}

async function execute(
  options: DownloadCliOptions,
  config: FwgrabConfig,
  logger: FwgrabLogger,
  runtime: DownloadCliRuntime
): Promise<number> {
  const { stdout, stderr } = runtime;
  const catalog = runtime.createCatalogClient(config);

  stdout.write("Getting Devices...\n");
  let devices: Device[];
  try {
    devices = await catalog.listDevices();
  } catch (error) {
    logger.error(`Listing devices failed: ${(error as Error).message}`);
    stderr.write(`Cannot reach catalog: ${(error as Error).message}\n`);
    return 1;
  }

  if (options.listDeviceNames) {
    for (const device of devices) {
      stdout.write(`${device.name}\n`);
    }
    return 0;
  }

  stdout.write(`Got ${devices.length} devices!\n`);
  logger.info(`Got ${devices.length} devices`);

  const runOptions = resolveRunOptions(options, config);
  const cancellation = runtime.createCancellation({
    onInterrupt: () => {
      stdout.write("Interrupt received, stopping after the current step...\n");
      logger.error("Killed by interrupt");
    }
  });

  try {
    const summary = await runDownloads(devices, runOptions, cancellation, {
      catalog,
      logger,
      stdout,
      createProgressHandler: (label) => createProgressReporter(stdout, label),
      now: runtime.now
    });

    const { failed } = summarizeResults(summary.results);
    if (failed.length > 0) {
      stdout.write(`Failed devices: ${failed.join(", ")}\n`);
    }

    return summary.cancelled ? EXIT_CANCELLED : 0;
  } finally {
    cancellation.dispose();
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runDownloadCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  }).catch((error: unknown) => {
    process.stderr.write(`Fatal error: ${(error as Error).message}\n`);
    process.exitCode = 1;
  });
}
