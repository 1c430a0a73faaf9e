import type { CancellationToken } from "@fwgrab/common";

import { materializeFirmware } from "./materializer.js";
import { RunReport, describeOutcome } from "./report.js";
import type {
  Device,
  DeviceResult,
  DownloadOutcome,
  FirmwareListing,
  RunDependencies,
  RunOptions,
  RunSummary
} from "./types.js";

export function selectDevices(devices: Device[], filter?: string): Device[] {
  if (filter === undefined) {
    return devices;
  }
  return devices.filter((device) => device.name.includes(filter));
}

async function processDevice(
  device: Device,
  options: RunOptions,
  cancel: CancellationToken,
  deps: RunDependencies
): Promise<DownloadOutcome> {
  const { catalog, logger } = deps;

  let listing: FirmwareListing;
  try {
    listing = await catalog.listFirmware(device);
  } catch (error) {
    const message = (error as Error).message;
    logger.error(`Getting device firmware errored: ${message}`);
    return {
      status: "failed",
      kind: "remote-unavailable",
      message: `Could not fetch the firmware listing: ${message}`
    };
  }

  try {
    return await materializeFirmware(listing, options, cancel, deps);
  } catch (error) {
    const message = (error as Error).message;
    logger.error(`Processing ${listing.name} failed: ${message}`);
    return { status: "failed", kind: "io-error", message };
  }
}

/**
 * Works through the (filtered) device list in catalog order, one device at a
 * time. A failing device is reported and skipped; cancellation stops the
 * loop before the next device is touched.
 */
export async function runDownloads(
  devices: Device[],
  options: RunOptions,
  cancel: CancellationToken,
  deps: RunDependencies
): Promise<RunSummary> {
  const { logger, stdout } = deps;

  if (options.filter !== undefined) {
    logger.debug(`using filter: ${options.filter}`);
  }
  const selected = selectDevices(devices, options.filter);
  const report = new RunReport(selected.length, deps.now);
  const results: DeviceResult[] = [];
  let cancelled = false;

  for (const device of selected) {
    if (cancel.isCancelled) {
      cancelled = true;
      break;
    }

    const outcome = await processDevice(device, options, cancel, deps);
    results.push({ device, outcome });
    report.record(outcome);
    stdout.write(`${describeOutcome(device.name, outcome)}\n`);

    if (outcome.status === "failed" && outcome.kind === "cancelled") {
      cancelled = true;
      break;
    }

    report.markDone();
    stdout.write(`${report.formatDeviceDone(device.name)}\n`);
  }

  const summary = report.formatSummary();
  stdout.write(`${summary}\n`);
  stdout.write(`${report.formatTally()}\n`);
  logger.info(summary);

  return {
    total: report.total,
    done: report.done,
    cancelled,
    elapsedMinutes: report.elapsedMinutes(),
    results
  };
}
