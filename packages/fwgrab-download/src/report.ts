import type { DeviceResult, DownloadOutcome } from "./types.js";

const MS_PER_MINUTE = 60_000;

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let index = 0;
  while (value >= 1024 && index < units.length - 1) {
    value /= 1024;
    index += 1;
  }
  const formatted = value >= 10 || value % 1 === 0 ? value.toFixed(0) : value.toFixed(1);
  return `${formatted} ${units[index]}`;
}

/**
 * Counters and wording for one download run. Produces strings only; the
 * caller decides where they go.
 */
export class RunReport {
  private readonly startedAt: Date;
  private doneCount = 0;
  private readonly tally = { completed: 0, skipped: 0, failed: 0 };

  constructor(
    readonly total: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.startedAt = now();
  }

  get done(): number {
    return this.doneCount;
  }

  record(outcome: DownloadOutcome): void {
    this.tally[outcome.status] += 1;
  }

  markDone(): void {
    this.doneCount += 1;
  }

  formatProgress(): string {
    return `(${this.doneCount}/${this.total})`;
  }

  formatDeviceDone(deviceName: string): string {
    return `Ended work on: ${deviceName} ${this.formatProgress()}`;
  }

  /** Whole minutes since the report was created, rounded down. */
  elapsedMinutes(): number {
    return Math.floor((this.now().getTime() - this.startedAt.getTime()) / MS_PER_MINUTE);
  }

  formatSummary(): string {
    return `Finished in ${this.elapsedMinutes()} minutes.`;
  }

  formatTally(): string {
    const { completed, skipped, failed } = this.tally;
    return `Completed: ${completed}, skipped: ${skipped}, failed: ${failed}`;
  }
}

export function describeOutcome(deviceName: string, outcome: DownloadOutcome): string {
  switch (outcome.status) {
    case "skipped":
      return outcome.reason === "already downloaded"
        ? `⏭️  ${deviceName} is already downloaded, skipping`
        : `⏭️  ${deviceName} has no firmware for download`;
    case "completed":
      return `✅ ${deviceName} ${outcome.version} saved to ${outcome.path} (${formatBytes(outcome.bytesWritten)})`;
    case "failed":
      return `❌ ${deviceName}: ${outcome.message}`;
  }
}

export function summarizeResults(results: DeviceResult[]): Record<DownloadOutcome["status"], string[]> {
  const grouped: Record<DownloadOutcome["status"], string[]> = { completed: [], skipped: [], failed: [] };
  for (const { device, outcome } of results) {
    grouped[outcome.status].push(device.name);
  }
  return grouped;
}
