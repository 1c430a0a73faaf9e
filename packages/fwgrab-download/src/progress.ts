import { formatBytes } from "./report.js";
import type { DownloadProgressHandler, OutputWriter } from "./types.js";

const UNKNOWN_SIZE_STEP = 50 * 1024 * 1024;

/**
 * Prints a progress line every 10 % of a download, or every 50 MB when the
 * size is unknown.
 */
export function createProgressReporter(stdout: OutputWriter, label: string): DownloadProgressHandler {
  let lastPercentLogged = 0;
  let lastBytesLogged = 0;

  return ({ downloadedBytes, totalBytes }) => {
    if (totalBytes !== undefined && totalBytes > 0) {
      const percent = Math.floor((downloadedBytes / totalBytes) * 100);
      if (percent >= lastPercentLogged + 10) {
        stdout.write(
          `  ${label}: ${percent}% (${formatBytes(downloadedBytes)} of ${formatBytes(totalBytes)})\n`
        );
        lastPercentLogged = Math.min(100, Math.floor(percent / 10) * 10);
      }
      return;
    }

    if (downloadedBytes - lastBytesLogged >= UNKNOWN_SIZE_STEP) {
      stdout.write(`  ${label}: ${formatBytes(downloadedBytes)} downloaded\n`);
      lastBytesLogged = downloadedBytes;
    }
  };
}
