import { createHash, type Hash } from "node:crypto";
import { mkdtemp, open, rm, type FileHandle } from "node:fs/promises";
import path from "node:path";

import {
  ensureDir,
  listRegularFiles,
  moveFileAtomic,
  pathExists,
  removeDirIfEmpty,
  type CancellationToken
} from "@fwgrab/common";

import type {
  DownloadErrorKind,
  DownloadOutcome,
  DownloadStream,
  FirmwareEntry,
  FirmwareListing,
  MaterializeDependencies,
  RunOptions
} from "./types.js";

export const STAGING_DIRNAME = ".fwgrab-staging";
export const FIRMWARE_EXTENSION = ".ipsw";

export function resolveFinalPath(root: string, listing: FirmwareListing, entry: FirmwareEntry): string {
  // the version string, not the build identifier, names the file
  return path.join(root, listing.name, `${entry.version}${FIRMWARE_EXTENSION}`);
}

export function resolveStagingRoot(options: RunOptions): string {
  return options.stagingPath ?? path.join(options.downloadPath, STAGING_DIRNAME);
}

type StreamResult =
  | { kind: "drained"; bytesWritten: number; sha1: string }
  | { kind: "cancelled" }
  | { kind: "read-failed"; error: unknown };

type ChunkWait =
  | { kind: "chunk"; result: IteratorResult<Uint8Array> }
  | { kind: "error"; error: unknown }
  | { kind: "cancelled" };

class StageWriteError extends Error {
  declare cause?: unknown;

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause));
    this.name = "StageWriteError";
    this.cause = cause;
  }
}

async function writeFully(handle: FileHandle, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
}

/**
 * Waits for the next chunk or for cancellation, whichever comes first. The
 * cancellation listener lives only as long as this one wait.
 */
async function nextChunkOrCancel(
  iterator: AsyncIterator<Uint8Array>,
  cancel: CancellationToken
): Promise<ChunkWait> {
  let unsubscribe: () => void = () => undefined;
  const cancelled = new Promise<ChunkWait>((resolve) => {
    unsubscribe = cancel.subscribe(() => resolve({ kind: "cancelled" }));
  });
  const next = iterator.next().then(
    (result): ChunkWait => ({ kind: "chunk", result }),
    (error: unknown): ChunkWait => ({ kind: "error", error })
  );
  try {
    return await Promise.race([next, cancelled]);
  } finally {
    unsubscribe();
  }
}

/**
 * Appends the stream to the stage file until it ends or cancellation wins.
 * A chunk that arrives after cancellation was observed is never written.
 */
async function drainToStage(
  stream: DownloadStream,
  handle: FileHandle,
  cancel: CancellationToken,
  onChunk: (downloadedBytes: number) => void
): Promise<StreamResult> {
  const iterator = stream.chunks[Symbol.asyncIterator]();
  const hash: Hash = createHash("sha1");
  let bytesWritten = 0;

  while (true) {
    if (cancel.isCancelled) {
      return { kind: "cancelled" };
    }

    const winner = await nextChunkOrCancel(iterator, cancel);
    if (winner.kind === "cancelled") {
      return winner;
    }
    if (winner.kind === "error") {
      return { kind: "read-failed", error: winner.error };
    }
    const step = winner.result;
    if (step.done) {
      return { kind: "drained", bytesWritten, sha1: hash.digest("hex") };
    }

    const chunk = step.value;
    try {
      await writeFully(handle, chunk);
    } catch (error) {
      throw new StageWriteError(error);
    }
    hash.update(chunk);
    bytesWritten += chunk.length;
    onChunk(bytesWritten);
  }
}

async function deleteStaleFiles(
  deviceDir: string,
  keep: string,
  deps: MaterializeDependencies
): Promise<void> {
  const { logger, stdout } = deps;
  let files: string[];
  try {
    files = await listRegularFiles(deviceDir);
  } catch (error) {
    logger.error(`failed to list ${deviceDir}: ${(error as Error).message}`);
    stdout.write(`failed to list old files in ${deviceDir}\n`);
    return;
  }

  for (const file of files) {
    if (file === keep) {
      continue;
    }
    const name = path.basename(file);
    try {
      await rm(file);
      stdout.write(`deleted old file ${name}\n`);
      logger.info(`deleted old file ${name}`);
    } catch (error) {
      stdout.write(`failed to delete old file ${name}\n`);
      logger.error(`failed to delete old file ${name} because: ${(error as Error).message}`);
    }
  }
}

function failed(kind: DownloadErrorKind, message: string): DownloadOutcome {
  return { status: "failed", kind, message };
}

/**
 * Downloads the newest firmware of a listing into
 * `<downloadPath>/<device>/<version>.ipsw`.
 *
 * Bytes are staged in a private directory under the staging root and only
 * renamed into place after the whole stream drained (and, when enabled,
 * matched its SHA-1). A cancelled or failed download never leaves a file at
 * the final path.
 */
export async function materializeFirmware(
  listing: FirmwareListing,
  options: RunOptions,
  cancel: CancellationToken,
  deps: MaterializeDependencies
): Promise<DownloadOutcome> {
  const { catalog, logger, stdout } = deps;

  const newest = listing.firmwares[0];
  if (!newest) {
    logger.info(`${listing.name} has no firmware for download`);
    return { status: "skipped", reason: "no firmware available" };
  }

  const finalPath = resolveFinalPath(options.downloadPath, listing, newest);
  const deviceDir = path.dirname(finalPath);
  logger.debug(`Using path ${finalPath}`);

  if (await pathExists(finalPath)) {
    logger.info(`${listing.name} is already downloaded`);
    return { status: "skipped", reason: "already downloaded" };
  }

  if (cancel.isCancelled) {
    logger.info(`${listing.name} interrupted before the download started`);
    return failed("cancelled", "interrupted");
  }

  stdout.write(`Beginning to download ${listing.name} ${newest.version}...\n`);
  logger.info(`downloading ${listing.name} ${newest.version}`);

  const stagingRoot = resolveStagingRoot(options);
  let stageDir: string | undefined;
  let stagePath = "";
  let handle: FileHandle | undefined;
  let stream: DownloadStream | undefined;

  try {
    try {
      await ensureDir(stagingRoot);
      stageDir = await mkdtemp(path.join(stagingRoot, "dl-"));
      stagePath = path.join(stageDir, `${newest.buildid}${FIRMWARE_EXTENSION}`);
      handle = await open(stagePath, "wx");
    } catch (error) {
      logger.error(`Could not create staging file in ${stagingRoot}: ${(error as Error).message}`);
      return failed("io-error", `Could not create staging file: ${(error as Error).message}`);
    }

    try {
      stream = await catalog.openDownloadStream(newest);
    } catch (error) {
      logger.error(`Downloading ${listing.name} ${newest.identifier} errored on the catalog: ${(error as Error).message}`);
      return failed("remote-unavailable", `Download request failed: ${(error as Error).message}`);
    }

    const totalBytes = stream.totalBytes;
    const onProgress = deps.createProgressHandler?.(`${listing.name} ${newest.version}`);
    onProgress?.({ downloadedBytes: 0, totalBytes });

    let result: StreamResult;
    try {
      result = await drainToStage(stream, handle, cancel, (downloadedBytes) => {
        onProgress?.({ downloadedBytes, totalBytes });
      });
    } catch (error) {
      if (error instanceof StageWriteError) {
        logger.error(`Error writing staging file ${stagePath}: ${error.message}`);
        return failed("io-error", `Error writing staging file: ${error.message}`);
      }
      throw error;
    }

    if (result.kind === "cancelled") {
      logger.error(`Download of ${listing.name} ${newest.version} interrupted`);
      return failed("cancelled", "interrupted");
    }
    if (result.kind === "read-failed") {
      const message = result.error instanceof Error ? result.error.message : String(result.error);
      logger.error(`Download of ${listing.name} ${newest.version} broke off: ${message}`);
      return failed("remote-unavailable", `Download broke off: ${message}`);
    }
    stream = undefined;

    if (totalBytes !== undefined && result.bytesWritten !== totalBytes) {
      logger.error(`Download of ${listing.name} ended after ${result.bytesWritten} of ${totalBytes} bytes`);
      return failed(
        "remote-unavailable",
        `Download ended after ${result.bytesWritten} of ${totalBytes} bytes`
      );
    }

    const expectedSha1 = newest.sha1sum.trim().toLowerCase();
    if (options.verifyChecksums && expectedSha1 !== "" && expectedSha1 !== result.sha1) {
      logger.error(`Checksum mismatch for ${listing.name} ${newest.version}: expected ${expectedSha1}, got ${result.sha1}`);
      return failed("checksum-mismatch", `SHA-1 mismatch: expected ${expectedSha1}, got ${result.sha1}`);
    }

    try {
      await handle.close();
      handle = undefined;
      if (options.deleteStaleFiles) {
        await deleteStaleFiles(deviceDir, finalPath, deps);
      }
      await ensureDir(deviceDir);
      logger.debug(`Promoting ${stagePath} to ${finalPath}`);
      await moveFileAtomic(stagePath, finalPath);
    } catch (error) {
      logger.error(`Could not create file ${finalPath}: ${(error as Error).message}`);
      return failed("io-error", `Could not create file ${finalPath}: ${(error as Error).message}`);
    }

    if (result.bytesWritten === 0) {
      logger.warn("Didn't copy any bytes to final file!");
    } else {
      logger.debug(`Copied ${result.bytesWritten} bytes to final file`);
    }

    return { status: "completed", bytesWritten: result.bytesWritten, path: finalPath, version: newest.version };
  } finally {
    if (stream) {
      await stream.abort().catch((error: unknown) => {
        logger.debug(`Closing download stream failed: ${(error as Error).message}`);
      });
    }
    if (handle) {
      await handle.close().catch((error: unknown) => {
        logger.debug(`Closing staging file failed: ${(error as Error).message}`);
      });
    }
    if (stageDir) {
      await rm(stageDir, { recursive: true, force: true });
    }
    if (options.stagingPath === undefined) {
      // the default staging root sits inside the download tree
      await removeDirIfEmpty(stagingRoot).catch((error: unknown) => {
        logger.debug(`Removing ${stagingRoot} failed: ${(error as Error).message}`);
      });
    }
  }
}
