import { EventEmitter } from "node:events";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { CancellationContext, type FwgrabLogger, type SignalSource } from "@fwgrab/common";

import type {
  CatalogClient,
  Device,
  DownloadStream,
  FirmwareEntry,
  FirmwareListing,
  MaterializeDependencies
} from "../src/types.js";

const TEMP_PREFIX = path.join(os.tmpdir(), "fwgrab-download-");

const tempDirs: string[] = [];

export async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(TEMP_PREFIX);
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

export function createSignalSource(): { emitter: EventEmitter; source: SignalSource } {
  const emitter = new EventEmitter();
  return {
    emitter,
    source: {
      onSignal: (signal, handler) => {
        emitter.on(signal, handler);
      },
      offSignal: (signal, handler) => {
        emitter.off(signal, handler);
      }
    }
  };
}

export function createCancellation(): CancellationContext {
  return new CancellationContext({ source: createSignalSource().source });
}

export interface CapturingLogger extends FwgrabLogger {
  lines: string[];
}

export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  const capture = (level: string) => (message: string) => {
    lines.push(`${level} ${message}`);
  };
  return {
    lines,
    debug: capture("debug"),
    info: capture("info"),
    warn: capture("warn"),
    error: capture("error")
  };
}

export interface CapturingOutput {
  text: string;
  write(chunk: string | Uint8Array): boolean;
  lines(): string[];
}

export function createOutput(): CapturingOutput {
  const output: CapturingOutput = {
    text: "",
    write(chunk) {
      output.text += typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8");
      return true;
    },
    lines() {
      return output.text.split("\n").filter((line) => line.length > 0);
    }
  };
  return output;
}

export function makeDevice(name: string, identifier = name.replace(/\s+/g, "")): Device {
  return { name, identifier, platform: "ios", cpid: 32768, bdid: 12 };
}

export function makeEntry(overrides: Partial<FirmwareEntry> = {}): FirmwareEntry {
  return {
    identifier: "iPhone1,1",
    version: "16.0",
    buildid: "X1",
    sha1sum: "",
    md5sum: "",
    filesize: 100,
    url: "https://firmware.example/test.ipsw",
    uploaddate: new Date("2024-01-02T03:04:05Z"),
    ...overrides
  };
}

export function makeListing(name: string, firmwares: FirmwareEntry[]): FirmwareListing {
  return {
    name,
    identifier: name.replace(/\s+/g, ""),
    platform: "ios",
    boardconfig: "n90ap",
    cpid: 32768,
    bdid: 12,
    firmwares
  };
}

export interface FakeStream extends DownloadStream {
  aborted: boolean;
}

/** Stream that yields the given chunks and then ends. */
export function streamOf(chunks: Uint8Array[], totalBytes?: number): FakeStream {
  async function* generate(): AsyncGenerator<Uint8Array> {
    for (const chunk of chunks) {
      yield chunk;
    }
  }
  const stream: FakeStream = {
    totalBytes: totalBytes ?? chunks.reduce((sum, chunk) => sum + chunk.length, 0),
    chunks: generate(),
    aborted: false,
    abort: async () => {
      stream.aborted = true;
    }
  };
  return stream;
}

/**
 * Stream that yields `head` and then waits forever; `stalled` resolves once
 * the consumer asks for the chunk after `head`.
 */
export function stallingStream(head: Uint8Array[], totalBytes: number): FakeStream & { stalled: Promise<void> } {
  let markStalled: () => void = () => undefined;
  const stalled = new Promise<void>((resolve) => {
    markStalled = resolve;
  });
  async function* generate(): AsyncGenerator<Uint8Array> {
    for (const chunk of head) {
      yield chunk;
    }
    markStalled();
    await new Promise<never>(() => undefined);
  }
  const stream: FakeStream & { stalled: Promise<void> } = {
    totalBytes,
    chunks: generate(),
    aborted: false,
    stalled,
    abort: async () => {
      stream.aborted = true;
    }
  };
  return stream;
}

export function bytes(length: number, fill = 7): Uint8Array {
  return new Uint8Array(length).fill(fill);
}

export class FakeCatalog implements CatalogClient {
  readonly listingRequests: string[] = [];
  readonly downloadRequests: string[] = [];

  constructor(
    private readonly devices: Device[],
    private readonly listings: Map<string, FirmwareListing | Error>,
    private readonly streams: (entry: FirmwareEntry) => DownloadStream | Error = () => streamOf([bytes(100)])
  ) {}

  async listDevices(): Promise<Device[]> {
    return this.devices;
  }

  async listFirmware(device: Device): Promise<FirmwareListing> {
    this.listingRequests.push(device.name);
    const listing = this.listings.get(device.identifier);
    if (listing === undefined) {
      throw new Error(`unknown device ${device.identifier}`);
    }
    if (listing instanceof Error) {
      throw listing;
    }
    return listing;
  }

  async openDownloadStream(entry: FirmwareEntry): Promise<DownloadStream> {
    this.downloadRequests.push(`${entry.identifier}/${entry.buildid}`);
    const stream = this.streams(entry);
    if (stream instanceof Error) {
      throw stream;
    }
    return stream;
  }
}

export function createDeps(
  catalog: Pick<CatalogClient, "openDownloadStream">
): MaterializeDependencies & { logger: CapturingLogger; stdout: CapturingOutput } {
  return {
    catalog,
    logger: createCapturingLogger(),
    stdout: createOutput()
  };
}
