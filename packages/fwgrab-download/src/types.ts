import type { FwgrabLogger } from "@fwgrab/common";

export interface Device {
  name: string;
  identifier: string;
  platform: string;
  cpid: number;
  bdid: number;
}

export interface FirmwareEntry {
  identifier: string;
  version: string;
  buildid: string;
  sha1sum: string;
  md5sum: string;
  filesize: number;
  url: string;
  uploaddate: Date | null;
}

export interface FirmwareListing {
  /** Device name with path separators replaced; used as a directory name */
  name: string;
  identifier: string;
  platform: string;
  boardconfig: string;
  cpid: number;
  bdid: number;
  /** Newest first, as ordered by the catalog */
  firmwares: FirmwareEntry[];
}

export interface DownloadStream {
  /** Declared length from the response, when the server sent one */
  totalBytes?: number;
  chunks: AsyncIterable<Uint8Array>;
  /** Stops the transfer and releases the connection */
  abort(): Promise<void>;
}

export interface CatalogClient {
  listDevices(): Promise<Device[]>;
  listFirmware(device: Device): Promise<FirmwareListing>;
  openDownloadStream(firmware: FirmwareEntry): Promise<DownloadStream>;
}

export interface RunOptions {
  downloadPath: string;
  deleteStaleFiles: boolean;
  filter?: string;
  logPath?: string;
  /** Defaults to `<downloadPath>/.fwgrab-staging` */
  stagingPath?: string;
  verifyChecksums?: boolean;
}

export type DownloadErrorKind = "remote-unavailable" | "io-error" | "cancelled" | "checksum-mismatch";

export type SkipReason = "no firmware available" | "already downloaded";

export type DownloadOutcome =
  | { status: "skipped"; reason: SkipReason }
  | { status: "completed"; bytesWritten: number; path: string; version: string }
  | { status: "failed"; kind: DownloadErrorKind; message: string };

export interface DownloadProgress {
  downloadedBytes: number;
  totalBytes?: number;
}

export type DownloadProgressHandler = (progress: DownloadProgress) => void;

export type OutputWriter = Pick<NodeJS.WritableStream, "write">;

export interface MaterializeDependencies {
  catalog: Pick<CatalogClient, "openDownloadStream">;
  logger: FwgrabLogger;
  stdout: OutputWriter;
  /** Builds a progress callback for one download */
  createProgressHandler?: (label: string) => DownloadProgressHandler;
}

export interface RunDependencies extends MaterializeDependencies {
  catalog: CatalogClient;
  now?: () => Date;
}

export interface DeviceResult {
  device: Device;
  outcome: DownloadOutcome;
}

export interface RunSummary {
  total: number;
  done: number;
  cancelled: boolean;
  elapsedMinutes: number;
  results: DeviceResult[];
}
