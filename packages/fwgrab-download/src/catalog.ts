import { DEFAULT_CONFIG } from "@fwgrab/common";

import type {
  CatalogClient,
  Device,
  DownloadStream,
  FirmwareEntry,
  FirmwareListing
} from "./types.js";

export class CatalogError extends Error {
  declare cause?: unknown;
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message);
    this.name = "CatalogError";
    this.status = options?.status;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Makes a device name safe to use as a single directory component.
 */
export function sanitizeDeviceName(name: string): string {
  return name.replace(/[/\\]/g, "z");
}

export interface HttpCatalogClientOptions {
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/** Catalog client for the ipsw.me v4 API. */
export class HttpCatalogClient implements CatalogClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCatalogClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_CONFIG.catalogUrl;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async listDevices(): Promise<Device[]> {
    const payload = await this.getJson("devices");
    if (!Array.isArray(payload)) {
      throw new CatalogError("Device list must be a JSON array");
    }
    return payload.map((entry, index) => parseDevice(entry, `devices[${index}]`));
  }

  async listFirmware(device: Device): Promise<FirmwareListing> {
    const payload = await this.getJson(`device/${encodeURIComponent(device.identifier)}?type=ipsw`);
    const listing = parseFirmwareListing(payload);
    return { ...listing, name: sanitizeDeviceName(listing.name) };
  }

  async openDownloadStream(firmware: FirmwareEntry): Promise<DownloadStream> {
    const route = `ipsw/download/${encodeURIComponent(firmware.identifier)}/${encodeURIComponent(firmware.buildid)}`;
    const response = await this.request(route);

    if (!response.body) {
      throw new CatalogError(`Download of ${firmware.identifier} ${firmware.buildid} returned no body`);
    }

    const contentLength = response.headers.get("content-length");
    const declared = contentLength === null ? Number.NaN : Number(contentLength);
    const reader = response.body.getReader();

    async function* readChunks(): AsyncGenerator<Uint8Array> {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        if (value && value.length > 0) {
          yield value;
        }
      }
    }

    return {
      totalBytes: Number.isFinite(declared) && declared >= 0 ? declared : undefined,
      chunks: readChunks(),
      abort: async () => {
        await reader.cancel();
      }
    };
  }

  private async request(route: string): Promise<Response> {
    const url = new URL(route, this.baseUrl).toString();
    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new CatalogError(`Request to ${url} failed: ${(error as Error).message}`, { cause: error });
    }
    if (!response.ok) {
      throw new CatalogError(`Request to ${url} failed: ${response.status} ${response.statusText}`, {
        status: response.status
      });
    }
    return response;
  }

  private async getJson(route: string): Promise<unknown> {
    const response = await this.request(route);
    try {
      return await response.json();
    } catch (error) {
      throw new CatalogError(`Response from ${response.url || route} is not valid JSON`, { cause: error });
    }
  }
}

function asRecord(value: unknown, where: string): Record<string, unknown> {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new CatalogError(`${where} must be an object`);
  }
  return value as Record<string, unknown>;
}

function readString(record: Record<string, unknown>, key: string, where: string): string {
  const raw = record[key];
  if (typeof raw !== "string") {
    throw new CatalogError(`${where}.${key} must be a string`);
  }
  return raw;
}

function readNumber(record: Record<string, unknown>, key: string, where: string): number {
  const raw = record[key];
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    throw new CatalogError(`${where}.${key} must be a number`);
  }
  return raw;
}

export function parseDevice(value: unknown, where = "device"): Device {
  const record = asRecord(value, where);
  return {
    name: readString(record, "name", where),
    identifier: readString(record, "identifier", where),
    platform: readString(record, "platform", where),
    cpid: readNumber(record, "cpid", where),
    bdid: readNumber(record, "bdid", where)
  };
}

function parseUploadDate(raw: unknown, where: string): Date | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const parsed = typeof raw === "string" ? new Date(raw) : null;
  if (!parsed || Number.isNaN(parsed.getTime())) {
    throw new CatalogError(`${where}.uploaddate must be an ISO date`);
  }
  return parsed;
}

export function parseFirmwareEntry(value: unknown, where = "firmware"): FirmwareEntry {
  const record = asRecord(value, where);
  return {
    identifier: readString(record, "identifier", where),
    version: readString(record, "version", where),
    buildid: readString(record, "buildid", where),
    sha1sum: readString(record, "sha1sum", where),
    md5sum: readString(record, "md5sum", where),
    filesize: readNumber(record, "filesize", where),
    url: readString(record, "url", where),
    uploaddate: parseUploadDate(record.uploaddate, where)
  };
}

export function parseFirmwareListing(value: unknown): FirmwareListing {
  const where = "listing";
  const record = asRecord(value, where);
  const firmwares = record.firmwares;
  if (!Array.isArray(firmwares)) {
    throw new CatalogError(`${where}.firmwares must be an array`);
  }
  return {
    name: readString(record, "name", where),
    identifier: readString(record, "identifier", where),
    platform: readString(record, "platform", where),
    boardconfig: readString(record, "boardconfig", where),
    cpid: readNumber(record, "cpid", where),
    bdid: readNumber(record, "bdid", where),
    firmwares: firmwares.map((entry, index) => parseFirmwareEntry(entry, `${where}.firmwares[${index}]`))
  };
}
