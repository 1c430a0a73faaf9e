import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";

export interface FwgrabConfig {
  /** Base URL of the firmware catalog API, always ending in "/" */
  catalogUrl: string;
  downloadPath: string;
  /** Where downloads are staged before promotion; defaults under downloadPath */
  stagingPath?: string;
  verifyChecksums: boolean;
}

export const DEFAULT_CONFIG_FILENAME = ".fwgrab.json";

export const DEFAULT_CONFIG: Readonly<FwgrabConfig> = {
  catalogUrl: "https://api.ipsw.me/v4/",
  downloadPath: "./ipsw",
  verifyChecksums: true,
};

export class FwgrabConfigError extends Error {
  declare cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = "FwgrabConfigError";
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function getDefaultConfigPath(cwd: string = process.cwd()): string {
  return path.resolve(cwd, DEFAULT_CONFIG_FILENAME);
}

/**
 * Loads the optional config file. An explicitly named file (argument or
 * FWGRAB_CONFIG) must exist; the default `.fwgrab.json` may be absent.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<FwgrabConfig> {
  const envConfigPath = process.env.FWGRAB_CONFIG;
  const explicitPath = configPath ?? (envConfigPath || undefined);
  const resolvedPath = explicitPath ? path.resolve(cwd, explicitPath) : getDefaultConfigPath(cwd);

  let fileContents: string;
  try {
    fileContents = await readFile(resolvedPath, "utf8");
  } catch (error) {
    if (!explicitPath && (error as NodeJS.ErrnoException).code === "ENOENT") {
      return { ...DEFAULT_CONFIG };
    }
    throw new FwgrabConfigError(`Unable to read fwgrab config at ${resolvedPath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(fileContents);
  } catch (error) {
    throw new FwgrabConfigError(`Invalid JSON in fwgrab config at ${resolvedPath}`, { cause: error });
  }

  return validateConfig(data, resolvedPath);
}

function validateConfig(value: unknown, configPath: string): FwgrabConfig {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new FwgrabConfigError(`Config at ${configPath} must be a JSON object`);
  }

  const record = value as Record<string, unknown>;

  const optionalString = (key: keyof FwgrabConfig): string | undefined => {
    const raw = record[key];
    if (raw === undefined) {
      return undefined;
    }
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new FwgrabConfigError(`Config key "${key}" must be a non-empty string`);
    }
    return raw;
  };

  const optionalBoolean = (key: keyof FwgrabConfig): boolean | undefined => {
    const raw = record[key];
    if (raw === undefined) {
      return undefined;
    }
    if (typeof raw !== "boolean") {
      throw new FwgrabConfigError(`Config key "${key}" must be a boolean`);
    }
    return raw;
  };

  const catalogUrl = optionalString("catalogUrl");
  const downloadPath = optionalString("downloadPath");
  const stagingPath = optionalString("stagingPath");

  return {
    catalogUrl: catalogUrl === undefined ? DEFAULT_CONFIG.catalogUrl : normalizeCatalogUrl(catalogUrl),
    downloadPath: downloadPath === undefined ? DEFAULT_CONFIG.downloadPath : path.normalize(downloadPath),
    stagingPath: stagingPath === undefined ? undefined : path.normalize(stagingPath),
    verifyChecksums: optionalBoolean("verifyChecksums") ?? DEFAULT_CONFIG.verifyChecksums,
  };
}

function normalizeCatalogUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new FwgrabConfigError(`Config key "catalogUrl" must be an absolute URL`, { cause: error });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new FwgrabConfigError(`Config key "catalogUrl" must use http or https`);
  }
  const href = url.toString();
  return href.endsWith("/") ? href : `${href}/`;
}
