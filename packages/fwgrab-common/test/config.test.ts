import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_CONFIG, FwgrabConfigError, loadConfig } from "../src/config.js";

const TEMP_PREFIX = path.join(os.tmpdir(), "fwgrab-config-");

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(TEMP_PREFIX);
    vi.stubEnv("FWGRAB_CONFIG", "");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(name: string, value: unknown): Promise<string> {
    const filePath = path.join(dir, name);
    await writeFile(filePath, typeof value === "string" ? value : JSON.stringify(value), "utf8");
    return filePath;
  }

  it("falls back to defaults when the default file is absent", async () => {
    const config = await loadConfig(undefined, dir);
    expect(config).toEqual({
      catalogUrl: "https://api.ipsw.me/v4/",
      downloadPath: "./ipsw",
      verifyChecksums: true
    });
    expect(config).not.toBe(DEFAULT_CONFIG);
  });

  it("reads and normalizes the default file", async () => {
    await writeConfig(".fwgrab.json", {
      catalogUrl: "https://mirror.example/api",
      downloadPath: "firmware//images",
      stagingPath: "/var/tmp/fw",
      verifyChecksums: false
    });

    const config = await loadConfig(undefined, dir);

    expect(config).toEqual({
      catalogUrl: "https://mirror.example/api/",
      downloadPath: path.normalize("firmware//images"),
      stagingPath: path.normalize("/var/tmp/fw"),
      verifyChecksums: false
    });
  });

  it("uses FWGRAB_CONFIG when no path is passed", async () => {
    const filePath = await writeConfig("env.json", { downloadPath: "from-env" });
    vi.stubEnv("FWGRAB_CONFIG", filePath);

    const config = await loadConfig(undefined, dir);
    expect(config.downloadPath).toBe("from-env");
  });

  it("requires an explicitly named file to exist", async () => {
    const missing = path.join(dir, "missing.json");
    await expect(loadConfig("missing.json", dir)).rejects.toThrow(`Unable to read fwgrab config at ${missing}`);
    await expect(loadConfig("missing.json", dir)).rejects.toBeInstanceOf(FwgrabConfigError);
  });

  it("rejects invalid JSON", async () => {
    const filePath = await writeConfig("broken.json", "{ nope");
    await expect(loadConfig(filePath, dir)).rejects.toThrow(`Invalid JSON in fwgrab config at ${filePath}`);
  });

  it("rejects documents that are not objects", async () => {
    const filePath = await writeConfig("array.json", []);
    await expect(loadConfig(filePath, dir)).rejects.toThrow(`Config at ${filePath} must be a JSON object`);
  });

  it("names the offending key", async () => {
    const flag = await writeConfig("flag.json", { verifyChecksums: "yes" });
    await expect(loadConfig(flag, dir)).rejects.toThrow('Config key "verifyChecksums" must be a boolean');

    const empty = await writeConfig("empty.json", { downloadPath: " " });
    await expect(loadConfig(empty, dir)).rejects.toThrow('Config key "downloadPath" must be a non-empty string');
  });

  it("validates the catalog URL", async () => {
    const ftp = await writeConfig("ftp.json", { catalogUrl: "ftp://catalog.example/" });
    await expect(loadConfig(ftp, dir)).rejects.toThrow('Config key "catalogUrl" must use http or https');

    const relative = await writeConfig("relative.json", { catalogUrl: "catalog/v4" });
    await expect(loadConfig(relative, dir)).rejects.toThrow('Config key "catalogUrl" must be an absolute URL');
  });
});
