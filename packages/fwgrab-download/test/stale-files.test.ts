import { mkdir, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { materializeFirmware } from "../src/materializer.js";
import {
  FakeCatalog,
  bytes,
  cleanupTempDirs,
  createCancellation,
  createDeps,
  createTempDir,
  makeEntry,
  makeListing,
  streamOf
} from "./helpers.js";

const failures = vi.hoisted(() => ({ rm: new Set<string>(), readdir: new Set<string>() }));

vi.mock("node:fs/promises", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs/promises")>();
  const fault = (code: string, message: string): Error => Object.assign(new Error(message), { code });
  return {
    ...actual,
    rm: async (...args: Parameters<typeof actual.rm>) => {
      const target = String(args[0]);
      if (failures.rm.has(target)) {
        throw fault("EPERM", `EPERM: operation not permitted, unlink '${target}'`);
      }
      return actual.rm(...args);
    },
    readdir: async (...args: Parameters<typeof actual.readdir>) => {
      const target = String(args[0]);
      if (failures.readdir.has(target)) {
        throw fault("EACCES", `EACCES: permission denied, scandir '${target}'`);
      }
      return actual.readdir(...args);
    }
  };
});

afterEach(async () => {
  failures.rm.clear();
  failures.readdir.clear();
  await cleanupTempDirs();
});

async function seedDeviceDir(root: string, names: string[]): Promise<string> {
  const deviceDir = path.join(root, "iPhone 1");
  await mkdir(deviceDir, { recursive: true });
  for (const name of names) {
    await writeFile(path.join(deviceDir, name), "old");
  }
  return deviceDir;
}

describe("stale file deletion", () => {
  it("keeps going when one old file cannot be deleted", async () => {
    const root = await createTempDir();
    const deviceDir = await seedDeviceDir(root, ["old1.ipsw", "old2.ipsw"]);
    const stuck = path.join(deviceDir, "old1.ipsw");
    failures.rm.add(stuck);
    const cancel = createCancellation();
    const deps = createDeps(new FakeCatalog([], new Map(), () => streamOf([bytes(100)])));

    const outcome = await materializeFirmware(
      makeListing("iPhone 1", [makeEntry()]),
      { downloadPath: root, deleteStaleFiles: true },
      cancel,
      deps
    );

    expect(outcome).toMatchObject({ status: "completed", bytesWritten: 100 });
    expect(deps.stdout.lines()).toEqual([
      "Beginning to download iPhone 1 16.0...",
      "failed to delete old file old1.ipsw",
      "deleted old file old2.ipsw"
    ]);
    expect(deps.logger.lines).toContain(
      `error failed to delete old file old1.ipsw because: EPERM: operation not permitted, unlink '${stuck}'`
    );
    expect((await readdir(deviceDir)).sort()).toEqual(["16.0.ipsw", "old1.ipsw"]);
    cancel.dispose();
  });

  it("still promotes the download when the device directory cannot be listed", async () => {
    const root = await createTempDir();
    const deviceDir = await seedDeviceDir(root, ["old1.ipsw"]);
    failures.readdir.add(deviceDir);
    const cancel = createCancellation();
    const deps = createDeps(new FakeCatalog([], new Map(), () => streamOf([bytes(100)])));

    const outcome = await materializeFirmware(
      makeListing("iPhone 1", [makeEntry()]),
      { downloadPath: root, deleteStaleFiles: true },
      cancel,
      deps
    );

    expect(outcome).toMatchObject({ status: "completed", bytesWritten: 100 });
    expect(deps.stdout.lines()).toEqual([
      "Beginning to download iPhone 1 16.0...",
      `failed to list old files in ${deviceDir}`
    ]);
    expect(deps.logger.lines).toContain(
      `error failed to list ${deviceDir}: EACCES: permission denied, scandir '${deviceDir}'`
    );
    failures.readdir.clear();
    expect((await readdir(deviceDir)).sort()).toEqual(["16.0.ipsw", "old1.ipsw"]);
    cancel.dispose();
  });
});
