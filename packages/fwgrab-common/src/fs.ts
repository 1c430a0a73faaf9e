import { copyFile, mkdir, readdir, rename, rm, rmdir, stat } from "node:fs/promises";
import path from "node:path";

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Removes `dirPath` when it holds no entries.
 *
 * @returns whether the directory was removed
 */
export async function removeDirIfEmpty(dirPath: string): Promise<boolean> {
  try {
    await rmdir(dirPath);
    return true;
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === "ENOTEMPTY" || code === "EEXIST" || code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Regular files directly inside `dir`; a missing directory has none.
 */
export async function listRegularFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => path.join(dir, entry.name))
      .sort();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/**
 * Moves `source` to `destination` with a rename. Across volumes the file is
 * copied next to the destination first and then renamed into place, so the
 * destination path never holds a partial file.
 */
export async function moveFileAtomic(source: string, destination: string): Promise<void> {
  try {
    await rename(source, destination);
    return;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EXDEV") {
      throw error;
    }
  }

  const sibling = `${destination}.partial`;
  try {
    await copyFile(source, sibling);
    await rename(sibling, destination);
  } catch (error) {
    await rm(sibling, { force: true });
    throw error;
  }
  await rm(source, { force: true });
}
