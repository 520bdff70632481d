import { rename, writeFile } from "node:fs/promises";
import * as lockfile from "proper-lockfile";

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: 3, minTimeout: 100 },
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}

/** Write to a sibling temp file then rename over the target. */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmp, content, "utf-8");
  await rename(tmp, filePath);
}
