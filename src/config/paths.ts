import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

export function getStateDir(): string {
  return process.env["SENTINEL_STATE_DIR"] ?? join(homedir(), ".sentinel");
}

export function getConfigPath(): string {
  return process.env["SENTINEL_CONFIG_PATH"] ?? "sentinel.config.json";
}

export function getSnapshotPath(stateDir: string, configured?: string): string {
  return configured ?? join(stateDir, "memory-index.json");
}

export function ensureDir(dirPath: string): string {
  mkdirSync(dirPath, { recursive: true });
  return dirPath;
}
