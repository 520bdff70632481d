import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import { formatIssues } from "../config/schema.js";
import { IndexCorruption } from "../utils/errors.js";
import { withFileLock, writeFileAtomic } from "../utils/file-lock.js";

export const SNAPSHOT_VERSION = 1;

export const memoryRecordSchema = z.object({
  id: z.string().min(1),
  vector: z.array(z.number().finite()),
  summaryText: z.string(),
  insertedAt: z.number().int().nonnegative(),
});

export const memorySnapshotSchema = z
  .object({
    version: z.literal(SNAPSHOT_VERSION),
    dimension: z.number().int().positive(),
    entries: z.array(memoryRecordSchema),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<string>();
    snapshot.entries.forEach((entry, i) => {
      if (entry.vector.length !== snapshot.dimension) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "vector"],
          message: `expected ${snapshot.dimension} components, got ${entry.vector.length}`,
        });
      }
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "id"],
          message: `duplicate id "${entry.id}"`,
        });
      }
      seen.add(entry.id);
    });
  });

export type MemorySnapshot = z.infer<typeof memorySnapshotSchema>;

/** Validate an untrusted snapshot value. Throws IndexCorruption. */
export function parseSnapshot(raw: unknown): MemorySnapshot {
  const result = memorySnapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new IndexCorruption(`invalid memory snapshot: ${formatIssues(result.error).join("; ")}`);
  }
  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Read and validate a snapshot file. Returns null when the file does not
 * exist; throws IndexCorruption when it cannot be parsed or validated.
 */
export async function readSnapshotFile(filePath: string): Promise<MemorySnapshot | null> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new IndexCorruption(`cannot read memory snapshot ${filePath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new IndexCorruption(`memory snapshot ${filePath} is not valid JSON`, { cause: err });
  }
  return parseSnapshot(raw);
}

export async function writeSnapshotFile(filePath: string, snapshot: MemorySnapshot): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await withFileLock(filePath, () => writeFileAtomic(filePath, JSON.stringify(snapshot)));
}
