import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { silentLogger } from "../../src/logging/logger.js";
import type { Embedder, Vector } from "../../src/memory/embedder.js";
import { HashingEmbedder } from "../../src/memory/embedder.js";
import { parseSnapshot, readSnapshotFile, SNAPSHOT_VERSION } from "../../src/memory/snapshot-file.js";
import { VectorIndex } from "../../src/memory/vector-index.js";
import { IndexCorruption } from "../../src/utils/errors.js";

/** Maps known words to fixed axes so rankings are easy to predict. */
class AxisEmbedder implements Embedder {
  readonly dimension = 3;
  private readonly axes: Record<string, Vector> = {
    alpha: [1, 0, 0],
    beta: [0, 1, 0],
    gamma: [0, 0, 1],
    alphabeta: [Math.SQRT1_2, Math.SQRT1_2, 0],
  };

  embed(text: string): Vector {
    return this.axes[text] ?? [0, 0, 0];
  }
}

describe("VectorIndex", () => {
  let index: VectorIndex;

  beforeEach(() => {
    index = new VectorIndex(new AxisEmbedder());
  });

  it("inserts once per id", async () => {
    expect(await index.insert({ id: "a", summaryText: "alpha" })).toBe(true);
    expect(await index.insert({ id: "a", summaryText: "beta" })).toBe(false);
    expect(index.size).toBe(1);
    expect(index.search("alpha", 1)[0]?.record.summaryText).toBe("alpha");
  });

  it("ranks by cosine similarity", async () => {
    await index.insert({ id: "b", summaryText: "beta" });
    await index.insert({ id: "ab", summaryText: "alphabeta" });
    await index.insert({ id: "a", summaryText: "alpha" });

    const hits = index.search("alpha", 3);
    expect(hits.map((h) => h.record.id)).toEqual(["a", "ab", "b"]);
    expect(hits[0]?.similarity).toBeCloseTo(1, 10);
    expect(hits[1]?.similarity).toBeCloseTo(Math.SQRT1_2, 10);
    expect(hits[2]?.similarity).toBe(0);
  });

  it("keeps insertion order for equal similarities", async () => {
    await index.insert({ id: "first", summaryText: "gamma" });
    await index.insert({ id: "second", summaryText: "gamma" });
    expect(index.search("gamma", 2).map((h) => h.record.id)).toEqual(["first", "second"]);
  });

  it("returns at most k hits and nothing for k <= 0", async () => {
    await index.insert({ id: "a", summaryText: "alpha" });
    await index.insert({ id: "b", summaryText: "beta" });
    expect(index.search("alpha", 1)).toHaveLength(1);
    expect(index.search("alpha", 10)).toHaveLength(2);
    expect(index.search("alpha", 0)).toEqual([]);
  });

  it("rejects a query of the wrong dimension", () => {
    expect(() => index.query([1, 0], 1)).toThrow(RangeError);
  });

  it("returns frozen records", async () => {
    await index.insert({ id: "a", summaryText: "alpha", insertedAt: 7 });
    const hit = index.search("alpha", 1)[0];
    expect(hit?.record.insertedAt).toBe(7);
    expect(Object.isFrozen(hit?.record)).toBe(true);
  });

  it("handles concurrent inserts of the same id once", async () => {
    const results = await Promise.all([
      index.insert({ id: "dup", summaryText: "alpha" }),
      index.insert({ id: "dup", summaryText: "alpha" }),
      index.insert({ id: "other", summaryText: "beta" }),
    ]);
    expect(results).toEqual([true, false, true]);
    expect(index.size).toBe(2);
  });
});

describe("VectorIndex snapshots", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sentinel-memory-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists to disk and reloads the same records", async () => {
    const embedder = new HashingEmbedder(32);
    const path = join(dir, "nested", "memory-index.json");
    const index = new VectorIndex(embedder, { snapshotPath: path });
    await index.insert({ id: "r1", summaryText: "jdoe sent iban to chatgpt", insertedAt: 1 });
    await index.insert({ id: "r2", summaryText: "asmith drafted a memo", insertedAt: 2 });

    const snapshot = await index.persist();
    expect(snapshot.version).toBe(SNAPSHOT_VERSION);
    expect(snapshot.entries.map((e) => e.id)).toEqual(["r1", "r2"]);
    expect(existsSync(path)).toBe(true);

    const reopened = await VectorIndex.open(path, embedder, silentLogger());
    expect(reopened.size).toBe(2);
    expect(reopened.has("r1")).toBe(true);
    expect(reopened.search("iban chatgpt", 1)).toEqual(index.search("iban chatgpt", 1));
    expect(await reopened.insert({ id: "r1", summaryText: "again" })).toBe(false);
  });

  it("only returns the snapshot when no path is configured", async () => {
    const index = new VectorIndex(new HashingEmbedder(8));
    await index.insert({ id: "x", summaryText: "text", insertedAt: 0 });
    const snapshot = await index.persist();
    expect(snapshot.entries).toHaveLength(1);
  });

  it("rebuilds from a snapshot value", () => {
    const loaded = VectorIndex.load(
      {
        version: 1,
        dimension: 3,
        entries: [{ id: "a", vector: [1, 0, 0], summaryText: "alpha", insertedAt: 5 }],
      },
      new AxisEmbedder(),
    );
    expect(loaded.search("alpha", 1)[0]?.record.id).toBe("a");
  });

  it("rejects a snapshot from a different dimension", () => {
    expect(() =>
      VectorIndex.load({ version: 1, dimension: 4, entries: [] }, new AxisEmbedder()),
    ).toThrow(IndexCorruption);
  });

  it("opens an empty index when the file is missing", async () => {
    const index = await VectorIndex.open(join(dir, "none.json"), new HashingEmbedder(8), silentLogger());
    expect(index.size).toBe(0);
  });

  it("warns and opens an empty index when the file is corrupt", async () => {
    const path = join(dir, "memory-index.json");
    writeFileSync(path, "{ truncated");
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");

    const index = await VectorIndex.open(path, new HashingEmbedder(8), logger);

    expect(index.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    // The next persist replaces the corrupt file
    await index.insert({ id: "fresh", summaryText: "fresh start", insertedAt: 0 });
    await index.persist();
    expect(parseSnapshot(JSON.parse(readFileSync(path, "utf-8"))).entries.map((e) => e.id)).toEqual([
      "fresh",
    ]);
  });
});

describe("snapshot validation", () => {
  it("rejects vectors of the wrong length and duplicate ids", () => {
    expect(() =>
      parseSnapshot({
        version: 1,
        dimension: 2,
        entries: [
          { id: "a", vector: [1], summaryText: "", insertedAt: 0 },
          { id: "a", vector: [1, 0], summaryText: "", insertedAt: 0 },
        ],
      }),
    ).toThrow(
      'invalid memory snapshot: entries.0.vector: expected 2 components, got 1; entries.1.id: duplicate id "a"',
    );
  });

  it("rejects an unknown version", () => {
    expect(() => parseSnapshot({ version: 2, dimension: 2, entries: [] })).toThrow(IndexCorruption);
  });

  it("returns null for a missing file and throws on invalid JSON", async () => {
    const dir = mkdtempSync(join(tmpdir(), "sentinel-snapshot-"));
    try {
      expect(await readSnapshotFile(join(dir, "missing.json"))).toBeNull();
      writeFileSync(join(dir, "bad.json"), "not json");
      await expect(readSnapshotFile(join(dir, "bad.json"))).rejects.toBeInstanceOf(IndexCorruption);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
