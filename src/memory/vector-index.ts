import type { Logger } from "../logging/logger.js";
import { Mutex } from "../utils/concurrency.js";
import { errorMessage, IndexCorruption } from "../utils/errors.js";
import { cosineSimilarity, type Embedder, type Vector } from "./embedder.js";
import {
  parseSnapshot,
  readSnapshotFile,
  SNAPSHOT_VERSION,
  writeSnapshotFile,
  type MemorySnapshot,
} from "./snapshot-file.js";

export interface MemoryRecord {
  readonly id: string;
  readonly vector: Vector;
  readonly summaryText: string;
  readonly insertedAt: number;
}

export interface MemoryInput {
  readonly id: string;
  readonly summaryText: string;
  readonly insertedAt?: number;
}

export interface MemoryHit {
  readonly record: MemoryRecord;
  readonly similarity: number;
}

export interface VectorIndexOptions {
  /** Where persist() writes the snapshot. Without one, persist() only returns it. */
  readonly snapshotPath?: string;
}

/**
 * Flat exact nearest-neighbor index. Writers serialize on a mutex and
 * publish a new frozen entry array in one assignment, so readers never see
 * a partial insert.
 */
export class VectorIndex {
  private entries: readonly MemoryRecord[] = Object.freeze([]);
  private readonly ids = new Set<string>();
  private readonly writeLock = new Mutex();

  constructor(
    readonly embedder: Embedder,
    private readonly options: VectorIndexOptions = {},
  ) {}

  get dimension(): number {
    return this.embedder.dimension;
  }

  get size(): number {
    return this.entries.length;
  }

  has(id: string): boolean {
    return this.ids.has(id);
  }

  /** Embed and append. Returns false when the id is already stored. */
  insert(input: MemoryInput): Promise<boolean> {
    return this.writeLock.runExclusive(() => {
      if (this.ids.has(input.id)) return false;

      const record: MemoryRecord = Object.freeze({
        id: input.id,
        vector: Object.freeze([...this.embedder.embed(input.summaryText)]),
        summaryText: input.summaryText,
        insertedAt: input.insertedAt ?? Date.now(),
      });
      this.ids.add(record.id);
      this.entries = Object.freeze([...this.entries, record]);
      return true;
    });
  }

  /** Top-k by cosine similarity; equal similarities keep insertion order. */
  query(vector: Vector, k: number): MemoryHit[] {
    if (vector.length !== this.dimension) {
      throw new RangeError(
        `query vector has ${vector.length} components, index dimension is ${this.dimension}`,
      );
    }
    const limit = Math.floor(k);
    if (!(limit > 0)) return [];

    const snapshot = this.entries;
    return snapshot
      .map((record, position) => ({
        record,
        similarity: cosineSimilarity(vector, record.vector),
        position,
      }))
      .sort((a, b) => b.similarity - a.similarity || a.position - b.position)
      .slice(0, limit)
      .map(({ record, similarity }) => ({ record, similarity }));
  }

  search(text: string, k: number): MemoryHit[] {
    return this.query(this.embedder.embed(text), k);
  }

  /** Snapshot in insertion order, written to the snapshot file when one is configured. */
  persist(): Promise<MemorySnapshot> {
    return this.writeLock.runExclusive(async () => {
      const snapshot: MemorySnapshot = {
        version: SNAPSHOT_VERSION,
        dimension: this.dimension,
        entries: this.entries.map((entry) => ({
          id: entry.id,
          vector: [...entry.vector],
          summaryText: entry.summaryText,
          insertedAt: entry.insertedAt,
        })),
      };
      if (this.options.snapshotPath) {
        await writeSnapshotFile(this.options.snapshotPath, snapshot);
      }
      return snapshot;
    });
  }

  /** Rebuild from a snapshot. Throws IndexCorruption when it is invalid. */
  static load(raw: unknown, embedder: Embedder, options?: VectorIndexOptions): VectorIndex {
    const snapshot = parseSnapshot(raw);
    if (snapshot.dimension !== embedder.dimension) {
      throw new IndexCorruption(
        `memory snapshot dimension ${snapshot.dimension} does not match embedder dimension ${embedder.dimension}`,
      );
    }

    const index = new VectorIndex(embedder, options);
    const records = snapshot.entries.map((entry) =>
      Object.freeze({
        id: entry.id,
        vector: Object.freeze([...entry.vector]),
        summaryText: entry.summaryText,
        insertedAt: entry.insertedAt,
      }),
    );
    for (const record of records) index.ids.add(record.id);
    index.entries = Object.freeze(records);
    return index;
  }

  /** Load from disk; a missing or corrupt file yields an empty index. */
  static async open(
    filePath: string,
    embedder: Embedder,
    logger: Logger,
  ): Promise<VectorIndex> {
    const options = { snapshotPath: filePath };
    try {
      const snapshot = await readSnapshotFile(filePath);
      if (!snapshot) {
        logger.debug({ path: filePath }, "No memory snapshot; starting empty");
        return new VectorIndex(embedder, options);
      }
      const index = VectorIndex.load(snapshot, embedder, options);
      logger.info({ path: filePath, records: index.size }, "Memory index loaded");
      return index;
    } catch (err) {
      logger.warn(
        { err, path: filePath, reason: errorMessage(err) },
        "Memory snapshot corrupt; starting with an empty index",
      );
      return new VectorIndex(embedder, options);
    }
  }
}
