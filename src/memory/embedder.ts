export type Vector = readonly number[];

export interface Embedder {
  readonly dimension: number;
  embed(text: string): Vector;
}

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "been", "by", "for", "from", "has",
  "have", "in", "is", "it", "of", "on", "or", "that", "the", "this", "to", "was",
  "were", "what", "with",
]);

function fnv1a(token: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[\p{L}\p{N}_]+/gu) ?? []).filter(
    (token) => !STOPWORDS.has(token),
  );
}

/**
 * Feature-hashing embedder. Tokens land in signed buckets with sublinear
 * term frequency; the result is L2-normalized. Identical text always gives
 * an identical vector, and empty text gives the zero vector.
 */
export class HashingEmbedder implements Embedder {
  constructor(readonly dimension = 256) {
    if (!Number.isInteger(dimension) || dimension < 1) {
      throw new RangeError(`Embedding dimension must be a positive integer (got ${dimension})`);
    }
  }

  embed(text: string): Vector {
    const counts = new Map<string, number>();
    for (const token of tokenize(text)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }

    const vector = new Array<number>(this.dimension).fill(0);
    for (const [token, count] of counts) {
      const hash = fnv1a(token);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimension] += sign * (1 + Math.log(count));
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    return norm === 0 ? vector : vector.map((v) => v / norm);
  }
}

export function cosineSimilarity(a: Vector, b: Vector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
