import { InvalidArgumentError, NotFoundError, requirePositiveInteger } from '../errors';
import { ProductText } from '../types';
import { TextVectorizer } from './featureVectorizer';

export interface ProductVector {
  productId: string;
  vector: number[];
}

interface IndexedVector extends ProductVector {
  norm: number;
}

interface IndexSnapshot {
  entries: readonly IndexedVector[];
  positions: ReadonlyMap<string, number>;
}

const EMPTY_SNAPSHOT: IndexSnapshot = { entries: [], positions: new Map() };

function norm(vec: number[]): number {
  let sum = 0;
  for (const value of vec) {
    sum += value * value;
  }
  return Math.sqrt(sum);
}

function dot(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new InvalidArgumentError('Vectors must have the same length');
  }

  let product = 0;
  for (let i = 0; i < vec1.length; i++) {
    product += vec1[i] * vec2[i];
  }
  return product;
}

/**
 * Cosine similarity; 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  const dotProduct = dot(vec1, vec2);
  const magnitude1 = norm(vec1);
  const magnitude2 = norm(vec2);

  if (magnitude1 === 0 || magnitude2 === 0) {
    return 0;
  }

  return dotProduct / (magnitude1 * magnitude2);
}

/**
 * In-memory product vector index.
 *
 * Readers always see one complete snapshot: rebuild() and upsert() assemble a new
 * snapshot and publish it with a single reference assignment.
 */
export class SimilarityIndex {
  private snapshot: IndexSnapshot = EMPTY_SNAPSHOT;

  constructor(private readonly vectorizer: TextVectorizer) {}

  get size(): number {
    return this.snapshot.entries.length;
  }

  has(productId: string): boolean {
    return this.snapshot.positions.has(productId);
  }

  getVector(productId: string): number[] {
    const position = this.snapshot.positions.get(productId);
    if (position === undefined) {
      throw new NotFoundError(`Product ${productId} is not in the similarity index`);
    }
    return [...this.snapshot.entries[position].vector];
  }

  /**
   * Replaces every vector. A repeated product id keeps its first position and its last text.
   */
  rebuild(products: readonly ProductText[]): void {
    const entries: IndexedVector[] = [];
    const positions = new Map<string, number>();

    for (const product of products) {
      const entry = this.toEntry(product);
      const existing = positions.get(product.productId);
      if (existing === undefined) {
        positions.set(product.productId, entries.length);
        entries.push(entry);
      } else {
        entries[existing] = entry;
      }
    }

    this.snapshot = { entries, positions };
  }

  /**
   * Adds or refreshes a single product vector.
   */
  upsert(product: ProductText): void {
    const current = this.snapshot;
    const entry = this.toEntry(product);
    const entries = [...current.entries];
    const positions = new Map(current.positions);

    const existing = positions.get(product.productId);
    if (existing === undefined) {
      positions.set(product.productId, entries.length);
      entries.push(entry);
    } else {
      entries[existing] = entry;
    }

    this.snapshot = { entries, positions };
  }

  /**
   * Up to topN product ids by descending cosine similarity, excluding the query itself.
   * An empty index answers []; an id missing from a non-empty index is a NotFoundError.
   */
  nearestNeighbors(productId: string, topN: number): string[] {
    requirePositiveInteger(topN, 'topN');

    const { entries, positions } = this.snapshot;
    if (entries.length === 0) return [];

    const position = positions.get(productId);
    if (position === undefined) {
      throw new NotFoundError(`Product ${productId} is not in the similarity index`);
    }

    const query = entries[position];
    const scored: { productId: string; similarity: number }[] = [];
    for (const entry of entries) {
      if (entry.productId === productId) continue;
      const similarity =
        query.norm === 0 || entry.norm === 0
          ? 0
          : dot(query.vector, entry.vector) / (query.norm * entry.norm);
      scored.push({ productId: entry.productId, similarity });
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order
    scored.sort((a, b) => b.similarity - a.similarity);

    return scored.slice(0, topN).map((result) => result.productId);
  }

  private toEntry(product: ProductText): IndexedVector {
    const vector = this.vectorizer.vectorize(product.text);
    if (vector.length !== this.vectorizer.dimensions || !vector.every(Number.isFinite)) {
      throw new InvalidArgumentError(`Vectorizer produced an invalid vector for ${product.productId}`);
    }
    return { productId: product.productId, vector, norm: norm(vector) };
  }
}
