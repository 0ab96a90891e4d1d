/**
 * Product text vectorizer (feature hashing).
 *
 * Each lowercase token of the text adds 1 to bucket fnv1a32(salt + ':' + token) mod dimensions.
 * The salt is part of the recorded algorithm: vectors built with different salts are not comparable.
 */

import { requirePositiveInteger } from '../errors';
import { Product } from '../types';

export const DEFAULT_DIMENSIONS = 128;
export const DEFAULT_SALT = 'catalog-v1';

export interface TextVectorizer {
  readonly dimensions: number;
  vectorize(text: string): number[];
}

/**
 * FNV-1a over UTF-16 code units, as an unsigned 32-bit integer.
 */
export function fnv1a32(input: string): number {
  let h = 2166136261;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

export function productText(product: Pick<Product, 'name' | 'description' | 'tags'>): string {
  return [product.name, product.description, ...product.tags].join(' ');
}

export class FeatureVectorizer implements TextVectorizer {
  readonly dimensions: number;
  private readonly salt: string;

  constructor(options: { dimensions?: number; salt?: string } = {}) {
    this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS;
    this.salt = options.salt ?? DEFAULT_SALT;
    requirePositiveInteger(this.dimensions, 'dimensions');
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a32(`${this.salt}:${token}`) % this.dimensions] += 1;
    }
    return vector;
  }
}
