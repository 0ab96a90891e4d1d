import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { RecommendationEngine } from './recommendationEngine';
import { TextVectorizer } from '../catalog/featureVectorizer';
import { SimilarityIndex } from '../catalog/similarityIndex';
import { MemoryRecordStore } from '../store/memoryRecordStore';
import { InvalidArgumentError } from '../errors';

class LiteralVectorizer implements TextVectorizer {
  readonly dimensions = 3;

  vectorize(text: string): number[] {
    return text.split(',').map(Number);
  }
}

// S1 and S2 are seeds; N1 leans to S1, N3 to S2, N2 sits between, F is orthogonal to both
const CATALOG = [
  { productId: 'S1', text: '1,0,0', popularityScore: 1 },
  { productId: 'S2', text: '0,1,0', popularityScore: 2 },
  { productId: 'N1', text: '1,0.1,0', popularityScore: 3 },
  { productId: 'N2', text: '0.7,0.7,0', popularityScore: 4 },
  { productId: 'N3', text: '0,1,0.1', popularityScore: 5 },
  { productId: 'F', text: '0,0,1', popularityScore: 6 },
];

describe('RecommendationEngine', () => {
  let store: MemoryRecordStore;
  let index: SimilarityIndex;
  let engine: RecommendationEngine;

  const view = (customerId: string, productId: string, timestamp: string) =>
    store.recordInteraction({ customerId, productId, type: 'view', timestamp, durationSeconds: 0 });

  const buy = (customerId: string, productId: string) =>
    store.recordPurchase({
      customerId,
      productId,
      quantity: 1,
      amount: 10,
      timestamp: '2024-01-01T00:00:00.000Z',
    });

  beforeEach(async () => {
    store = new MemoryRecordStore();
    for (const { productId, popularityScore } of CATALOG) {
      await store.addProduct({
        productId,
        name: productId,
        category: 'Test',
        price: 1,
        description: '',
        tags: [],
        popularityScore,
      });
    }
    index = new SimilarityIndex(new LiteralVectorizer());
    index.rebuild(CATALOG.map(({ productId, text }) => ({ productId, text })));
    engine = new RecommendationEngine(store, index);
  });

  describe('personalized tier', () => {
    beforeEach(async () => {
      await view('C1', 'S1', '2024-01-01T10:00:00.000Z');
      await view('C1', 'S2', '2024-01-01T11:00:00.000Z');
    });

    it('returns the de-duplicated union of the neighbor lookups', async () => {
      const expected = [
        ...new Set([...index.nearestNeighbors('S2', 3), ...index.nearestNeighbors('S1', 3)]),
      ].slice(0, 3);

      const result = await engine.recommend('C1', 3);
      assert.equal(result.strategy, 'personalized');
      assert.deepEqual(result.productIds, expected);
      assert.deepEqual(result.productIds, ['N3', 'N2', 'N1']);
    });

    it('truncates the union to topN', async () => {
      const result = await engine.recommend('C1', 2);
      assert.deepEqual(result.productIds, ['N3', 'N2']);
    });

    it('only uses the most recent interactions', async () => {
      const recentOnly = new RecommendationEngine(store, index, { recentInteractionLimit: 1 });
      const result = await recentOnly.recommend('C1', 4);
      assert.deepEqual(result.productIds, index.nearestNeighbors('S2', 4));
    });

    it('skips interacted products that are no longer indexed', async () => {
      await view('C1', 'GONE', '2024-01-01T12:00:00.000Z');
      const result = await engine.recommend('C1', 3);
      assert.deepEqual(result.productIds, ['N3', 'N2', 'N1']);
    });

    it('looks up a product seen repeatedly only once', async () => {
      await view('C2', 'S1', '2024-01-01T10:00:00.000Z');
      await view('C2', 'S1', '2024-01-01T10:05:00.000Z');
      const result = await engine.recommend('C2', 2);
      assert.deepEqual(result.productIds, ['N1', 'N2']);
    });
  });

  describe('segment tier', () => {
    beforeEach(async () => {
      await store.upsertCustomer('C3', { name: 'Segment Member' });
      await store.setCustomerSegments(
        new Map([
          ['C3', 'segment_1'],
          ['B1', 'segment_1'],
          ['B2', 'segment_0'],
        ])
      );
      await buy('B1', 'N2');
      await buy('B1', 'F');
      await buy('B1', 'N2');
      await buy('B2', 'S1');
    });

    it('ranks purchases of customers sharing the segment', async () => {
      const result = await engine.recommend('C3', 5);
      assert.deepEqual(result, { customerId: 'C3', strategy: 'segment', productIds: ['N2', 'F'] });
    });

    it('is used when no interacted product is indexed', async () => {
      await view('C3', 'GONE', '2024-01-01T12:00:00.000Z');
      const result = await engine.recommend('C3', 1);
      assert.deepEqual(result, { customerId: 'C3', strategy: 'segment', productIds: ['N2'] });
    });
  });

  describe('popularity tier', () => {
    it('serves a known customer without history or segment', async () => {
      await store.upsertCustomer('C4', { name: 'New Customer' });
      const result = await engine.recommend('C4', 3);
      assert.deepEqual(result, { customerId: 'C4', strategy: 'popularity', productIds: ['F', 'N3', 'N2'] });
    });

    it('serves a customer whose segment has no purchases', async () => {
      await store.setCustomerSegments(new Map([['C5', 'segment_3']]));
      const result = await engine.recommend('C5', 2);
      assert.deepEqual(result.productIds, ['F', 'N3']);
      assert.equal(result.strategy, 'popularity');
    });

    it('serves cold-start customers exactly the popularity ranking', async () => {
      await store.setCustomerSegments(new Map([['B1', 'segment_0']]));
      await buy('B1', 'S1');

      const result = await engine.recommend('never-seen', 4);
      assert.equal(result.strategy, 'popularity');
      assert.deepEqual(result.productIds, await store.getProductsByPopularity(4));
      assert.deepEqual(result.productIds, ['F', 'N3', 'N2', 'N1']);
    });

    it('returns nothing for an empty catalog', async () => {
      const empty = new MemoryRecordStore();
      const result = await new RecommendationEngine(empty, new SimilarityIndex(new LiteralVectorizer())).recommend('x', 3);
      assert.deepEqual(result, { customerId: 'x', strategy: 'popularity', productIds: [] });
    });
  });

  it('rejects a non-positive topN', async () => {
    await assert.rejects(engine.recommend('C1', 0), InvalidArgumentError);
    await assert.rejects(engine.recommend('C1', 2.5), InvalidArgumentError);
  });

  it('rejects a non-positive interaction limit', () => {
    assert.throws(
      () => new RecommendationEngine(store, index, { recentInteractionLimit: 0 }),
      InvalidArgumentError
    );
  });
});
