/**
 * Recommendation waterfall: personalized -> segment -> popularity.
 * Each tier runs only when the previous one produced nothing.
 */

import { requirePositiveInteger } from '../errors';
import { SimilarityIndex } from '../catalog/similarityIndex';
import { RecordStore } from '../store/recordStore';
import { RecommendationResult } from '../types';

export const DEFAULT_RECENT_INTERACTION_LIMIT = 3;

export interface RecommendationEngineOptions {
  recentInteractionLimit?: number;
}

export class RecommendationEngine {
  private readonly recentInteractionLimit: number;

  constructor(
    private readonly store: RecordStore,
    private readonly index: SimilarityIndex,
    options: RecommendationEngineOptions = {}
  ) {
    this.recentInteractionLimit = options.recentInteractionLimit ?? DEFAULT_RECENT_INTERACTION_LIMIT;
    requirePositiveInteger(this.recentInteractionLimit, 'recentInteractionLimit');
  }

  async recommend(customerId: string, topN: number): Promise<RecommendationResult> {
    requirePositiveInteger(topN, 'topN');

    const profile = await this.store.getCustomer(customerId);
    if (profile) {
      const personalized = await this.personalized(customerId, topN);
      if (personalized.length > 0) {
        return { customerId, strategy: 'personalized', productIds: personalized };
      }

      const segment = await this.segmentBased(customerId, topN);
      if (segment.length > 0) {
        return { customerId, strategy: 'segment', productIds: segment };
      }
    }

    // Cold start lands here directly
    const popular = await this.store.getProductsByPopularity(topN);
    return { customerId, strategy: 'popularity', productIds: popular };
  }

  /**
   * Union of the neighbors of the customer's most recent interactions, first-seen order.
   */
  async personalized(customerId: string, topN: number): Promise<string[]> {
    const recent = await this.store.getCustomerInteractions(
      customerId,
      this.recentInteractionLimit,
      true
    );

    const seen = new Set<string>();
    const results: string[] = [];
    for (const productId of new Set(recent)) {
      if (!this.index.has(productId)) {
        console.warn('[recommend] Interacted product missing from index, skipping', {
          customerId,
          productId,
        });
        continue;
      }

      for (const similar of this.index.nearestNeighbors(productId, topN)) {
        if (!seen.has(similar)) {
          seen.add(similar);
          results.push(similar);
        }
      }
    }

    return results.slice(0, topN);
  }

  async segmentBased(customerId: string, topN: number): Promise<string[]> {
    const segment = await this.store.getCustomerSegment(customerId);
    if (!segment) return [];
    return this.store.getSegmentPurchaseRanking(segment, topN);
  }
}
