import { RecordStore } from '../store/recordStore';
import { CustomerFeature } from '../types';

/**
 * Aggregates interaction and purchase history into segmentation features.
 * A customer without records gets an all-zero feature.
 */
export class CustomerFeatureExtractor {
  constructor(private readonly store: RecordStore) {}

  async extract(customerId: string): Promise<CustomerFeature> {
    const [interactionCount, stats] = await Promise.all([
      this.store.countCustomerInteractions(customerId),
      this.store.getCustomerPurchaseStats(customerId),
    ]);

    return {
      customerId,
      interactionCount,
      purchaseCount: stats.purchaseCount,
      totalSpent: stats.totalSpent,
      activeMonths: stats.activeMonths,
    };
  }

  async extractAll(customerIds: readonly string[]): Promise<CustomerFeature[]> {
    const features: CustomerFeature[] = [];
    for (const customerId of customerIds) {
      features.push(await this.extract(customerId));
    }
    return features;
  }
}
