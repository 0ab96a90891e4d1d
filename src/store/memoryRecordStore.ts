import { requirePositiveInteger } from '../errors';
import { productText } from '../catalog/featureVectorizer';
import {
  CustomerProfile,
  CustomerProfileUpdate,
  Interaction,
  Product,
  ProductText,
  Purchase,
  PurchaseStats,
  SegmentAssignment,
} from '../types';
import { compareIds, newCustomerProfile, rankByCount, RecordStore } from './recordStore';
import { countDistinctMonths, nowIso } from './timeHelpers';

/**
 * Map-backed record store. Used by the tests and by RECORD_STORE=memory.
 */
export class MemoryRecordStore implements RecordStore {
  private readonly products = new Map<string, Product>();
  private readonly customers = new Map<string, CustomerProfile>();
  private readonly interactions: Interaction[] = [];
  private readonly purchases: Purchase[] = [];

  async addProduct(product: Product): Promise<void> {
    this.products.set(product.productId, { ...product, tags: [...product.tags] });
  }

  async getProduct(productId: string): Promise<Product | null> {
    const product = this.products.get(productId);
    return product ? { ...product, tags: [...product.tags] } : null;
  }

  async getProductTexts(): Promise<ProductText[]> {
    return [...this.products.values()].map((product) => ({
      productId: product.productId,
      text: productText(product),
    }));
  }

  async getProductsByPopularity(topN: number): Promise<string[]> {
    requirePositiveInteger(topN, 'topN');
    return [...this.products.values()]
      .sort((a, b) => b.popularityScore - a.popularityScore || compareIds(a.productId, b.productId))
      .slice(0, topN)
      .map((product) => product.productId);
  }

  async getCustomer(customerId: string): Promise<CustomerProfile | null> {
    const profile = this.customers.get(customerId);
    return profile ? { ...profile, preferences: { ...profile.preferences } } : null;
  }

  async upsertCustomer(customerId: string, updates: CustomerProfileUpdate): Promise<CustomerProfile> {
    const now = nowIso();
    const base = this.customers.get(customerId) ?? newCustomerProfile(customerId, now);
    const profile: CustomerProfile = {
      ...base,
      ...updates,
      preferences: { ...(updates.preferences ?? base.preferences) },
      customerId,
      lastActivity: now,
      updatedAt: now,
    };
    this.customers.set(customerId, profile);
    return { ...profile, preferences: { ...profile.preferences } };
  }

  async listCustomerIds(): Promise<string[]> {
    return [...this.customers.keys()];
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    this.touchCustomer(interaction.customerId);
    this.interactions.push({ ...interaction });
  }

  async recordPurchase(purchase: Purchase): Promise<void> {
    this.touchCustomer(purchase.customerId);
    this.purchases.push({ ...purchase });
  }

  async getCustomerInteractions(
    customerId: string,
    limit: number,
    mostRecentFirst = true
  ): Promise<string[]> {
    requirePositiveInteger(limit, 'limit');
    const own = this.interactions.filter((i) => i.customerId === customerId);
    const ordered = mostRecentFirst
      ? own.reverse().sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
      : own.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    return ordered.slice(0, limit).map((i) => i.productId);
  }

  async countCustomerInteractions(customerId: string): Promise<number> {
    return this.interactions.filter((i) => i.customerId === customerId).length;
  }

  async getCustomerPurchaseStats(customerId: string): Promise<PurchaseStats> {
    const own = this.purchases.filter((p) => p.customerId === customerId);
    return {
      purchaseCount: own.length,
      totalSpent: own.reduce((sum, p) => sum + p.amount, 0),
      activeMonths: countDistinctMonths(own.map((p) => p.timestamp)),
    };
  }

  async getCustomerSegment(customerId: string): Promise<string | null> {
    return this.customers.get(customerId)?.segment ?? null;
  }

  async setCustomerSegments(assignment: SegmentAssignment): Promise<void> {
    const now = nowIso();
    for (const [customerId, segment] of assignment) {
      const base = this.customers.get(customerId) ?? newCustomerProfile(customerId, now);
      this.customers.set(customerId, { ...base, segment, updatedAt: now });
    }
  }

  async getSegmentPurchaseRanking(segment: string, topN: number): Promise<string[]> {
    requirePositiveInteger(topN, 'topN');
    const members = new Set(
      [...this.customers.values()].filter((c) => c.segment === segment).map((c) => c.customerId)
    );

    const counts = new Map<string, number>();
    for (const purchase of this.purchases) {
      if (members.has(purchase.customerId)) {
        counts.set(purchase.productId, (counts.get(purchase.productId) ?? 0) + 1);
      }
    }
    return rankByCount(counts, topN);
  }

  private touchCustomer(customerId: string): void {
    const now = nowIso();
    const base = this.customers.get(customerId) ?? newCustomerProfile(customerId, now);
    this.customers.set(customerId, { ...base, lastActivity: now, updatedAt: now });
  }
}
