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

/**
 * Persistence boundary of the recommender. Implementations query by field values,
 * never by building query strings from caller input.
 */
export interface RecordStore {
  addProduct(product: Product): Promise<void>;
  getProduct(productId: string): Promise<Product | null>;
  getProductTexts(): Promise<ProductText[]>;
  /** Product ids by popularity score descending, ties by product id. */
  getProductsByPopularity(topN: number): Promise<string[]>;

  getCustomer(customerId: string): Promise<CustomerProfile | null>;
  upsertCustomer(customerId: string, updates: CustomerProfileUpdate): Promise<CustomerProfile>;
  listCustomerIds(): Promise<string[]>;

  /** Creates a bare profile for an unknown customer and refreshes lastActivity. */
  recordInteraction(interaction: Interaction): Promise<void>;
  /** Creates a bare profile for an unknown customer and refreshes lastActivity. */
  recordPurchase(purchase: Purchase): Promise<void>;

  /** Product ids of the customer's interactions, newest first unless mostRecentFirst is false. */
  getCustomerInteractions(
    customerId: string,
    limit: number,
    mostRecentFirst?: boolean
  ): Promise<string[]>;
  countCustomerInteractions(customerId: string): Promise<number>;
  getCustomerPurchaseStats(customerId: string): Promise<PurchaseStats>;

  getCustomerSegment(customerId: string): Promise<string | null>;
  setCustomerSegments(assignment: SegmentAssignment): Promise<void>;
  /** Products most often purchased by customers of the segment, ties by product id. */
  getSegmentPurchaseRanking(segment: string, topN: number): Promise<string[]>;
}

export function newCustomerProfile(customerId: string, now: string): CustomerProfile {
  return {
    customerId,
    name: '',
    age: null,
    gender: null,
    location: null,
    segment: null,
    preferences: {},
    lastActivity: now,
    createdAt: now,
    updatedAt: now,
  };
}

export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Orders product ids by count descending, then product id ascending.
 */
export function rankByCount(counts: Map<string, number>, topN: number): string[] {
  return [...counts.entries()]
    .sort(([idA, a], [idB, b]) => b - a || compareIds(idA, idB))
    .slice(0, topN)
    .map(([productId]) => productId);
}
