/**
 * Firestore-backed record store
 *
 * Collections: products/{productId}, customers/{customerId}, interactions/{auto}, purchases/{auto}.
 * Timestamps are stored as ISO-8601 UTC strings so they order lexicographically.
 */

import * as admin from 'firebase-admin';
import { firestoreToJSON } from '../config/firestore';
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
import { newCustomerProfile, rankByCount, RecordStore } from './recordStore';
import { countDistinctMonths, nowIso } from './timeHelpers';

// Firestore limits: 30 values per `in` filter, 500 writes per batch
const IN_QUERY_CHUNK = 30;
const BATCH_WRITE_LIMIT = 500;

type Fields = Record<string, unknown>;

function toFields(data: unknown): Fields {
  const json = firestoreToJSON(data);
  return typeof json === 'object' && json !== null && !Array.isArray(json)
    ? Object.fromEntries(Object.entries(json))
    : {};
}

function str(fields: Fields, key: string, fallback = ''): string {
  const value = fields[key];
  return typeof value === 'string' ? value : fallback;
}

function num(fields: Fields, key: string, fallback = 0): number {
  const value = fields[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function nullableStr(fields: Fields, key: string): string | null {
  const value = fields[key];
  return typeof value === 'string' ? value : null;
}

function nullableNum(fields: Fields, key: string): number | null {
  const value = fields[key];
  return typeof value === 'number' ? value : null;
}

function strArray(fields: Fields, key: string): string[] {
  const value = fields[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function strRecord(fields: Fields, key: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [k, v] of Object.entries(toFields(fields[key]))) {
    if (typeof v === 'string') result[k] = v;
  }
  return result;
}

function parseProduct(productId: string, data: unknown): Product {
  const fields = toFields(data);
  return {
    productId,
    name: str(fields, 'name'),
    category: str(fields, 'category'),
    price: num(fields, 'price'),
    description: str(fields, 'description'),
    tags: strArray(fields, 'tags'),
    popularityScore: num(fields, 'popularityScore'),
  };
}

function parseCustomer(customerId: string, data: unknown): CustomerProfile {
  const fields = toFields(data);
  const createdAt = str(fields, 'createdAt');
  return {
    customerId,
    name: str(fields, 'name'),
    age: nullableNum(fields, 'age'),
    gender: nullableStr(fields, 'gender'),
    location: nullableStr(fields, 'location'),
    segment: nullableStr(fields, 'segment'),
    preferences: strRecord(fields, 'preferences'),
    lastActivity: str(fields, 'lastActivity', createdAt),
    createdAt,
    updatedAt: str(fields, 'updatedAt', createdAt),
  };
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class FirestoreRecordStore implements RecordStore {
  constructor(private readonly db: admin.firestore.Firestore) {}

  private get products() {
    return this.db.collection('products');
  }

  private get customers() {
    return this.db.collection('customers');
  }

  private get interactions() {
    return this.db.collection('interactions');
  }

  private get purchases() {
    return this.db.collection('purchases');
  }

  async addProduct(product: Product): Promise<void> {
    await this.products.doc(product.productId).set({
      ...product,
      updatedAt: nowIso(),
    });
  }

  async getProduct(productId: string): Promise<Product | null> {
    const snap = await this.products.doc(productId).get();
    if (!snap.exists) return null;
    return parseProduct(snap.id, snap.data());
  }

  async getProductTexts(): Promise<ProductText[]> {
    const snap = await this.products.select('name', 'description', 'tags').get();
    return snap.docs.map((doc) => ({
      productId: doc.id,
      text: productText(parseProduct(doc.id, doc.data())),
    }));
  }

  async getProductsByPopularity(topN: number): Promise<string[]> {
    requirePositiveInteger(topN, 'topN');
    const snap = await this.products
      .orderBy('popularityScore', 'desc')
      .orderBy(admin.firestore.FieldPath.documentId(), 'asc')
      .limit(topN)
      .select()
      .get();
    return snap.docs.map((doc) => doc.id);
  }

  async getCustomer(customerId: string): Promise<CustomerProfile | null> {
    const snap = await this.customers.doc(customerId).get();
    if (!snap.exists) return null;
    return parseCustomer(snap.id, snap.data());
  }

  async upsertCustomer(customerId: string, updates: CustomerProfileUpdate): Promise<CustomerProfile> {
    const now = nowIso();
    const existing = await this.getCustomer(customerId);
    const base = existing ?? newCustomerProfile(customerId, now);

    const profile: CustomerProfile = {
      ...base,
      ...updates,
      customerId,
      lastActivity: now,
      updatedAt: now,
    };
    await this.customers.doc(customerId).set(profile);
    return profile;
  }

  async listCustomerIds(): Promise<string[]> {
    const refs = await this.customers.listDocuments();
    return refs.map((ref) => ref.id);
  }

  async recordInteraction(interaction: Interaction): Promise<void> {
    await this.touchCustomer(interaction.customerId);
    await this.interactions.add({
      ...interaction,
      timestamp: new Date(interaction.timestamp).toISOString(),
    });
  }

  async recordPurchase(purchase: Purchase): Promise<void> {
    await this.touchCustomer(purchase.customerId);
    await this.purchases.add({
      ...purchase,
      timestamp: new Date(purchase.timestamp).toISOString(),
    });
  }

  async getCustomerInteractions(
    customerId: string,
    limit: number,
    mostRecentFirst = true
  ): Promise<string[]> {
    requirePositiveInteger(limit, 'limit');
    const snap = await this.interactions
      .where('customerId', '==', customerId)
      .orderBy('timestamp', mostRecentFirst ? 'desc' : 'asc')
      .limit(limit)
      .select('productId')
      .get();
    return snap.docs.map((doc) => str(toFields(doc.data()), 'productId'));
  }

  async countCustomerInteractions(customerId: string): Promise<number> {
    const snap = await this.interactions.where('customerId', '==', customerId).count().get();
    return snap.data().count;
  }

  async getCustomerPurchaseStats(customerId: string): Promise<PurchaseStats> {
    const snap = await this.purchases
      .where('customerId', '==', customerId)
      .select('amount', 'timestamp')
      .get();

    const rows = snap.docs.map((doc) => toFields(doc.data()));
    return {
      purchaseCount: rows.length,
      totalSpent: rows.reduce((sum, row) => sum + num(row, 'amount'), 0),
      activeMonths: countDistinctMonths(rows.map((row) => str(row, 'timestamp'))),
    };
  }

  async getCustomerSegment(customerId: string): Promise<string | null> {
    const snap = await this.customers.doc(customerId).get();
    if (!snap.exists) return null;
    return nullableStr(toFields(snap.data()), 'segment');
  }

  async setCustomerSegments(assignment: SegmentAssignment): Promise<void> {
    const now = nowIso();
    for (const entries of chunk([...assignment.entries()], BATCH_WRITE_LIMIT)) {
      const batch = this.db.batch();
      for (const [customerId, segment] of entries) {
        batch.set(this.customers.doc(customerId), { segment, updatedAt: now }, { merge: true });
      }
      await batch.commit();
    }
  }

  async getSegmentPurchaseRanking(segment: string, topN: number): Promise<string[]> {
    requirePositiveInteger(topN, 'topN');
    const members = await this.customers.where('segment', '==', segment).select().get();
    const customerIds = members.docs.map((doc) => doc.id);

    const counts = new Map<string, number>();
    for (const ids of chunk(customerIds, IN_QUERY_CHUNK)) {
      const snap = await this.purchases.where('customerId', 'in', ids).select('productId').get();
      for (const doc of snap.docs) {
        const productId = str(toFields(doc.data()), 'productId');
        counts.set(productId, (counts.get(productId) ?? 0) + 1);
      }
    }
    return rankByCount(counts, topN);
  }

  private async touchCustomer(customerId: string): Promise<void> {
    const now = nowIso();
    const ref = this.customers.doc(customerId);
    const existing = await ref.get();

    if (!existing.exists) {
      await ref.set(newCustomerProfile(customerId, now));
      return;
    }
    await ref.set({ lastActivity: now, updatedAt: now }, { merge: true });
  }
}
