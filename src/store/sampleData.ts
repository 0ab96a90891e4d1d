import fs from 'fs/promises';
import path from 'path';
import { asBody, parseCustomerUpdate, parseInteraction, parseProduct, parsePurchase } from '../validation';
import { RecordStore } from './recordStore';

export const SAMPLE_DATA_PATH = path.join(process.cwd(), 'data', 'sample-catalog.json');

function list(value: unknown, name: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Sample data field "${name}" must be an array`);
  }
  return value;
}

function customerIdOf(value: unknown): string {
  const id = asBody(value).customerId;
  if (typeof id !== 'string' || id === '') {
    throw new Error('Sample data record is missing customerId');
  }
  return id;
}

/**
 * Loads products, customers, interactions and purchases from a JSON file into the store.
 */
export async function loadSampleData(store: RecordStore, filePath = SAMPLE_DATA_PATH): Promise<void> {
  const content = await fs.readFile(filePath, 'utf-8');
  const data = asBody(JSON.parse(content), 'sample data');

  const products = list(data.products, 'products');
  const customers = list(data.customers, 'customers');
  const interactions = list(data.interactions, 'interactions');
  const purchases = list(data.purchases, 'purchases');

  for (const product of products) {
    await store.addProduct(parseProduct(product));
  }
  for (const customer of customers) {
    await store.upsertCustomer(customerIdOf(customer), parseCustomerUpdate(customer));
  }
  for (const interaction of interactions) {
    await store.recordInteraction(parseInteraction(customerIdOf(interaction), interaction));
  }
  for (const purchase of purchases) {
    await store.recordPurchase(parsePurchase(customerIdOf(purchase), purchase));
  }

  console.log(`[sampleData] Loaded ${products.length} product(s), ${customers.length} customer(s)`, {
    interactions: interactions.length,
    purchases: purchases.length,
  });
}
