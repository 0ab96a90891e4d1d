/**
 * Request body parsing. Every parser throws InvalidArgumentError naming the offending field.
 */

import { InvalidArgumentError } from './errors';
import { isValidTimestamp, nowIso } from './store/timeHelpers';
import {
  CustomerProfileUpdate,
  INTERACTION_TYPES,
  Interaction,
  InteractionType,
  Product,
  Purchase,
} from './types';

type Body = Record<string, unknown>;

export function asBody(value: unknown, name = 'body'): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new InvalidArgumentError(`${name} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new InvalidArgumentError(`${field} is required`);
  }
  return value.trim();
}

function optionalString(body: Body, field: string, fallback: string): string {
  const value = body[field];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${field} must be a string`);
  }
  return value;
}

function nullableString(body: Body, field: string): string | null {
  const value = body[field];
  if (value === null) return null;
  if (typeof value !== 'string') {
    throw new InvalidArgumentError(`${field} must be a string or null`);
  }
  return value;
}

function optionalNumber(
  body: Body,
  field: string,
  fallback: number,
  check: (value: number) => boolean = Number.isFinite
): number {
  const raw = body[field];
  if (raw === undefined) return fallback;
  const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isFinite(value) || !check(value)) {
    throw new InvalidArgumentError(`Invalid number for field: ${field}`);
  }
  return value;
}

function requiredNumber(body: Body, field: string, check: (value: number) => boolean): number {
  if (body[field] === undefined || body[field] === null) {
    throw new InvalidArgumentError(`${field} is required`);
  }
  return optionalNumber(body, field, 0, check);
}

function timestamp(body: Body): string {
  const value = body.timestamp;
  if (value === undefined) return nowIso();
  if (typeof value !== 'string' || !isValidTimestamp(value)) {
    throw new InvalidArgumentError('timestamp must be an ISO-8601 string');
  }
  return new Date(value).toISOString();
}

function isInteractionType(value: unknown): value is InteractionType {
  return INTERACTION_TYPES.some((type) => type === value);
}

const nonNegative = (value: number) => value >= 0;

export function parseProduct(value: unknown): Product {
  const body = asBody(value);

  const tags = body.tags ?? [];
  if (!Array.isArray(tags) || !tags.every((tag): tag is string => typeof tag === 'string')) {
    throw new InvalidArgumentError('tags must be an array of strings');
  }

  return {
    productId: requiredString(body, 'productId'),
    name: requiredString(body, 'name'),
    category: optionalString(body, 'category', ''),
    price: optionalNumber(body, 'price', 0, nonNegative),
    description: optionalString(body, 'description', ''),
    tags,
    popularityScore: optionalNumber(body, 'popularityScore', 0),
  };
}

/**
 * Returns only the fields present in the body; an empty result is rejected.
 */
export function parseCustomerUpdate(value: unknown): CustomerProfileUpdate {
  const body = asBody(value);
  const updates: CustomerProfileUpdate = {};

  if (body.name !== undefined) updates.name = optionalString(body, 'name', '');
  if (body.gender !== undefined) updates.gender = nullableString(body, 'gender');
  if (body.location !== undefined) updates.location = nullableString(body, 'location');
  if (body.age !== undefined) {
    updates.age =
      body.age === null
        ? null
        : optionalNumber(body, 'age', 0, (age) => Number.isInteger(age) && age >= 0);
  }
  if (body.preferences !== undefined) {
    const preferences: Record<string, string> = {};
    for (const [key, pref] of Object.entries(asBody(body.preferences, 'preferences'))) {
      if (typeof pref !== 'string') {
        throw new InvalidArgumentError(`preferences.${key} must be a string`);
      }
      preferences[key] = pref;
    }
    updates.preferences = preferences;
  }

  if (Object.keys(updates).length === 0) {
    throw new InvalidArgumentError('No updatable fields provided');
  }
  return updates;
}

export function parseInteraction(customerId: string, value: unknown): Interaction {
  const body = asBody(value);
  const type = body.type;
  if (!isInteractionType(type)) {
    throw new InvalidArgumentError(`type must be one of: ${INTERACTION_TYPES.join(', ')}`);
  }

  return {
    customerId,
    productId: requiredString(body, 'productId'),
    type,
    timestamp: timestamp(body),
    durationSeconds: optionalNumber(body, 'durationSeconds', 0, nonNegative),
  };
}

export function parsePurchase(customerId: string, value: unknown): Purchase {
  const body = asBody(value);
  return {
    customerId,
    productId: requiredString(body, 'productId'),
    quantity: optionalNumber(body, 'quantity', 1, (q) => Number.isInteger(q) && q > 0),
    amount: requiredNumber(body, 'amount', nonNegative),
    timestamp: timestamp(body),
  };
}

/**
 * Positive integer from a query-string value, or the fallback when absent.
 */
export function parseTopN(raw: unknown, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = typeof raw === 'string' ? Number(raw) : Number.NaN;
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError('topN must be a positive integer');
  }
  return value;
}

/**
 * Cluster count from a JSON body; absent means the fallback. Strings and booleans are rejected.
 */
export function parseK(value: unknown, fallback: number): number {
  const body = value === undefined ? {} : asBody(value);
  const k = body.k;
  if (k === undefined) return fallback;
  if (typeof k !== 'number' || !Number.isInteger(k) || k <= 0) {
    throw new InvalidArgumentError('k must be a positive integer');
  }
  return k;
}
