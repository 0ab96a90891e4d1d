/**
 * Calendar helpers for purchase statistics
 */

import { DateTime } from 'luxon';
import { InvalidArgumentError } from '../errors';

export const nowIso = () => new Date().toISOString();

/**
 * Month key (yyyy-MM) of an ISO timestamp, in UTC.
 */
export function getMonthKey(timestamp: string): string {
  const dt = DateTime.fromISO(timestamp, { zone: 'utc' });
  if (!dt.isValid) {
    throw new InvalidArgumentError(`Invalid timestamp: ${timestamp}`);
  }
  return dt.toFormat('yyyy-MM');
}

export function countDistinctMonths(timestamps: readonly string[]): number {
  return new Set(timestamps.map(getMonthKey)).size;
}

export function isValidTimestamp(timestamp: string): boolean {
  return DateTime.fromISO(timestamp, { zone: 'utc' }).isValid;
}
