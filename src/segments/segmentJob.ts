import { requirePositiveInteger } from '../errors';
import { RecordStore } from '../store/recordStore';
import { CustomerFeatureExtractor } from './customerFeatures';
import { SegmentationEngine } from './segmentationEngine';

export interface SegmentationSummary {
  customersSegmented: number;
  segments: Record<string, number>;
}

/**
 * Batch job: recompute features for every customer, cluster them and persist the labels.
 */
export async function runSegmentation(
  deps: {
    store: RecordStore;
    extractor: CustomerFeatureExtractor;
    engine: SegmentationEngine;
  },
  k: number
): Promise<SegmentationSummary> {
  requirePositiveInteger(k, 'k');
  const startTime = Date.now();
  const customerIds = await deps.store.listCustomerIds();

  if (customerIds.length === 0) {
    console.log('[segments] No customers to segment');
    return { customersSegmented: 0, segments: {} };
  }

  const features = await deps.extractor.extractAll(customerIds);
  const assignment = deps.engine.run(features, k);
  await deps.store.setCustomerSegments(assignment);

  const segments: Record<string, number> = {};
  for (const label of assignment.values()) {
    segments[label] = (segments[label] ?? 0) + 1;
  }

  console.log('[segments] Run complete in', Date.now() - startTime, 'ms', {
    k,
    customersSegmented: assignment.size,
    segments,
  });

  return { customersSegmented: assignment.size, segments };
}
