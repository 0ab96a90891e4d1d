/**
 * Customer segmentation: standardize behaviour features, then k-means.
 */

import { InvalidArgumentError, requirePositiveInteger } from '../errors';
import { CustomerFeature, SegmentAssignment } from '../types';
import { DEFAULT_MAX_ITERATIONS, kMeansClustering, standardize } from './kmeans';
import { mulberry32 } from './random';

export const DEFAULT_SEGMENT_SEED = 42;

export interface SegmentationOptions {
  seed?: number;
  maxIterations?: number;
}

export function segmentLabel(index: number): string {
  return `segment_${index}`;
}

export function featureVector(feature: CustomerFeature): number[] {
  return [
    feature.interactionCount,
    feature.purchaseCount,
    feature.totalSpent,
    feature.activeMonths,
  ];
}

function validateBatch(features: readonly CustomerFeature[]): void {
  if (features.length === 0) {
    throw new InvalidArgumentError('Cannot segment an empty feature batch');
  }

  const seen = new Set<string>();
  for (const feature of features) {
    if (seen.has(feature.customerId)) {
      throw new InvalidArgumentError(`Duplicate customer in feature batch: ${feature.customerId}`);
    }
    seen.add(feature.customerId);

    if (!featureVector(feature).every(Number.isFinite)) {
      throw new InvalidArgumentError(`Non-finite feature value for customer ${feature.customerId}`);
    }
  }
}

export class SegmentationEngine {
  private readonly seed: number;
  private readonly maxIterations: number;

  constructor(options: SegmentationOptions = {}) {
    this.seed = options.seed ?? DEFAULT_SEGMENT_SEED;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  }

  /**
   * Assigns every customer in the batch exactly one label. Labels are numbered by
   * first appearance in input order, so they carry no identity across runs.
   * Each run starts a fresh generator from the configured seed.
   */
  run(features: readonly CustomerFeature[], k: number): SegmentAssignment {
    requirePositiveInteger(k, 'k');
    validateBatch(features);

    const vectors = standardize(features.map(featureVector));
    const { assignments } = kMeansClustering(vectors, {
      k,
      random: mulberry32(this.seed),
      maxIterations: this.maxIterations,
    });

    const labels = new Map<number, string>();
    const result = new Map<string, string>();
    features.forEach((feature, i) => {
      const cluster = assignments[i];
      let label = labels.get(cluster);
      if (label === undefined) {
        label = segmentLabel(labels.size);
        labels.set(cluster, label);
      }
      result.set(feature.customerId, label);
    });

    return result;
  }
}
