// K-Means clustering for customer feature vectors

import { InvalidArgumentError, requirePositiveInteger } from '../errors';
import { RandomSource } from './random';

export const DEFAULT_MAX_ITERATIONS = 100;

export interface KMeansOptions {
  k: number;
  random: RandomSource;
  maxIterations?: number;
}

export interface KMeansResult {
  centroids: number[][];
  assignments: number[];
  iterations: number;
  converged: boolean;
}

export function squaredDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}

/**
 * Rescales every dimension to zero mean and unit population standard deviation.
 * A dimension with zero deviation becomes 0 for every row.
 */
export function standardize(vectors: number[][]): number[][] {
  if (vectors.length === 0) return [];

  const n = vectors.length;
  const dim = vectors[0].length;
  const means = new Array<number>(dim).fill(0);
  const stddevs = new Array<number>(dim).fill(0);

  for (const vec of vectors) {
    for (let d = 0; d < dim; d++) {
      means[d] += vec[d];
    }
  }
  for (let d = 0; d < dim; d++) means[d] /= n;

  for (const vec of vectors) {
    for (let d = 0; d < dim; d++) {
      stddevs[d] += (vec[d] - means[d]) ** 2;
    }
  }
  for (let d = 0; d < dim; d++) stddevs[d] = Math.sqrt(stddevs[d] / n);

  return vectors.map((vec) =>
    vec.map((value, d) => (stddevs[d] !== 0 ? (value - means[d]) / stddevs[d] : 0))
  );
}

/**
 * K-Means++ seeding: the first centroid is drawn uniformly, each further one with
 * probability proportional to its squared distance from the nearest chosen centroid.
 * Falls back to a uniform draw once every point coincides with a centroid.
 * Seeds at most one centroid per point.
 */
function initializeCentroids(vectors: number[][], k: number, random: RandomSource): number[][] {
  const n = vectors.length;
  const count = Math.min(k, n);
  const centroids: number[][] = [[...vectors[Math.floor(random() * n)]]];
  const minDistances = vectors.map((v) => squaredDistance(v, centroids[0]));

  for (let i = 1; i < count; i++) {
    const totalDist = minDistances.reduce((a, b) => a + b, 0);

    let chosen = Math.floor(random() * n);
    if (totalDist > 0) {
      let r = random() * totalDist;
      for (let j = 0; j < n; j++) {
        if (minDistances[j] === 0) continue;
        chosen = j;
        if (r < minDistances[j]) break;
        r -= minDistances[j];
      }
    }

    const centroid = [...vectors[chosen]];
    centroids.push(centroid);
    for (let j = 0; j < n; j++) {
      minDistances[j] = Math.min(minDistances[j], squaredDistance(vectors[j], centroid));
    }
  }

  return centroids;
}

function assignToCentroid(vector: number[], centroids: number[][]): number {
  let minDist = Infinity;
  let assignment = 0;

  for (let i = 0; i < centroids.length; i++) {
    const dist = squaredDistance(vector, centroids[i]);
    if (dist < minDist) {
      minDist = dist;
      assignment = i;
    }
  }

  return assignment;
}

/**
 * Means of each cluster's members; a cluster without members keeps its previous centroid.
 */
function recalculateCentroids(
  vectors: number[][],
  assignments: number[],
  previous: number[][]
): number[][] {
  const dim = previous[0].length;
  const counts = new Array<number>(previous.length).fill(0);
  const sums = previous.map(() => new Array<number>(dim).fill(0));

  for (let i = 0; i < vectors.length; i++) {
    const cluster = assignments[i];
    counts[cluster]++;
    for (let d = 0; d < dim; d++) {
      sums[cluster][d] += vectors[i][d];
    }
  }

  return previous.map((centroid, c) =>
    counts[c] > 0 ? sums[c].map((s) => s / counts[c]) : centroid
  );
}

/**
 * Lloyd's iteration until no assignment changes or maxIterations is reached.
 * Stopping at the cap is a normal outcome, reported through `converged`.
 * A k above the number of points yields one centroid per point.
 */
export function kMeansClustering(vectors: number[][], options: KMeansOptions): KMeansResult {
  const { k, random, maxIterations = DEFAULT_MAX_ITERATIONS } = options;
  requirePositiveInteger(k, 'k');
  requirePositiveInteger(maxIterations, 'maxIterations');

  if (vectors.length === 0) {
    throw new InvalidArgumentError('Cannot cluster an empty set of vectors');
  }
  const dim = vectors[0].length;
  if (vectors.some((v) => v.length !== dim)) {
    throw new InvalidArgumentError('All vectors must have the same length');
  }

  let centroids = initializeCentroids(vectors, k, random);
  let assignments = new Array<number>(vectors.length).fill(-1);
  let iterations = 0;
  let converged = false;

  for (let iter = 0; iter < maxIterations; iter++) {
    iterations = iter + 1;

    const newAssignments = vectors.map((v) => assignToCentroid(v, centroids));
    const changed = newAssignments.some((cluster, i) => cluster !== assignments[i]);
    assignments = newAssignments;

    if (!changed) {
      converged = true;
      break;
    }

    centroids = recalculateCentroids(vectors, assignments, centroids);
  }

  return { centroids, assignments, iterations, converged };
}
