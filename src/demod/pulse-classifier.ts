import { PulseCategory, type Category } from '../core';
import { DecodeExhaustionError } from '../errors';

export interface PulseClassifierConfig {
  minPulse: number;       // shortest clusterable duration (inclusive)
  maxPulse: number;       // longest clusterable duration (inclusive)
  maxIterations: number;
  convergence: number;    // stop when every center moves less than this
}

export const DEFAULT_CLASSIFIER_CONFIG: PulseClassifierConfig = {
  minPulse: 10,
  maxPulse: 250,
  maxIterations: 40,
  convergence: 1e-6
};

export type ClusterCenters = [number, number, number];

export interface ClassificationResult {
  categories: Category[];
  centers: ClusterCenters;
  clusterable: number;
}

function nearestCenter(value: number, centers: readonly number[]): number {
  let best = 0;
  let bestDistance = Math.abs(value - centers[0]);
  for (let i = 1; i < centers.length; i++) {
    const distance = Math.abs(value - centers[i]);
    // strictly closer only: ties stay with the lowest index
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  }
  return best;
}

/**
 * 1-D k-means with deterministic fractile seeding
 * @param values Non-empty list of values
 * @returns centers sorted ascending
 */
export function kmeans1d(
  values: readonly number[],
  k = 3,
  maxIterations = DEFAULT_CLASSIFIER_CONFIG.maxIterations,
  convergence = DEFAULT_CLASSIFIER_CONFIG.convergence
): number[] {
  if (values.length === 0) {
    throw new Error('kmeans1d requires at least one value');
  }
  const sorted = [...values].sort((a, b) => a - b);
  let centers: number[] = [];
  for (let i = 0; i < k; i++) {
    centers.push(sorted[Math.floor(((i + 1) * sorted.length) / (k + 1))]);
  }

  for (let iter = 0; iter < maxIterations; iter++) {
    const sums = new Array<number>(k).fill(0);
    const counts = new Array<number>(k).fill(0);
    for (const v of values) {
      const j = nearestCenter(v, centers);
      sums[j] += v;
      counts[j]++;
    }
    const next = centers.map((c, i) => (counts[i] > 0 ? sums[i] / counts[i] : c));
    const converged = next.every((c, i) => Math.abs(c - centers[i]) < convergence);
    if (converged) break;
    centers = next;
  }

  return centers.sort((a, b) => a - b);
}

/**
 * Classify every pulse as Short, Medium, Long or Unknown (null)
 * @throws DecodeExhaustionError when no pulse is in the clusterable range
 */
export function classifyPulses(
  pulses: readonly number[],
  config: Partial<PulseClassifierConfig> = {}
): ClassificationResult {
  const { minPulse, maxPulse, maxIterations, convergence } = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
  const inRange = (p: number): boolean => p >= minPulse && p <= maxPulse;

  const clusterable = pulses.filter(inRange);
  if (clusterable.length === 0) {
    throw new DecodeExhaustionError(
      `No clusterable pulses found (${minPulse}..${maxPulse})`,
      'classify',
      'classifyPulses',
      'Check the capture: it may be silent or recorded at the wrong level'
    );
  }

  const sorted = kmeans1d(clusterable, 3, maxIterations, convergence);
  const centers: ClusterCenters = [sorted[0], sorted[1], sorted[2]];
  const labels = [PulseCategory.SHORT, PulseCategory.MEDIUM, PulseCategory.LONG];

  const categories = pulses.map((p): Category => (inRange(p) ? labels[nearestCenter(p, centers)] : null));
  return { categories, centers, clusterable: clusterable.length };
}
