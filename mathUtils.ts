
import { DistanceWeighting, type Position, type WeightingConfig } from './types';
import { SimulationError, SimulationErrorKind } from './errors';

/** Tolerance used when checking that a distribution sums to 1. */
export const PROBABILITY_TOLERANCE = 1e-9;

/**
 * Euclidean distance between two points in the lobby plane.
 */
export const distance = (a: Position, b: Position): number => {
  return Math.hypot(a.x - b.x, a.y - b.y);
};

/**
 * Inverse distance weight: 1 / (1 + d)^power.
 * The +1 keeps a car standing right at the door finite.
 */
export const inverseDistanceWeight = (d: number, power: number = 1): number => {
  return 1 / Math.pow(1 + d, power);
};

/**
 * Exponential decay weight: e^(-rate * d).
 */
export const exponentialDecayWeight = (d: number, rate: number = 1): number => {
  return Math.exp(-rate * d);
};

/**
 * Builds the distance → weight function for a weighting config.
 * Built-in kinds reject non-positive shape parameters, since those would stop the weight decreasing.
 */
export const createWeighting = (config: WeightingConfig): ((d: number) => number) => {
  switch (config.kind) {
    case DistanceWeighting.INVERSE: {
      const power = config.power ?? 1;
      if (!(power > 0)) {
        throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, 'inverse weighting power must be > 0', { power });
      }
      return (d: number) => inverseDistanceWeight(d, power);
    }
    case DistanceWeighting.EXPONENTIAL: {
      const rate = config.rate ?? 1;
      if (!(rate > 0)) {
        throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, 'exponential weighting rate must be > 0', { rate });
      }
      return (d: number) => exponentialDecayWeight(d, rate);
    }
    case DistanceWeighting.CUSTOM:
      return config.weight;
  }
};

/**
 * Validates a set of categorical weights: finite, non-negative, positive total.
 * Returns the total.
 */
export const validateWeights = (weights: readonly number[]): number => {
  let total = 0;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i];
    if (!Number.isFinite(w) || w < 0) {
      throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, `weight ${i} is ${w}`, { index: i });
    }
    total += w;
  }
  if (total <= 0) {
    throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, 'all weights are zero', { count: weights.length });
  }
  return total;
};

/**
 * Running sum with Neumaier compensation.
 * Energy totals are added to every tick over long runs, so plain += would drift.
 */
export class CompensatedSum {
  private sum = 0;
  private compensation = 0;

  public add(value: number) {
    const t = this.sum + value;
    if (Math.abs(this.sum) >= Math.abs(value)) {
      this.compensation += (this.sum - t) + value;
    } else {
      this.compensation += (value - t) + this.sum;
    }
    this.sum = t;
  }

  public merge(other: CompensatedSum) {
    // Read both parts first: `other` may be this accumulator
    const { sum, compensation } = other;
    this.add(sum);
    this.add(compensation);
  }

  public get value(): number {
    return this.sum + this.compensation;
  }
}

/**
 * Nearest-rank percentile of an already sorted array. Returns 0 for an empty array.
 * @param p Percentile in [0, 100]
 */
export const percentile = (sorted: readonly number[], p: number): number => {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  const idx = Math.min(sorted.length - 1, Math.max(0, rank - 1));
  return sorted[idx];
};

/**
 * STATISTICAL ANALYSIS HELPERS
 */

export interface DataStats {
  mean: number;
  variance: number;
  stdDev: number;
  cv: number; // Coefficient of Variation
  min: number;
  max: number;
  count: number;
}

export const calculateStats = (data: readonly number[]): DataStats => {
  if (data.length === 0) return { mean: 0, variance: 0, stdDev: 0, cv: 0, min: 0, max: 0, count: 0 };

  const sum = data.reduce((a, b) => a + b, 0);
  const mean = sum / data.length;

  const sqDiffSum = data.reduce((a, b) => a + Math.pow(b - mean, 2), 0);
  const variance = sqDiffSum / data.length;
  const stdDev = Math.sqrt(variance);

  return {
    mean,
    variance,
    stdDev,
    cv: mean > 0 ? stdDev / mean : 0,
    min: Math.min(...data),
    max: Math.max(...data),
    count: data.length
  };
};

// --- EXPORT UTILITIES ---

export type CsvRow = Record<string, string | number | boolean>;

/**
 * Serializes rows to CSV. Numbers get 4 decimals unless they are integers; strings are quoted.
 */
export const generateCSV = (data: readonly CsvRow[], headers: readonly string[]): string => {
  if (data.length === 0) return '';
  const headerRow = headers.join(',') + '\n';
  const rows = data.map(obj => {
    return headers.map(header => {
      const val = obj[header];
      if (typeof val === 'number') return Number.isInteger(val) ? String(val) : val.toFixed(4);
      if (typeof val === 'boolean') return String(val);
      if (val === undefined) return '';
      return `"${val.replace(/"/g, '""')}"`;
    }).join(',');
  }).join('\n');
  return headerRow + rows;
};
