
import type { BuildingConfig, CostWeights, Metrics, RunOptions, RunSummary } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { type DataStats, calculateStats } from './mathUtils';
import { Building } from './Building';
import { MetricsAggregator } from './MetricsAggregator';

export interface SeedRun {
  seed: number;
  summary: RunSummary;
}

export interface BatchResult {
  runs: SeedRun[];
  /** All runs' metrics merged into one */
  pooled: Metrics;
  /** Spread of per-run mean wait time */
  meanWaitStats: DataStats;
  /** Spread of per-run total energy */
  totalEnergyStats: DataStats;
}

export interface PolicyVariant {
  name: string;
  /** Applied over the base config for every seed */
  overrides: Partial<Omit<BuildingConfig, 'seed'>>;
}

export interface PolicyComparison {
  name: string;
  meanWaitTime: number;
  meanEnergyPerRun: number;
  cost: number;
}

/**
 * Folds the two objectives into one number. Lower is better.
 */
export const calculateObjectiveCost = (meanEnergy: number, meanWait: number, weights: CostWeights): number => {
  return weights.energyWeight * meanEnergy + weights.waitWeight * meanWait;
};

/**
 * Runs the same configuration once per seed. Every run gets its own Building and
 * ProbabilityModel; nothing mutable is shared, so the runs could as well execute in
 * parallel. Pooling goes through MetricsAggregator.merge, which doesn't care about order.
 */
export const runSeeds = (config: BuildingConfig, seeds: readonly number[], ticks: number, options: RunOptions = {}): BatchResult => {
  if (seeds.length === 0) {
    throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, 'batch needs at least one seed');
  }

  const pool = new MetricsAggregator(config.elevators.length);
  const runs: SeedRun[] = seeds.map(seed => {
    const building = new Building({ ...config, seed });
    const summary = building.run(ticks, options);
    pool.merge(building.metrics);
    return { seed, summary };
  });

  return {
    runs,
    pooled: pool.snapshot(),
    meanWaitStats: calculateStats(runs.map(r => r.summary.metrics.meanWaitTime)),
    totalEnergyStats: calculateStats(runs.map(r => r.summary.metrics.totalEnergy))
  };
};

/**
 * Evaluates each variant over the same seeds and returns them cheapest first.
 * Ties keep the order the variants were given in.
 */
export const comparePolicies = (
  baseConfig: BuildingConfig,
  variants: readonly PolicyVariant[],
  seeds: readonly number[],
  ticks: number,
  weights: CostWeights
): PolicyComparison[] => {
  const results = variants.map(variant => {
    const batch = runSeeds({ ...baseConfig, ...variant.overrides }, seeds, ticks);
    const meanEnergyPerRun = batch.pooled.totalEnergy / batch.runs.length;
    const meanWaitTime = batch.pooled.meanWaitTime;
    return {
      name: variant.name,
      meanWaitTime,
      meanEnergyPerRun,
      cost: calculateObjectiveCost(meanEnergyPerRun, meanWaitTime, weights)
    };
  });

  return [...results].sort((a, b) => a.cost - b.cost);
};
