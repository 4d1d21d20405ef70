
import { SimulationError, SimulationErrorKind } from './errors';
import { validateWeights } from './mathUtils';

/**
 * Seeded random source owned by one simulation run.
 *
 * Every draw advances the internal state exactly once per uniform consumed, so two
 * models built from the same seed produce the same sequence of draws. There is no
 * fallback to Math.random anywhere in the engine.
 *
 * Generator: mulberry32 (32-bit state, period 2^32).
 */
export class ProbabilityModel {
    private state: number;

    constructor(seed: number) {
        this.state = ProbabilityModel.normalizeSeed(seed);
    }

    private static normalizeSeed(seed: number): number {
        if (!Number.isFinite(seed)) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, 'seed must be a finite number', { seed });
        }
        return Math.trunc(seed) >>> 0;
    }

    /**
     * Restarts the stream. A run re-seeded with the same value replays exactly.
     */
    public reseed(seed: number) {
        this.state = ProbabilityModel.normalizeSeed(seed);
    }

    /**
     * Current 32-bit state. Two models with equal state produce equal draws.
     */
    public getState(): number {
        return this.state;
    }

    /**
     * Uniform float in [0, 1).
     */
    public nextFloat(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Draws an index with probability proportional to its weight.
     * Zero-weight entries are never returned.
     */
    public sampleCategorical(weights: readonly number[]): number {
        const total = validateWeights(weights);
        const r = this.nextFloat() * total;

        let cumulative = 0;
        let lastPositive = -1;
        for (let i = 0; i < weights.length; i++) {
            if (weights[i] === 0) continue;
            cumulative += weights[i];
            lastPositive = i;
            if (r < cumulative) return i;
        }
        // r can only reach the total through rounding in the cumulative sum
        return lastPositive;
    }

    /**
     * True with probability p.
     */
    public sampleBernoulli(p: number): boolean {
        if (!Number.isFinite(p) || p < 0 || p > 1) {
            throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, `Bernoulli probability ${p} outside [0, 1]`, { p });
        }
        return this.nextFloat() < p;
    }

    /**
     * Poisson-distributed count with the given mean (Knuth's multiplication method).
     * Suited to the small per-tick means used for arrivals.
     */
    public samplePoisson(mean: number): number {
        if (!Number.isFinite(mean) || mean < 0) {
            throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, `Poisson mean ${mean} must be >= 0`, { mean });
        }
        const limit = Math.exp(-mean);
        let k = 0;
        let product = this.nextFloat();
        while (product > limit) {
            k++;
            product *= this.nextFloat();
        }
        return k;
    }
}
