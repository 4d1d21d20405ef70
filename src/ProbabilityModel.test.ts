import { describe, it, expect } from 'vitest';
import { ProbabilityModel } from '../ProbabilityModel';

const draws = (model: ProbabilityModel, n: number): number[] => Array.from({ length: n }, () => model.nextFloat());

describe('ProbabilityModel', () => {

  describe('seeding', () => {
    it('should produce the same sequence for the same seed', () => {
      expect(draws(new ProbabilityModel(1234), 20)).toEqual(draws(new ProbabilityModel(1234), 20));
    });

    it('should produce different sequences for different seeds', () => {
      expect(draws(new ProbabilityModel(1), 5)).not.toEqual(draws(new ProbabilityModel(2), 5));
    });

    it('should replay after reseeding', () => {
      const model = new ProbabilityModel(99);
      const first = draws(model, 10);
      model.reseed(99);
      expect(draws(model, 10)).toEqual(first);
    });

    it('should expose a state that tracks the stream', () => {
      const a = new ProbabilityModel(5);
      const b = new ProbabilityModel(5);
      a.nextFloat();
      expect(a.getState()).not.toBe(b.getState());
      b.nextFloat();
      expect(a.getState()).toBe(b.getState());
    });

    it('should reject a non-finite seed', () => {
      expect(() => new ProbabilityModel(Number.NaN)).toThrow(/^InvalidConfiguration:/);
      expect(() => new ProbabilityModel(Number.POSITIVE_INFINITY)).toThrow(/^InvalidConfiguration:/);
    });
  });

  describe('nextFloat', () => {
    it('should stay within [0, 1)', () => {
      for (const u of draws(new ProbabilityModel(7), 1000)) {
        expect(u).toBeGreaterThanOrEqual(0);
        expect(u).toBeLessThan(1);
      }
    });
  });

  describe('sampleCategorical', () => {
    it('should never return a zero-weight index', () => {
      const model = new ProbabilityModel(3);
      for (let i = 0; i < 500; i++) {
        expect(model.sampleCategorical([0, 2, 0])).toBe(1);
      }
    });

    it('should follow the weights', () => {
      const model = new ProbabilityModel(11);
      let ones = 0;
      const n = 4000;
      for (let i = 0; i < n; i++) {
        if (model.sampleCategorical([1, 3]) === 1) ones++;
      }
      expect(ones / n).toBeGreaterThan(0.7);
      expect(ones / n).toBeLessThan(0.8);
    });

    it('should reject degenerate weights', () => {
      const model = new ProbabilityModel(3);
      expect(() => model.sampleCategorical([0, 0])).toThrow(/^InvalidDistribution:/);
      expect(() => model.sampleCategorical([1, -1])).toThrow(/^InvalidDistribution:/);
    });
  });

  describe('sampleBernoulli', () => {
    it('should honour the certain and impossible cases', () => {
      const model = new ProbabilityModel(8);
      for (let i = 0; i < 200; i++) {
        expect(model.sampleBernoulli(0)).toBe(false);
        expect(model.sampleBernoulli(1)).toBe(true);
      }
    });

    it('should reject probabilities outside [0, 1]', () => {
      const model = new ProbabilityModel(8);
      expect(() => model.sampleBernoulli(1.5)).toThrow(/^InvalidDistribution:/);
      expect(() => model.sampleBernoulli(-0.1)).toThrow(/^InvalidDistribution:/);
    });
  });

  describe('samplePoisson', () => {
    it('should return 0 for a zero mean', () => {
      const model = new ProbabilityModel(4);
      for (let i = 0; i < 50; i++) expect(model.samplePoisson(0)).toBe(0);
    });

    it('should average close to the mean', () => {
      const model = new ProbabilityModel(21);
      let total = 0;
      const n = 2000;
      for (let i = 0; i < n; i++) total += model.samplePoisson(1.5);
      expect(total / n).toBeGreaterThan(1.35);
      expect(total / n).toBeLessThan(1.65);
    });

    it('should reject a negative mean', () => {
      expect(() => new ProbabilityModel(4).samplePoisson(-1)).toThrow(/^InvalidDistribution:/);
    });
  });
});
