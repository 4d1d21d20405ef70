import { describe, it, expect } from 'vitest';
import {
  CompensatedSum,
  calculateStats,
  createWeighting,
  distance,
  exponentialDecayWeight,
  generateCSV,
  inverseDistanceWeight,
  percentile,
  validateWeights
} from '../mathUtils';
import { DistanceWeighting } from '../types';

describe('Math Utils', () => {

  describe('distance weighting', () => {
    it('should measure euclidean distance in the lobby plane', () => {
      expect(distance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    });

    it('should decay inverse weights with distance', () => {
      // 1 / (1 + 1)^2
      expect(inverseDistanceWeight(1, 2)).toBeCloseTo(0.25);
      expect(inverseDistanceWeight(0)).toBe(1);
      expect(inverseDistanceWeight(4)).toBeGreaterThan(inverseDistanceWeight(5));
    });

    it('should give weight 1 at distance 0 for exponential decay', () => {
      expect(exponentialDecayWeight(0, 3)).toBe(1);
      expect(exponentialDecayWeight(1, 1)).toBeCloseTo(Math.exp(-1));
    });

    it('should reject shape parameters that do not decay', () => {
      expect(() => createWeighting({ kind: DistanceWeighting.INVERSE, power: 0 })).toThrow(/^InvalidConfiguration:/);
      expect(() => createWeighting({ kind: DistanceWeighting.EXPONENTIAL, rate: -1 })).toThrow(/^InvalidConfiguration:/);
    });

    it('should pass custom weightings through untouched', () => {
      const w = createWeighting({ kind: DistanceWeighting.CUSTOM, weight: d => 10 - d });
      expect(w(3)).toBe(7);
    });
  });

  describe('validateWeights', () => {
    it('should return the total of valid weights', () => {
      expect(validateWeights([0, 1, 2.5])).toBe(3.5);
    });

    it('should reject negative, non-finite and all-zero weights', () => {
      expect(() => validateWeights([1, -0.1])).toThrow(/^InvalidDistribution:/);
      expect(() => validateWeights([1, Number.NaN])).toThrow(/^InvalidDistribution:/);
      expect(() => validateWeights([0, 0])).toThrow(/^InvalidDistribution:/);
      expect(() => validateWeights([])).toThrow(/^InvalidDistribution:/);
    });
  });

  describe('CompensatedSum', () => {
    it('should keep small terms a naive sum loses', () => {
      const sum = new CompensatedSum();
      sum.add(1e16);
      sum.add(1);
      sum.add(-1e16);
      expect(sum.value).toBe(1);
      expect(1e16 + 1 - 1e16).toBe(0);
    });

    it('should merge another accumulator', () => {
      const a = new CompensatedSum();
      const b = new CompensatedSum();
      a.add(2.5);
      b.add(4);
      a.merge(b);
      expect(a.value).toBe(6.5);
      expect(b.value).toBe(4);
    });

    it('should double when merged into itself', () => {
      const sum = new CompensatedSum();
      sum.add(1e16);
      sum.add(1);
      sum.merge(sum);
      expect(sum.value).toBe(2e16 + 2);
    });
  });

  describe('percentile (nearest rank)', () => {
    it('should pick the nearest-rank element', () => {
      const sorted = [1, 2, 3, 4];
      expect(percentile(sorted, 50)).toBe(2);
      expect(percentile(sorted, 90)).toBe(4);
      expect(percentile(sorted, 0)).toBe(1);
      expect(percentile(sorted, 100)).toBe(4);
    });

    it('should return 0 for no data', () => {
      expect(percentile([], 90)).toBe(0);
    });
  });

  describe('calculateStats', () => {
    it('should compute population statistics', () => {
      const stats = calculateStats([2, 4, 4, 4, 5, 5, 7, 9]);
      expect(stats.mean).toBe(5);
      expect(stats.variance).toBe(4);
      expect(stats.stdDev).toBe(2);
      expect(stats.cv).toBeCloseTo(0.4);
      expect(stats.min).toBe(2);
      expect(stats.max).toBe(9);
      expect(stats.count).toBe(8);
    });

    it('should return zeros for an empty set', () => {
      expect(calculateStats([]).count).toBe(0);
      expect(calculateStats([]).mean).toBe(0);
    });
  });

  describe('generateCSV', () => {
    it('should format integers plainly, decimals to 4 places and quote strings', () => {
      const csv = generateCSV([{ a: 1, b: 0.5, c: 'say "hi"' }, { a: 2, b: 3, c: 'x' }], ['a', 'b', 'c']);
      expect(csv).toBe('a,b,c\n1,0.5000,"say ""hi"""\n2,3,"x"');
    });

    it('should leave missing columns empty', () => {
      expect(generateCSV([{ a: 1 }], ['a', 'b'])).toBe('a,b\n1,');
    });

    it('should return an empty string for no rows', () => {
      expect(generateCSV([], ['a'])).toBe('');
    });
  });
});
