import { describe, it, expect } from 'vitest';
import { Floor } from '../Floor';
import { ProbabilityModel } from '../ProbabilityModel';
import { createPerson } from '../Person';
import { isSimulationError } from '../errors';

describe('Floor', () => {

  describe('distribution validation', () => {
    it('should accept a distribution that sums to 1 within tolerance', () => {
      // 0.1 + 0.2 + 0.7 is 1.0000000000000002 in floating point
      const floor = new Floor(0, 3, { stay: 0.1, destinations: [0, 0.2, 0.7], leave: 0 });
      expect(floor.isGround).toBe(true);
      expect(floor.size).toBe(0);
    });

    it('should reject a distribution that does not sum to 1', () => {
      expect(() => new Floor(0, 2, { stay: 0.5, destinations: [0, 0.4], leave: 0 })).toThrow(/^InvalidDistribution:/);
    });

    it('should reject the wrong number of destinations', () => {
      expect(() => new Floor(0, 3, { stay: 0, destinations: [0, 1], leave: 0 })).toThrow(/^InvalidDistribution:/);
    });

    it('should reject negative entries', () => {
      expect(() => new Floor(0, 2, { stay: 1.5, destinations: [0, -0.5], leave: 0 })).toThrow(/^InvalidDistribution:/);
    });

    it('should reject a floor requesting itself', () => {
      expect(() => new Floor(1, 2, { stay: 0.5, destinations: [0, 0.5], leave: 0 })).toThrow(/^InvalidDistribution:/);
    });

    it('should reject leaving from an upper floor', () => {
      expect(() => new Floor(1, 2, { stay: 0.5, destinations: [0.4, 0], leave: 0.1 })).toThrow(/^InvalidDistribution:/);
    });
  });

  describe('residents', () => {
    it('should admit and remove persons', () => {
      const floor = new Floor(2, 3, { stay: 1, destinations: [0, 0, 0], leave: 0 });
      const person = createPerson(1, 'D1', 0);
      floor.admit(person);
      expect(person.location).toEqual({ kind: 'floor', floor: 2 });
      expect(floor.has(1)).toBe(true);
      expect(floor.remove(1)).toBe(person);
      expect(floor.size).toBe(0);
    });

    it('should raise PersonNotFound when removing a stranger', () => {
      const floor = new Floor(0, 1, { stay: 1, destinations: [0], leave: 0 });
      let caught: unknown;
      try {
        floor.remove(42);
      } catch (err) {
        caught = err;
      }
      expect(isSimulationError(caught)).toBe(true);
      expect(isSimulationError(caught) && caught.details).toEqual({ personId: 42, floor: 0 });
    });

    it('should return a copy of the residents', () => {
      const floor = new Floor(0, 1, { stay: 1, destinations: [0], leave: 0 });
      floor.admit(createPerson(1, 'D1', 0));
      floor.getResidents().pop();
      expect(floor.size).toBe(1);
    });
  });

  describe('sampling', () => {
    const model = new ProbabilityModel(17);

    it('should map the outcome to stay, request or leave', () => {
      const stayer = new Floor(1, 3, { stay: 1, destinations: [0, 0, 0], leave: 0 });
      const mover = new Floor(1, 3, { stay: 0, destinations: [0, 0, 1], leave: 0 });
      const exit = new Floor(0, 3, { stay: 0, destinations: [0, 0, 0], leave: 1 });
      const p = createPerson(1, 'D1', 0);

      stayer.admit(p);
      expect(stayer.sampleTransition(p, model)).toEqual({ kind: 'stay' });
      mover.admit(p);
      expect(mover.sampleTransition(p, model)).toEqual({ kind: 'requestFloor', targetFloor: 2 });
      exit.admit(p);
      expect(exit.sampleTransition(p, model)).toEqual({ kind: 'leave' });
    });

    it('should refuse to sample for a non-resident', () => {
      const floor = new Floor(0, 1, { stay: 1, destinations: [0], leave: 0 });
      expect(() => floor.sampleTransition(createPerson(9, 'D1', 0), model)).toThrow(/^PersonNotFound:/);
    });

    it('should draw destinations from the request entries only', () => {
      const floor = new Floor(0, 3, { stay: 0.5, destinations: [0, 0, 0.2], leave: 0.3 });
      for (let i = 0; i < 50; i++) expect(floor.sampleDestination(model)).toBe(2);
    });

    it('should return null when the floor sends nobody anywhere', () => {
      const floor = new Floor(0, 2, { stay: 0.5, destinations: [0, 0], leave: 0.5 });
      expect(floor.sampleDestination(model)).toBeNull();
    });
  });
});
