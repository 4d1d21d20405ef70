import { describe, it, expect } from 'vitest';
import { createDispatchPolicy, type DispatchContext } from '../DispatchPolicies';
import { Door } from '../Door';
import { Elevator } from '../Elevator';
import { ProbabilityModel } from '../ProbabilityModel';
import { DispatchStrategy } from '../types';

const cars = (floors: number[]): Elevator[] =>
  floors.map((f, i) => new Elevator(i, { name: `E${i + 1}`, position: { x: i * 2, y: 0 }, startingFloor: f, energyUp: 1, energyDown: 1 }, 10));

const context = (elevators: Elevator[], fromFloor: number, door: Door | null = null): DispatchContext => ({
  fromFloor,
  door,
  elevators,
  model: new ProbabilityModel(1)
});

// Weight 1 at distance 0, nothing elsewhere: makes the weighted policy deterministic
const onlyAdjacent = (d: number) => (d === 0 ? 1 : 0);

describe('Dispatch policies', () => {

  it('should pick the nearest car, lowest index on ties', () => {
    const policy = createDispatchPolicy(DispatchStrategy.NEAREST, onlyAdjacent);
    expect(policy.selectElevator(context(cars([0, 5, 8]), 7))).toBe(2);
    expect(policy.selectElevator(context(cars([2, 6]), 4))).toBe(0);
  });

  it('should cycle through cars in index order', () => {
    const policy = createDispatchPolicy(DispatchStrategy.ROUND_ROBIN, onlyAdjacent);
    const ctx = context(cars([0, 0, 0]), 0);
    expect([0, 1, 2, 3].map(() => policy.selectElevator(ctx))).toEqual([0, 1, 2, 0]);
  });

  it('should give every building its own round-robin cursor', () => {
    const ctx = context(cars([0, 0]), 0);
    createDispatchPolicy(DispatchStrategy.ROUND_ROBIN, onlyAdjacent).selectElevator(ctx);
    expect(createDispatchPolicy(DispatchStrategy.ROUND_ROBIN, onlyAdjacent).selectElevator(ctx)).toBe(0);
  });

  it('should pick the least loaded car', () => {
    const elevators = cars([0, 0, 0]);
    elevators[0].request(3, 4);
    elevators[2].request(5, 6);
    elevators[2].request(7, 8);
    const policy = createDispatchPolicy(DispatchStrategy.LEAST_LOADED, onlyAdjacent);
    expect(policy.selectElevator(context(elevators, 0))).toBe(1);
  });

  it('should weigh cars by door distance for new arrivals', () => {
    const door = new Door({ name: 'D1', position: { x: 2, y: 0 }, arrivalProbability: 0 }, onlyAdjacent);
    const policy = createDispatchPolicy(DispatchStrategy.DOOR_WEIGHTED, onlyAdjacent);
    expect(policy.selectElevator(context(cars([0, 0, 0]), 0, door))).toBe(1);
  });

  it('should weigh cars by floor distance without a door', () => {
    const policy = createDispatchPolicy(DispatchStrategy.DOOR_WEIGHTED, onlyAdjacent);
    expect(policy.selectElevator(context(cars([0, 4, 2]), 2))).toBe(2);
  });
});
