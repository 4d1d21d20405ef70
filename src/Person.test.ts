import { describe, it, expect } from 'vitest';
import { createPerson, isAwaitingDispatch, isIdleResident, isWaiting } from '../Person';

describe('Person', () => {
  it('should start on the ground floor with nowhere to go', () => {
    const p = createPerson(3, 'D1', 10);
    expect(p).toEqual({
      id: 3,
      doorName: 'D1',
      location: { kind: 'floor', floor: 0 },
      destinationFloor: null,
      waitStartTick: null,
      assignedElevator: null,
      arrivalTick: 10,
      settledTick: 10,
      trips: 0
    });
  });

  it('should not sample a transition in the tick it settled', () => {
    const p = createPerson(1, 'D1', 4);
    expect(isIdleResident(p, 4)).toBe(false);
    expect(isIdleResident(p, 5)).toBe(true);
  });

  it('should not be idle while travelling', () => {
    const p = createPerson(1, 'D1', 0);
    p.destinationFloor = 2;
    expect(isIdleResident(p, 5)).toBe(false);
    expect(isAwaitingDispatch(p)).toBe(true);

    p.assignedElevator = 0;
    p.waitStartTick = 1;
    expect(isAwaitingDispatch(p)).toBe(false);
    expect(isWaiting(p)).toBe(true);
  });

  it('should not be idle inside a car', () => {
    const p = createPerson(1, 'D1', 0);
    p.location = { kind: 'elevator', elevator: 0 };
    expect(isIdleResident(p, 5)).toBe(false);
  });
});
