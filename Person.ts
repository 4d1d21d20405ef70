
import type { Person } from './types';

/**
 * A new visitor standing on the ground floor, not yet travelling anywhere.
 */
export const createPerson = (id: number, doorName: string, tick: number): Person => ({
  id,
  doorName,
  location: { kind: 'floor', floor: 0 },
  destinationFloor: null,
  waitStartTick: null,
  assignedElevator: null,
  arrivalTick: tick,
  settledTick: tick,
  trips: 0
});

/** Has an open request that no car has picked up yet. */
export const isWaiting = (p: Person): boolean => p.waitStartTick !== null;

/** Wants to travel but has not been assigned a car. */
export const isAwaitingDispatch = (p: Person): boolean =>
  p.location.kind === 'floor' && p.destinationFloor !== null && p.assignedElevator === null;

/** Eligible to sample a floor transition at `tick`. */
export const isIdleResident = (p: Person, tick: number): boolean =>
  p.location.kind === 'floor' && p.destinationFloor === null && p.settledTick < tick;
