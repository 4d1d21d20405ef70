
import { type BuildingConfig, DispatchStrategy, DistanceWeighting, type FloorTransitionDistribution } from './types';

/**
 * Knobs for a building whose floors all behave alike.
 */
export interface UniformBuildingOptions {
  floorCount: number;
  elevatorCount: number;
  doorCount: number;
  /** Per-door arrival probability per tick */
  arrivalProbability: number;
  /** Probability a ground resident leaves each tick */
  leaveProbability: number;
  /** Probability a ground resident stays put each tick */
  groundStayProbability: number;
  /** Probability an upper-floor resident stays put each tick */
  stayProbability: number;
  /** Share of upper-floor moves that head back to the ground floor */
  returnToGroundShare: number;
  energyUp: number;
  energyDown: number;
  energyPerPassenger: number;
  seed: number;
  dispatchStrategy: DispatchStrategy;
  capacity?: number;
  restingFloor?: number;
}

export const DEFAULT_OPTIONS: UniformBuildingOptions = {
  floorCount: 5,
  elevatorCount: 2,
  doorCount: 1,
  arrivalProbability: 0.3,
  leaveProbability: 0.8,
  groundStayProbability: 0.1,
  stayProbability: 0.9,
  returnToGroundShare: 0.7,
  energyUp: 5.0,
  energyDown: 2.5,
  energyPerPassenger: 0.5,
  seed: 42,
  dispatchStrategy: DispatchStrategy.DOOR_WEIGHTED
};

/**
 * Transition distributions for `floorCount` floors.
 * New arrivals are spread evenly over the upper floors; upper floors send
 * `returnToGroundShare` of their moves to the ground and split the rest evenly.
 */
export const createUniformTransitions = (
  floorCount: number,
  opts: Pick<UniformBuildingOptions, 'leaveProbability' | 'groundStayProbability' | 'stayProbability' | 'returnToGroundShare'>
): FloorTransitionDistribution[] => {
  const upper = floorCount - 1;

  const ground: FloorTransitionDistribution = upper === 0
    ? { stay: 1 - opts.leaveProbability, destinations: [0], leave: opts.leaveProbability }
    : {
        stay: opts.groundStayProbability,
        destinations: Array.from({ length: floorCount }, (_, i) =>
          i === 0 ? 0 : (1 - opts.groundStayProbability - opts.leaveProbability) / upper),
        leave: opts.leaveProbability
      };

  const others = Array.from({ length: upper }, (_, k): FloorTransitionDistribution => {
    const index = k + 1;
    const moving = 1 - opts.stayProbability;
    const peers = upper - 1;
    const toGround = peers === 0 ? moving : moving * opts.returnToGroundShare;
    const toPeer = peers === 0 ? 0 : (moving - toGround) / peers;
    return {
      stay: opts.stayProbability,
      destinations: Array.from({ length: floorCount }, (_, i) => {
        if (i === index) return 0;
        return i === 0 ? toGround : toPeer;
      }),
      leave: 0
    };
  });

  return [ground, ...others];
};

/**
 * A complete BuildingConfig from a handful of numbers. Cars and doors are laid out
 * in a row, doors two units in front of the shafts.
 */
export const createUniformBuildingConfig = (overrides: Partial<UniformBuildingOptions> = {}): BuildingConfig => {
  const opts: UniformBuildingOptions = { ...DEFAULT_OPTIONS, ...overrides };

  return {
    floorCount: opts.floorCount,
    elevators: Array.from({ length: opts.elevatorCount }, (_, i) => ({
      name: `E${i + 1}`,
      position: { x: i * 2, y: 0 },
      energyUp: opts.energyUp,
      energyDown: opts.energyDown,
      energyPerPassenger: opts.energyPerPassenger,
      capacity: opts.capacity,
      restingFloor: opts.restingFloor
    })),
    doors: Array.from({ length: opts.doorCount }, (_, i) => ({
      name: `D${i + 1}`,
      position: { x: i * 4, y: -2 },
      arrivalProbability: opts.arrivalProbability
    })),
    floorTransitions: createUniformTransitions(opts.floorCount, opts),
    seed: opts.seed,
    dispatchStrategy: opts.dispatchStrategy,
    weighting: { kind: DistanceWeighting.INVERSE, power: 1 }
  };
};
