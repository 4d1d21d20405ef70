
/**
 * Distance-to-weight decay used when a Person chooses between elevators.
 */
export enum DistanceWeighting {
  /** w = 1 / (1 + d)^power */
  INVERSE = 'Inverse Distance',
  /** w = e^(-rate * d) */
  EXPONENTIAL = 'Exponential Decay',
  /** Caller-supplied function. Must be non-negative and non-increasing in distance. */
  CUSTOM = 'Custom'
}

/**
 * Strategy for assigning a request to one of the building's elevators.
 */
export enum DispatchStrategy {
  /** Sample a car by door distance (ground arrivals) or car-to-floor distance (everyone else). */
  DOOR_WEIGHTED = 'Door Weighted',
  /** Closest car by floor distance. */
  NEAREST = 'Nearest Car',
  /** Cycle through cars in index order. */
  ROUND_ROBIN = 'Round Robin',
  /** Car with the fewest queued stops, passengers and callers. */
  LEAST_LOADED = 'Least Loaded'
}

/**
 * Random process generating arrivals through a Door each tick.
 */
export enum ArrivalProcess {
  /** At most one arrival per tick, with the door's probability. */
  BERNOULLI = 'Bernoulli',
  /** Poisson-distributed arrival count per tick, the door's probability taken as the mean. */
  POISSON = 'Poisson'
}

/**
 * Event types emitted by the engine into the per-tick event buffer.
 */
export enum SimulationEventType {
  ARRIVAL = 'ARRIVAL',
  DISPATCH = 'DISPATCH',
  BOARD = 'BOARD',
  ALIGHT = 'ALIGHT',
  MOVE = 'MOVE',
  REST = 'REST',
  DEPARTURE = 'DEPARTURE'
}

/**
 * Why a `Building.run` call returned.
 */
export enum StopReason {
  TICKS_COMPLETE = 'Ticks Complete',
  DRAINED = 'Drained',
  STOPPED = 'Stopped'
}

/**
 * A point in the lobby plane. Doors and elevator shafts are placed on it.
 */
export interface Position {
  x: number;
  y: number;
}

export type WeightingConfig =
  | { kind: DistanceWeighting.INVERSE; power?: number }
  | { kind: DistanceWeighting.EXPONENTIAL; rate?: number }
  | { kind: DistanceWeighting.CUSTOM; weight: (distance: number) => number };

/**
 * Configuration for a single elevator car.
 */
export interface ElevatorConfig {
  /** Unique car name */
  name: string;
  /** Shaft location in the lobby plane */
  position: Position;
  /** Floor the car starts on (default 0) */
  startingFloor?: number;
  /** Energy spent per floor travelled upward */
  energyUp: number;
  /** Energy spent per floor travelled downward. May be lower than energyUp (regenerative braking). */
  energyDown: number;
  /** Extra energy per floor for each passenger aboard (default 0) */
  energyPerPassenger?: number;
  /** Maximum passengers aboard. Unlimited when omitted. */
  capacity?: number;
  /** Floor an idle car returns to. The car stays where it is when omitted. */
  restingFloor?: number;
}

/**
 * Configuration for a building entrance.
 */
export interface DoorConfig {
  /** Unique door name */
  name: string;
  /** Door location in the lobby plane */
  position: Position;
  /** Per-tick arrival probability (Bernoulli) or mean arrivals per tick (Poisson) */
  arrivalProbability: number;
  /** Optional per-tick override, indexed by tick. Ticks past its end use arrivalProbability. */
  arrivalSchedule?: number[];
  /** Arrival process (default BERNOULLI) */
  arrivalProcess?: ArrivalProcess;
}

/**
 * Per-tick transition distribution for the residents of one floor.
 * stay + sum(destinations) + leave must equal 1.
 */
export interface FloorTransitionDistribution {
  /** Probability a resident stays put this tick */
  stay: number;
  /** Probability of requesting each floor, indexed by floor. The entry for the floor itself must be 0. */
  destinations: number[];
  /** Probability of leaving the building. Only the ground floor may be non-zero. */
  leave: number;
}

/**
 * Complete, already-parsed configuration for one simulation run.
 */
export interface BuildingConfig {
  /** Number of floors, ground included */
  floorCount: number;
  elevators: ElevatorConfig[];
  doors: DoorConfig[];
  /** One distribution per floor, indexed by floor */
  floorTransitions: FloorTransitionDistribution[];
  /** Seed for the run's ProbabilityModel */
  seed: number;
  /** How requests are assigned to cars (default DOOR_WEIGHTED) */
  dispatchStrategy?: DispatchStrategy;
  /** Distance decay for door and floor weighting (default inverse, power 1) */
  weighting?: WeightingConfig;
  /** Distance units per floor when measuring door-to-car distance (default 1) */
  floorHeight?: number;
}

/**
 * Where a Person currently is. Exactly one owner at a time.
 */
export type PersonLocation =
  | { kind: 'floor'; floor: number }
  | { kind: 'elevator'; elevator: number };

/**
 * An occupant of the building for the duration of one visit.
 */
export interface Person {
  /** Unique within a run */
  id: number;
  /** Door the person came in through */
  doorName: string;
  location: PersonLocation;
  /** Floor requested, null while the person is not travelling */
  destinationFloor: number | null;
  /** Tick the current request was issued, null once boarded */
  waitStartTick: number | null;
  /** Car serving the current request */
  assignedElevator: number | null;
  /** Tick the person entered the building */
  arrivalTick: number;
  /** Last tick the person arrived on a floor (entry or alighting) */
  settledTick: number;
  /** Completed rides */
  trips: number;
}

export type Transition =
  | { kind: 'stay' }
  | { kind: 'requestFloor'; targetFloor: number }
  | { kind: 'leave' };

/**
 * One completed wait, from request to boarding.
 */
export interface WaitSample {
  personId: number;
  elevator: number;
  fromFloor: number;
  toFloor: number;
  requestTick: number;
  boardingTick: number;
  /** boardingTick - requestTick */
  waitTicks: number;
}

/**
 * Receiver for the metrics an elevator produces while stepping.
 */
export interface MetricsSink {
  recordEnergy(elevator: number, delta: number, tick: number): void;
  recordWait(sample: WaitSample): void;
}

/**
 * Structured log entry for a single engine event.
 */
export interface SimulationEvent {
  /** `${tick}-${sequence}`, unique within a run */
  id: string;
  type: SimulationEventType;
  tick: number;
  personId?: number;
  elevator?: number;
  floor?: number;
  door?: string;
}

/**
 * Summary of everything that happened in one tick.
 */
export interface TickReport {
  tick: number;
  arrivals: number;
  departures: number;
  boardings: number;
  alightings: number;
  /** Elevator requests issued this tick */
  requests: number;
  /** Energy spent by all cars this tick */
  energyDelta: number;
  /** Energy spent this tick, indexed by car */
  perElevatorEnergyDelta: number[];
  waitSamples: WaitSample[];
  /** Persons inside the building at the end of the tick */
  population: number;
  events: SimulationEvent[];
}

/**
 * Read-only view of the metrics accumulated so far.
 */
export interface Metrics {
  totalEnergy: number;
  meanWaitTime: number;
  sampleCount: number;
  perElevatorEnergy: number[];
  maxWaitTime: number;
  waitTimeStdDev: number;
  waitTimeP50: number;
  waitTimeP90: number;
  /** totalEnergy / ticksRecorded */
  averageEnergyPerTick: number;
  ticksRecorded: number;
}

export interface RunOptions {
  /** Stop at the first tick boundary with nobody inside and nothing queued */
  drain?: boolean;
  /** Called with every TickReport as it is produced */
  onTick?: (report: TickReport) => void;
  /** External stop condition, checked after every tick */
  shouldStop?: (report: TickReport) => boolean;
  /** Keep every TickReport in the summary (default false) */
  collectReports?: boolean;
}

export interface RunSummary {
  ticksRun: number;
  stopReason: StopReason;
  metrics: Metrics;
  totalArrivals: number;
  totalDepartures: number;
  finalPopulation: number;
  reports: TickReport[];
}

/**
 * Weights for folding the two objectives into a single cost.
 */
export interface CostWeights {
  energyWeight: number;
  waitWeight: number;
}
