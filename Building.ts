
import {
    ArrivalProcess,
    type BuildingConfig,
    DispatchStrategy,
    DistanceWeighting,
    type Metrics,
    type MetricsSink,
    type Person,
    type RunOptions,
    type RunSummary,
    type SimulationEvent,
    SimulationEventType,
    StopReason,
    type TickReport,
    type WaitSample
} from './types';
import { SimulationError, SimulationErrorKind, isSimulationError } from './errors';
import { createWeighting } from './mathUtils';
import { ProbabilityModel } from './ProbabilityModel';
import { Floor } from './Floor';
import { Door } from './Door';
import { Elevator } from './Elevator';
import { MetricsAggregator } from './MetricsAggregator';
import { type DispatchPolicy, createDispatchPolicy } from './DispatchPolicies';
import { createPerson, isAwaitingDispatch, isIdleResident, isWaiting } from './Person';

const MAX_EVENT_LOG = 500;

/**
 * Plain-data view of the building at a tick boundary, for renderers and exporters.
 */
export interface BuildingSnapshot {
    tick: number;
    floors: { index: number; residents: number; waiting: number }[];
    elevators: { name: string; currentFloor: number; targetQueue: number[]; passengers: number; cumulativeEnergy: number }[];
    metrics: Metrics;
}

/**
 * Discrete-time elevator simulation.
 *
 * Owns every Floor, Elevator and Door plus the run's ProbabilityModel and MetricsAggregator.
 * Each `tick()` runs five phases in a fixed order and is atomic: nothing outside sees a
 * half-processed tick, so stopping between ticks is always consistent.
 *
 *   1. Arrivals     doors sample new visitors onto the ground floor
 *   2. Dispatch     new visitors pick a destination and are assigned a car
 *   3. Elevators    idle cars head to their resting floor; every car steps, ascending index
 *   4. Transitions  upper-floor residents stay or request a floor
 *   5. Exits        ground residents stay, request a floor, or leave
 */
export class Building {
    private readonly floors: Floor[];
    private readonly elevators: Elevator[];
    private readonly doors: Door[];
    private readonly doorsByName = new Map<string, Door>();
    private readonly model: ProbabilityModel;
    private readonly dispatchPolicy: DispatchPolicy;
    public readonly metrics: MetricsAggregator;

    private currentTick: number = 0;
    private nextPersonId: number = 1;
    private totalArrivals: number = 0;
    private totalDepartures: number = 0;

    // Per-tick buffers, reset at the start of every tick
    private events: SimulationEvent[] = [];
    private requestsThisTick: number = 0;
    private eventLog: SimulationEvent[] = [];

    constructor(config: BuildingConfig) {
        Building.validateStructure(config);

        const weighting = createWeighting(config.weighting ?? { kind: DistanceWeighting.INVERSE, power: 1 });
        const floorHeight = config.floorHeight ?? 1;

        this.floors = config.floorTransitions.map((dist, i) => {
            try {
                return new Floor(i, config.floorCount, dist);
            } catch (err) {
                if (isSimulationError(err, SimulationErrorKind.INVALID_DISTRIBUTION)) {
                    throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, err.message, { floor: i }, { cause: err });
                }
                throw err;
            }
        });
        this.elevators = config.elevators.map((cfg, i) => new Elevator(i, cfg, config.floorCount));
        this.doors = config.doors.map(cfg => new Door(cfg, weighting, floorHeight));
        this.doors.forEach(d => this.doorsByName.set(d.name, d));

        this.model = new ProbabilityModel(config.seed);
        this.dispatchPolicy = createDispatchPolicy(config.dispatchStrategy ?? DispatchStrategy.DOOR_WEIGHTED, weighting);
        this.metrics = new MetricsAggregator(this.elevators.length);
    }

    /**
     * Structural checks that don't belong to any single component.
     * Nothing is built until all of them pass.
     */
    private static validateStructure(config: BuildingConfig) {
        const fail = (message: string, details: Record<string, string | number> = {}): never => {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, message, details);
        };
        const n = config.floorCount;
        const inRange = (f: number) => Number.isInteger(f) && f >= 0 && f < n;
        const nonNegative = (v: number) => Number.isFinite(v) && v >= 0;

        if (!Number.isInteger(n) || n <= 0) fail(`floor count must be a positive integer, got ${n}`);
        if (config.elevators.length === 0) fail('building needs at least one elevator');
        if (config.doors.length === 0) fail('building needs at least one door');
        if (config.floorTransitions.length !== n) {
            fail(`expected ${n} floor transition distributions, got ${config.floorTransitions.length}`);
        }
        if (config.floorHeight !== undefined && !nonNegative(config.floorHeight)) {
            fail(`floor height must be >= 0, got ${config.floorHeight}`);
        }

        const elevatorNames = new Set<string>();
        config.elevators.forEach((e, i) => {
            if (elevatorNames.has(e.name)) fail(`duplicate elevator name ${e.name}`, { elevator: i });
            elevatorNames.add(e.name);
            if (e.startingFloor !== undefined && !inRange(e.startingFloor)) fail(`elevator ${e.name} starts on missing floor ${e.startingFloor}`, { elevator: i });
            if (e.restingFloor !== undefined && !inRange(e.restingFloor)) fail(`elevator ${e.name} rests on missing floor ${e.restingFloor}`, { elevator: i });
            if (!nonNegative(e.energyUp) || !nonNegative(e.energyDown) || !nonNegative(e.energyPerPassenger ?? 0)) {
                fail(`elevator ${e.name} energy costs must be >= 0`, { elevator: i });
            }
            if (e.capacity !== undefined && (!Number.isInteger(e.capacity) || e.capacity < 1)) {
                fail(`elevator ${e.name} capacity must be a positive integer`, { elevator: i });
            }
        });

        const doorNames = new Set<string>();
        config.doors.forEach((d, i) => {
            if (doorNames.has(d.name)) fail(`duplicate door name ${d.name}`, { door: i });
            doorNames.add(d.name);
            const bounded = (d.arrivalProcess ?? ArrivalProcess.BERNOULLI) === ArrivalProcess.BERNOULLI;
            const valid = (p: number) => nonNegative(p) && (!bounded || p <= 1);
            if (!valid(d.arrivalProbability) || !(d.arrivalSchedule ?? []).every(valid)) {
                fail(`door ${d.name} arrival parameters out of range`, { door: i });
            }
        });
    }

    // --- Accessors ---

    public get tickCount(): number {
        return this.currentTick;
    }

    public get floorCount(): number {
        return this.floors.length;
    }

    public getFloors(): readonly Floor[] {
        return this.floors;
    }

    public getElevators(): readonly Elevator[] {
        return this.elevators;
    }

    public getDoors(): readonly Door[] {
        return this.doors;
    }

    /** Persons inside: every floor resident plus every passenger. */
    public get population(): number {
        let n = 0;
        this.floors.forEach(f => { n += f.size; });
        this.elevators.forEach(e => { n += e.passengerCount; });
        return n;
    }

    public findPerson(personId: number): Person | undefined {
        for (const floor of this.floors) {
            const found = floor.getResidents().find(p => p.id === personId);
            if (found) return found;
        }
        for (const elevator of this.elevators) {
            const found = elevator.getPassengers().find(p => p.id === personId);
            if (found) return found;
        }
        return undefined;
    }

    /** Nobody inside and nothing left for any car to do. */
    public isDrained(): boolean {
        return this.population === 0 && this.elevators.every(e => e.isIdle);
    }

    /** The most recent events across ticks, oldest first. */
    public getEventLog(): SimulationEvent[] {
        return [...this.eventLog];
    }

    public getSnapshot(): BuildingSnapshot {
        return {
            tick: this.currentTick,
            floors: this.floors.map(f => ({
                index: f.index,
                residents: f.size,
                waiting: f.getResidents().filter(isWaiting).length
            })),
            elevators: this.elevators.map(e => ({
                name: e.name,
                currentFloor: e.currentFloor,
                targetQueue: e.getTargetQueue(),
                passengers: e.passengerCount,
                cumulativeEnergy: e.cumulativeEnergy
            })),
            metrics: this.metrics.snapshot()
        };
    }

    /**
     * External command: send car `elevatorIndex` to `fromFloor`, then `targetFloor`.
     * An out-of-range floor raises InvalidFloor and leaves the car untouched.
     */
    public requestElevator(elevatorIndex: number, fromFloor: number, targetFloor: number) {
        const elevator = this.elevators[elevatorIndex];
        if (!elevator) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `no elevator ${elevatorIndex}`, { elevator: elevatorIndex });
        }
        elevator.request(fromFloor, targetFloor);
    }

    // --- Tick orchestration ---

    private emit(type: SimulationEventType, fields: Omit<SimulationEvent, 'id' | 'type' | 'tick'>) {
        this.events.push({
            id: `${this.currentTick}-${this.events.length}`,
            type,
            tick: this.currentTick,
            ...fields
        });
    }

    private dispatch(person: Person, fromFloor: number, targetFloor: number, door: Door | null) {
        const chosen = this.dispatchPolicy.selectElevator({
            fromFloor,
            door,
            elevators: this.elevators,
            model: this.model
        });
        this.elevators[chosen].request(fromFloor, targetFloor, { person, tick: this.currentTick });
        this.requestsThisTick++;
        this.emit(SimulationEventType.DISPATCH, { personId: person.id, elevator: chosen, floor: targetFloor, door: door?.name });
    }

    /**
     * Processes one full tick and returns what happened in it.
     * Runtime consistency errors propagate: the run is over if one is thrown.
     */
    public tick(): TickReport {
        const tick = this.currentTick;
        const ground = this.floors[0];

        this.events = [];
        this.requestsThisTick = 0;
        const perElevatorEnergyDelta: number[] = this.elevators.map(() => 0);
        const waitSamples: WaitSample[] = [];
        const sink: MetricsSink = {
            recordEnergy: (elevator, delta, t) => {
                this.metrics.recordEnergy(elevator, delta, t);
                perElevatorEnergyDelta[elevator] += delta;
            },
            recordWait: sample => {
                this.metrics.recordWait(sample);
                waitSamples.push(sample);
            }
        };
        let arrivals = 0;
        let departures = 0;
        let boardings = 0;
        let alightings = 0;

        // 1. ARRIVALS
        for (const door of this.doors) {
            const p = door.arrivalProbabilityAt(tick);
            const count = door.arrivalProcess === ArrivalProcess.POISSON
                ? this.model.samplePoisson(p)
                : (this.model.sampleBernoulli(p) ? 1 : 0);

            for (let i = 0; i < count; i++) {
                const person = createPerson(this.nextPersonId++, door.name, tick);
                ground.admit(person);
                arrivals++;
                this.emit(SimulationEventType.ARRIVAL, { personId: person.id, floor: 0, door: door.name });
            }
        }

        // 2. DISPATCH (ground floor, new arrivals and anyone still unassigned)
        for (const person of ground.getResidents()) {
            const justArrived = person.arrivalTick === tick && person.trips === 0 && person.destinationFloor === null;
            if (!justArrived && !isAwaitingDispatch(person)) continue;

            const destination = person.destinationFloor ?? ground.sampleDestination(this.model);
            if (destination === null) continue; // ground sends nobody upstairs; stays a resident

            const door = justArrived ? this.doorsByName.get(person.doorName) ?? null : null;
            this.dispatch(person, 0, destination, door);
        }

        // 3. ELEVATOR STEPS (ascending index)
        for (const elevator of this.elevators) {
            if (elevator.isIdle && elevator.restingFloor !== null && elevator.currentFloor !== elevator.restingFloor) {
                elevator.sendTo(elevator.restingFloor);
                this.emit(SimulationEventType.REST, { elevator: elevator.index, floor: elevator.restingFloor });
            }

            const result = elevator.step(tick, this.floors, sink);
            if (result.toFloor !== result.fromFloor) {
                this.emit(SimulationEventType.MOVE, { elevator: elevator.index, floor: result.toFloor });
            }
            for (const sample of result.boarded) {
                boardings++;
                this.emit(SimulationEventType.BOARD, { personId: sample.personId, elevator: elevator.index, floor: sample.fromFloor });
            }
            for (const { person, floor } of result.alighted) {
                alightings++;
                this.emit(SimulationEventType.ALIGHT, { personId: person.id, elevator: elevator.index, floor });
            }
        }

        // 4. FLOOR TRANSITIONS (upper floors)
        for (const floor of this.floors) {
            if (floor.isGround) continue;
            for (const person of floor.getResidents()) {
                if (!isIdleResident(person, tick)) continue;

                const transition = floor.sampleTransition(person, this.model);
                if (transition.kind === 'requestFloor') {
                    this.dispatch(person, floor.index, transition.targetFloor, null);
                } else if (transition.kind === 'leave') {
                    throw new SimulationError(SimulationErrorKind.INVALID_TRANSITION, `person ${person.id} sampled Leave on floor ${floor.index}`, { personId: person.id, floor: floor.index });
                }
            }
        }

        // 5. EXITS (ground floor)
        for (const person of ground.getResidents()) {
            if (!isIdleResident(person, tick)) continue;

            const transition = ground.sampleTransition(person, this.model);
            if (transition.kind === 'leave') {
                ground.remove(person.id);
                departures++;
                this.emit(SimulationEventType.DEPARTURE, { personId: person.id, floor: 0 });
            } else if (transition.kind === 'requestFloor') {
                this.dispatch(person, 0, transition.targetFloor, null);
            }
        }

        // Commit
        this.metrics.commitTick(tick);
        this.totalArrivals += arrivals;
        this.totalDepartures += departures;

        this.eventLog.push(...this.events);
        if (this.eventLog.length > MAX_EVENT_LOG) {
            this.eventLog = this.eventLog.slice(this.eventLog.length - MAX_EVENT_LOG);
        }

        const report: TickReport = {
            tick,
            arrivals,
            departures,
            boardings,
            alightings,
            requests: this.requestsThisTick,
            energyDelta: perElevatorEnergyDelta.reduce((a, b) => a + b, 0),
            perElevatorEnergyDelta,
            waitSamples,
            population: this.population,
            events: [...this.events]
        };

        this.currentTick++;
        return report;
    }

    /**
     * Runs up to `nTicks` ticks, stopping early on drain or when `shouldStop` says so.
     */
    public run(nTicks: number, options: RunOptions = {}): RunSummary {
        if (!Number.isInteger(nTicks) || nTicks < 0) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `tick count must be a non-negative integer, got ${nTicks}`);
        }

        const arrivalsBefore = this.totalArrivals;
        const departuresBefore = this.totalDepartures;
        const reports: TickReport[] = [];
        let stopReason = StopReason.TICKS_COMPLETE;
        let ticksRun = 0;

        while (ticksRun < nTicks) {
            const report = this.tick();
            ticksRun++;
            if (options.collectReports) reports.push(report);
            options.onTick?.(report);

            if (options.drain && this.isDrained()) {
                stopReason = StopReason.DRAINED;
                break;
            }
            if (options.shouldStop && options.shouldStop(report)) {
                stopReason = StopReason.STOPPED;
                break;
            }
        }

        return {
            ticksRun,
            stopReason,
            metrics: this.metrics.snapshot(),
            totalArrivals: this.totalArrivals - arrivalsBefore,
            totalDepartures: this.totalDepartures - departuresBefore,
            finalPopulation: this.population,
            reports
        };
    }
}
