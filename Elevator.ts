
import type { ElevatorConfig, MetricsSink, Person, Position, WaitSample } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { CompensatedSum } from './mathUtils';
import type { Floor } from './Floor';

/**
 * A person registered with this car, waiting on `fromFloor`.
 */
interface Call {
    person: Person;
    fromFloor: number;
}

/**
 * A passenger who got off, and the stop they got off at.
 */
export interface Alighting {
    person: Person;
    floor: number;
}

/**
 * What one call to `Elevator.step` did.
 */
export interface ElevatorStepResult {
    fromFloor: number;
    toFloor: number;
    energyDelta: number;
    boarded: WaitSample[];
    alighted: Alighting[];
}

/**
 * A single car.
 *
 * Stops are served strictly in request order (FIFO, no duplicates). The car moves at most one
 * floor per step and pays `energyUp` or `energyDown` for it, plus `energyPerPassenger` for each
 * rider. A call is never answered in the tick it was placed: boarding requires the request to
 * predate the current tick, so every wait is at least one tick.
 */
export class Elevator {
    public readonly index: number;
    public readonly name: string;
    public readonly position: Position;
    public readonly energyUp: number;
    public readonly energyDown: number;
    public readonly energyPerPassenger: number;
    public readonly capacity: number | null;
    public readonly restingFloor: number | null;

    private readonly floorCount: number;
    private floor: number;
    private readonly energy = new CompensatedSum();
    private targetQueue: number[] = [];
    private readonly onboard = new Map<number, Person>();
    private readonly calls = new Map<number, Call>();

    constructor(index: number, config: ElevatorConfig, floorCount: number) {
        this.index = index;
        this.name = config.name;
        this.position = { ...config.position };
        this.energyUp = config.energyUp;
        this.energyDown = config.energyDown;
        this.energyPerPassenger = config.energyPerPassenger ?? 0;
        this.capacity = config.capacity ?? null;
        this.restingFloor = config.restingFloor ?? null;
        this.floorCount = floorCount;
        this.floor = config.startingFloor ?? 0;
    }

    public get currentFloor(): number {
        return this.floor;
    }

    public get cumulativeEnergy(): number {
        return this.energy.value;
    }

    public getTargetQueue(): number[] {
        return [...this.targetQueue];
    }

    public getPassengers(): Person[] {
        return [...this.onboard.values()];
    }

    public get passengerCount(): number {
        return this.onboard.size;
    }

    public get callCount(): number {
        return this.calls.size;
    }

    /** Nothing queued, nobody aboard, nobody waiting for this car. */
    public get isIdle(): boolean {
        return this.targetQueue.length === 0 && this.onboard.size === 0 && this.calls.size === 0;
    }

    /** Outstanding work, used by load-based dispatch. */
    public get load(): number {
        return this.targetQueue.length + this.onboard.size + this.calls.size;
    }

    private assertFloor(floor: number, role: string) {
        if (!Number.isInteger(floor) || floor < 0 || floor >= this.floorCount) {
            throw new SimulationError(SimulationErrorKind.INVALID_FLOOR, `${role} floor ${floor} outside 0..${this.floorCount - 1}`, { elevator: this.index, floor });
        }
    }

    private enqueue(floor: number) {
        if (!this.targetQueue.includes(floor)) this.targetQueue.push(floor);
    }

    /**
     * Asks the car to stop at `fromFloor`, bound for `targetFloor`.
     *
     * With a caller, the person is registered as waiting on `fromFloor` and their wait clock starts at
     * `caller.tick`; the destination is queued once they board. Without one, both floors are queued
     * directly. Floors are checked before anything changes, so a rejected request leaves the car as it was.
     */
    public request(fromFloor: number, targetFloor: number, caller?: { person: Person; tick: number }) {
        this.assertFloor(fromFloor, 'origin');
        this.assertFloor(targetFloor, 'target');

        if (!caller) {
            this.enqueue(fromFloor);
            this.enqueue(targetFloor);
            return;
        }

        const { person, tick } = caller;
        if (fromFloor === targetFloor) {
            throw new SimulationError(SimulationErrorKind.INVALID_FLOOR, `person ${person.id} requested the floor they are on`, { personId: person.id, floor: fromFloor });
        }
        if (person.location.kind !== 'floor' || person.location.floor !== fromFloor) {
            throw new SimulationError(SimulationErrorKind.PERSON_NOT_FOUND, `person ${person.id} is not waiting on floor ${fromFloor}`, { personId: person.id, floor: fromFloor });
        }

        person.destinationFloor = targetFloor;
        person.waitStartTick = tick;
        person.assignedElevator = this.index;
        this.calls.set(person.id, { person, fromFloor });
        this.enqueue(fromFloor);
    }

    /**
     * Queues a floor with nobody attached (resting moves).
     */
    public sendTo(floor: number) {
        this.assertFloor(floor, 'target');
        this.enqueue(floor);
    }

    /**
     * Advances the car by one tick. See the class comment for the stop rules.
     */
    public step(tick: number, floors: readonly Floor[], sink: MetricsSink): ElevatorStepResult {
        const result: ElevatorStepResult = {
            fromFloor: this.floor,
            toFloor: this.floor,
            energyDelta: 0,
            boarded: [],
            alighted: []
        };

        if (this.targetQueue[0] === this.floor) {
            this.serveFloor(tick, floors, sink, result);
        }

        const head = this.targetQueue[0];
        if (head === undefined || head === this.floor) return result;

        const goingUp = head > this.floor;
        const delta = (goingUp ? this.energyUp : this.energyDown) + this.energyPerPassenger * this.onboard.size;
        this.floor += goingUp ? 1 : -1;
        this.energy.add(delta);
        result.toFloor = this.floor;
        result.energyDelta = delta;
        sink.recordEnergy(this.index, delta, tick);

        if (head === this.floor) {
            this.serveFloor(tick, floors, sink, result);
        }
        return result;
    }

    private serveFloor(tick: number, floors: readonly Floor[], sink: MetricsSink, result: ElevatorStepResult) {
        const here = this.floor;
        const floor = floors[here];
        this.targetQueue.splice(this.targetQueue.indexOf(here), 1);

        // Off first
        for (const person of [...this.onboard.values()]) {
            if (person.destinationFloor !== here) continue;
            this.onboard.delete(person.id);
            person.destinationFloor = null;
            person.assignedElevator = null;
            person.settledTick = tick;
            person.trips++;
            floor.admit(person);
            result.alighted.push({ person, floor: here });
        }

        let callersLeft = false;
        for (const call of [...this.calls.values()]) {
            if (call.fromFloor !== here) continue;
            const { person } = call;
            const requestTick = person.waitStartTick;
            const full = this.capacity !== null && this.onboard.size >= this.capacity;
            if (requestTick === null || requestTick >= tick || full) {
                callersLeft = true;
                continue;
            }
            const destination = person.destinationFloor;
            if (destination === null) {
                throw new SimulationError(SimulationErrorKind.INVALID_TRANSITION, `person ${person.id} is waiting without a destination`, { personId: person.id, elevator: this.index });
            }

            floor.remove(person.id);
            this.calls.delete(person.id);
            this.onboard.set(person.id, person);
            person.location = { kind: 'elevator', elevator: this.index };
            person.waitStartTick = null;

            const sample: WaitSample = {
                personId: person.id,
                elevator: this.index,
                fromFloor: here,
                toFloor: destination,
                requestTick,
                boardingTick: tick,
                waitTicks: tick - requestTick
            };
            sink.recordWait(sample);
            result.boarded.push(sample);
            this.enqueue(destination);
        }

        if (callersLeft) this.enqueue(here);
    }
}
