
import { ArrivalProcess, type DoorConfig, type Position } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { distance } from './mathUtils';

/**
 * The parts of a car a Door needs to measure how far away it is.
 */
export interface ElevatorPlacement {
    position: Position;
    currentFloor: number;
}

/**
 * A named entrance on the ground floor.
 */
export class Door {
    public readonly name: string;
    public readonly position: Position;
    public readonly arrivalProcess: ArrivalProcess;
    private readonly arrivalProbability: number;
    private readonly arrivalSchedule: readonly number[];
    private readonly weighting: (d: number) => number;
    private readonly floorHeight: number;

    constructor(config: DoorConfig, weighting: (d: number) => number, floorHeight: number = 1) {
        this.name = config.name;
        this.position = { ...config.position };
        this.arrivalProcess = config.arrivalProcess ?? ArrivalProcess.BERNOULLI;
        this.arrivalProbability = config.arrivalProbability;
        this.arrivalSchedule = config.arrivalSchedule ? [...config.arrivalSchedule] : [];
        this.weighting = weighting;
        this.floorHeight = floorHeight;
    }

    /**
     * Arrival parameter in effect at `tick`: the schedule entry if there is one, else the base value.
     */
    public arrivalProbabilityAt(tick: number): number {
        return tick < this.arrivalSchedule.length ? this.arrivalSchedule[tick] : this.arrivalProbability;
    }

    /**
     * Walking distance from this door to a car: across the lobby to the shaft, then up to wherever the car is.
     */
    public distanceTo(elevator: ElevatorPlacement): number {
        return distance(this.position, elevator.position) + elevator.currentFloor * this.floorHeight;
    }

    /**
     * Non-negative weights aligned with `elevators`. Closer cars weigh more.
     */
    public elevatorWeights(elevators: readonly ElevatorPlacement[]): number[] {
        if (elevators.length === 0) {
            throw new SimulationError(SimulationErrorKind.EMPTY_ELEVATOR_SET, `door ${this.name} has no elevators to choose from`, { door: this.name });
        }
        return elevators.map((e, i) => {
            const w = this.weighting(this.distanceTo(e));
            if (!Number.isFinite(w) || w < 0) {
                throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, `door ${this.name} weighting gave ${w} for elevator ${i}`, { door: this.name, elevator: i });
            }
            return w;
        });
    }
}
