
import { DispatchStrategy } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import type { Door } from './Door';
import type { Elevator } from './Elevator';
import type { ProbabilityModel } from './ProbabilityModel';

/**
 * Everything a policy may look at when choosing a car.
 */
export interface DispatchContext {
    /** Floor the request is made from */
    fromFloor: number;
    /** Entrance the person used, when the request comes straight from an arrival */
    door: Door | null;
    elevators: readonly Elevator[];
    model: ProbabilityModel;
}

export interface DispatchPolicy {
    name: string;
    /** Index into `ctx.elevators` */
    selectElevator(ctx: DispatchContext): number;
}

/**
 * Deterministic arg-min; ties go to the lowest index.
 */
const pickLowest = (elevators: readonly Elevator[], score: (e: Elevator) => number): number => {
    let best = 0;
    let bestScore = Number.POSITIVE_INFINITY;
    for (let i = 0; i < elevators.length; i++) {
        const s = score(elevators[i]);
        if (s < bestScore) { bestScore = s; best = i; }
    }
    return best;
};

/**
 * Probabilistic choice by distance. Arrivals weigh cars by their distance from the door
 * they came in through; everyone else by how many floors away each car is.
 */
const createDoorWeighted = (weighting: (d: number) => number): DispatchPolicy => ({
    name: 'Door Weighted',
    selectElevator(ctx) {
        if (ctx.door) {
            return ctx.model.sampleCategorical(ctx.door.elevatorWeights(ctx.elevators));
        }
        const weights = ctx.elevators.map(e => weighting(Math.abs(e.currentFloor - ctx.fromFloor)));
        return ctx.model.sampleCategorical(weights);
    }
});

const Nearest: DispatchPolicy = {
    name: 'Nearest Car',
    selectElevator(ctx) {
        return pickLowest(ctx.elevators, e => Math.abs(e.currentFloor - ctx.fromFloor));
    }
};

const LeastLoaded: DispatchPolicy = {
    name: 'Least Loaded',
    selectElevator(ctx) {
        return pickLowest(ctx.elevators, e => e.load);
    }
};

// Holds a cursor, so each Building gets its own instance
const createRoundRobin = (): DispatchPolicy => {
    let next = 0;
    return {
        name: 'Round Robin',
        selectElevator(ctx) {
            const chosen = next % ctx.elevators.length;
            next = chosen + 1;
            return chosen;
        }
    };
};

export const createDispatchPolicy = (strategy: DispatchStrategy, weighting: (d: number) => number): DispatchPolicy => {
    switch (strategy) {
        case DispatchStrategy.DOOR_WEIGHTED:
            return createDoorWeighted(weighting);
        case DispatchStrategy.NEAREST:
            return Nearest;
        case DispatchStrategy.ROUND_ROBIN:
            return createRoundRobin();
        case DispatchStrategy.LEAST_LOADED:
            return LeastLoaded;
        default:
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `unknown dispatch strategy ${String(strategy)}`);
    }
};
