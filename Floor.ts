
import type { FloorTransitionDistribution, Person, Transition } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { PROBABILITY_TOLERANCE } from './mathUtils';
import type { ProbabilityModel } from './ProbabilityModel';

/**
 * One storey of the building: its residents and the per-tick transition model they follow.
 *
 * Transition weights are laid out as [stay, destination_0 .. destination_{n-1}, leave]
 * and validated once at construction.
 */
export class Floor {
    public readonly index: number;
    private readonly residents = new Map<number, Person>();
    private readonly transitionWeights: number[];
    private readonly destinationWeights: number[];

    constructor(index: number, floorCount: number, distribution: FloorTransitionDistribution) {
        this.index = index;
        Floor.validate(index, floorCount, distribution);
        this.destinationWeights = [...distribution.destinations];
        this.transitionWeights = [distribution.stay, ...distribution.destinations, distribution.leave];
    }

    private static validate(index: number, floorCount: number, d: FloorTransitionDistribution) {
        const fail = (message: string) => {
            throw new SimulationError(SimulationErrorKind.INVALID_DISTRIBUTION, `floor ${index}: ${message}`, { floor: index });
        };

        if (d.destinations.length !== floorCount) {
            fail(`expected ${floorCount} destination probabilities, got ${d.destinations.length}`);
        }
        const all = [d.stay, ...d.destinations, d.leave];
        if (all.some(p => !Number.isFinite(p) || p < 0)) fail('probabilities must be finite and non-negative');
        if (d.destinations[index] !== 0) fail('a floor cannot request itself');
        if (index !== 0 && d.leave !== 0) fail('only the ground floor may have a leave probability');

        const sum = all.reduce((a, b) => a + b, 0);
        if (Math.abs(sum - 1) > PROBABILITY_TOLERANCE) fail(`probabilities sum to ${sum}, expected 1`);
    }

    public get isGround(): boolean {
        return this.index === 0;
    }

    public get size(): number {
        return this.residents.size;
    }

    public has(personId: number): boolean {
        return this.residents.has(personId);
    }

    /**
     * Residents in admission order. A copy, so callers may admit/remove while iterating.
     */
    public getResidents(): Person[] {
        return [...this.residents.values()];
    }

    public admit(person: Person) {
        person.location = { kind: 'floor', floor: this.index };
        this.residents.set(person.id, person);
    }

    public remove(personId: number): Person {
        const person = this.residents.get(personId);
        if (!person) {
            throw new SimulationError(SimulationErrorKind.PERSON_NOT_FOUND, `person ${personId} is not on floor ${this.index}`, { personId, floor: this.index });
        }
        this.residents.delete(personId);
        return person;
    }

    /**
     * Draws this tick's transition for a resident.
     */
    public sampleTransition(person: Person, model: ProbabilityModel): Transition {
        if (!this.residents.has(person.id)) {
            throw new SimulationError(SimulationErrorKind.PERSON_NOT_FOUND, `person ${person.id} is not on floor ${this.index}`, { personId: person.id, floor: this.index });
        }
        const idx = model.sampleCategorical(this.transitionWeights);
        if (idx === 0) return { kind: 'stay' };
        if (idx === this.transitionWeights.length - 1) return { kind: 'leave' };
        return { kind: 'requestFloor', targetFloor: idx - 1 };
    }

    /**
     * Draws a destination from the request entries only, for people who just walked in.
     * Null when this floor sends nobody anywhere.
     */
    public sampleDestination(model: ProbabilityModel): number | null {
        if (!this.destinationWeights.some(w => w > 0)) return null;
        return model.sampleCategorical(this.destinationWeights);
    }
}
