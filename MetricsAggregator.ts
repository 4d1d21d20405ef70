
import type { Metrics, MetricsSink, WaitSample } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { CompensatedSum, percentile } from './mathUtils';

/**
 * Append-only accumulator for the two objectives of a run: energy (per car) and wait time (per ride).
 *
 * Only the tick orchestrator writes to it. `snapshot()` is safe at any tick boundary and never
 * changes what it reads. Aggregators from independent runs can be pooled with `merge`, which is
 * order-independent.
 */
export class MetricsAggregator implements MetricsSink {
    private readonly energyByElevator: CompensatedSum[];
    private readonly waitSamples: WaitSample[] = [];
    private waitSum = 0;
    private ticks = 0;

    constructor(elevatorCount: number) {
        this.energyByElevator = Array.from({ length: elevatorCount }, () => new CompensatedSum());
    }

    public recordEnergy(elevator: number, delta: number, _tick: number) {
        const acc = this.energyByElevator[elevator];
        if (!acc) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `no energy account for elevator ${elevator}`, { elevator });
        }
        if (!Number.isFinite(delta) || delta < 0) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `energy delta ${delta} must be non-negative`, { elevator });
        }
        acc.add(delta);
    }

    public recordWait(sample: WaitSample) {
        this.waitSamples.push({ ...sample });
        this.waitSum += sample.waitTicks;
    }

    /**
     * Marks a tick as fully processed. Used for per-tick averages.
     */
    public commitTick(_tick: number) {
        this.ticks++;
    }

    public get ticksRecorded(): number {
        return this.ticks;
    }

    public getWaitSamples(): WaitSample[] {
        return this.waitSamples.map(s => ({ ...s }));
    }

    /**
     * Folds another run's totals into this one.
     * Both aggregators must track the same number of cars.
     */
    public merge(other: MetricsAggregator) {
        if (other.energyByElevator.length !== this.energyByElevator.length) {
            throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, 'cannot merge metrics for different elevator counts', {
                ours: this.energyByElevator.length,
                theirs: other.energyByElevator.length
            });
        }
        // Snapshot first so merging an aggregator into itself doubles it
        const energy = other.energyByElevator.map(acc => acc.value);
        const samples = [...other.waitSamples];
        const ticks = other.ticks;

        energy.forEach((e, i) => this.energyByElevator[i].add(e));
        for (const s of samples) this.recordWait(s);
        this.ticks += ticks;
    }

    public snapshot(): Metrics {
        const perElevatorEnergy = this.energyByElevator.map(acc => acc.value);
        const total = new CompensatedSum();
        perElevatorEnergy.forEach(e => total.add(e));

        const sorted = this.waitSamples.map(s => s.waitTicks).sort((a, b) => a - b);
        const count = sorted.length;
        const mean = count > 0 ? this.waitSum / count : 0;
        // No spread into Math.max here: long runs produce more samples than the argument limit
        let sqDiffSum = 0;
        for (const w of sorted) sqDiffSum += (w - mean) * (w - mean);

        return {
            totalEnergy: total.value,
            meanWaitTime: mean,
            sampleCount: count,
            perElevatorEnergy,
            maxWaitTime: count > 0 ? sorted[count - 1] : 0,
            waitTimeStdDev: count > 0 ? Math.sqrt(sqDiffSum / count) : 0,
            waitTimeP50: percentile(sorted, 50),
            waitTimeP90: percentile(sorted, 90),
            averageEnergyPerTick: this.ticks > 0 ? total.value / this.ticks : 0,
            ticksRecorded: this.ticks
        };
    }
}
