
import { type BuildingConfig, DispatchStrategy } from './types';
import { SimulationError, SimulationErrorKind } from './errors';
import { DEFAULT_OPTIONS, type UniformBuildingOptions, createUniformBuildingConfig } from './defaults';

export const DEFAULT_TICKS = 200;

export interface CliOptions {
  building: Partial<UniformBuildingOptions>;
  ticks: number;
  /** More than one seed switches to a batch run */
  seeds: number[];
  drain: boolean;
  outPath: string | null;
  /** Print the building after every tick */
  watch: boolean;
  help: boolean;
}

export const USAGE = `Usage: elevator-sim [options]
  --floors=N          floors including ground (default ${DEFAULT_OPTIONS.floorCount})
  --elevators=N       number of cars (default ${DEFAULT_OPTIONS.elevatorCount})
  --doors=N           number of entrances (default ${DEFAULT_OPTIONS.doorCount})
  --arrival=P         per-door arrival probability per tick (default ${DEFAULT_OPTIONS.arrivalProbability})
  --dispatch=NAME     door | nearest | round-robin | least-loaded (default door)
  --capacity=N        passengers per car
  --resting=F         floor idle cars return to
  --energy-up=E       energy per floor going up (default ${DEFAULT_OPTIONS.energyUp})
  --energy-down=E     energy per floor going down (default ${DEFAULT_OPTIONS.energyDown})
  --ticks=N           ticks to run (default ${DEFAULT_TICKS})
  --seed=N            seed (default ${DEFAULT_OPTIONS.seed})
  --seeds=A,B,C       run several seeds and pool the metrics
  --drain             stop once the building is empty
  --out=PATH          write a report (.xlsx workbook, otherwise CSV)
  --watch             draw the building after every tick
  --help`;

const DISPATCH_NAMES = new Map<string, DispatchStrategy>([
  ['door', DispatchStrategy.DOOR_WEIGHTED],
  ['nearest', DispatchStrategy.NEAREST],
  ['round-robin', DispatchStrategy.ROUND_ROBIN],
  ['least-loaded', DispatchStrategy.LEAST_LOADED]
]);

function badFlag(flag: string, value: string, expected: string): never {
  throw new SimulationError(SimulationErrorKind.INVALID_CONFIGURATION, `--${flag}=${value}: expected ${expected}`, { flag });
}

const parseInteger = (flag: string, value: string, min: number): number => {
  const n = Number(value);
  if (value.trim() === '' || !Number.isInteger(n) || n < min) return badFlag(flag, value, `an integer >= ${min}`);
  return n;
};

const parseNumber = (flag: string, value: string): number => {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) return badFlag(flag, value, 'a non-negative number');
  return n;
};

/**
 * Parses `--flag=value` arguments (process.argv minus node and script).
 */
export const parseCliArgs = (argv: readonly string[]): CliOptions => {
  const opts: CliOptions = {
    building: {},
    ticks: DEFAULT_TICKS,
    seeds: [DEFAULT_OPTIONS.seed],
    drain: false,
    outPath: null,
    watch: false,
    help: false
  };

  for (const arg of argv) {
    if (!arg.startsWith('--')) badFlag(arg, '', 'a --flag');
    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const value = eq === -1 ? '' : arg.slice(eq + 1);

    switch (flag) {
      case 'floors': opts.building.floorCount = parseInteger(flag, value, 1); break;
      case 'elevators': opts.building.elevatorCount = parseInteger(flag, value, 1); break;
      case 'doors': opts.building.doorCount = parseInteger(flag, value, 1); break;
      case 'arrival': opts.building.arrivalProbability = parseNumber(flag, value); break;
      case 'capacity': opts.building.capacity = parseInteger(flag, value, 1); break;
      case 'resting': opts.building.restingFloor = parseInteger(flag, value, 0); break;
      case 'energy-up': opts.building.energyUp = parseNumber(flag, value); break;
      case 'energy-down': opts.building.energyDown = parseNumber(flag, value); break;
      case 'ticks': opts.ticks = parseInteger(flag, value, 0); break;
      case 'seed': opts.seeds = [parseInteger(flag, value, 0)]; break;
      case 'seeds': opts.seeds = value.split(',').map(s => parseInteger(flag, s, 0)); break;
      case 'dispatch': {
        const strategy = DISPATCH_NAMES.get(value);
        if (strategy === undefined) badFlag(flag, value, [...DISPATCH_NAMES.keys()].join(' | '));
        opts.building.dispatchStrategy = strategy;
        break;
      }
      case 'drain': opts.drain = true; break;
      case 'watch': opts.watch = true; break;
      case 'help': opts.help = true; break;
      case 'out':
        if (value === '') badFlag(flag, value, 'a file path');
        opts.outPath = value;
        break;
      default:
        badFlag(flag, value, 'a known flag (see --help)');
    }
  }
  return opts;
};

/**
 * The BuildingConfig for the first seed. Batch runs swap the seed per run.
 */
export const buildConfigFromCli = (opts: CliOptions): BuildingConfig => {
  return createUniformBuildingConfig({ ...opts.building, seed: opts.seeds[0] });
};
