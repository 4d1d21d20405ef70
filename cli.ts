
import { isSimulationError } from './errors';
import { Building } from './Building';
import { runSeeds } from './BatchRunner';
import { USAGE, buildConfigFromCli, parseCliArgs } from './cliArgs';
import { renderBuilding, writeRunReport } from './reportExport';

/**
 * Command-line driver. One seed: run and print the building plus its metrics.
 * Several seeds: run each in isolation and print pooled statistics.
 */
const main = (argv: readonly string[]): number => {
  const opts = parseCliArgs(argv);
  if (opts.help) {
    console.log(USAGE);
    return 0;
  }

  const config = buildConfigFromCli(opts);
  const runOptions = { drain: opts.drain, collectReports: opts.outPath !== null };

  if (opts.seeds.length > 1) {
    console.log(`Running seeds: ${opts.seeds.join(', ')} (ticks=${opts.ticks})`);
    const batch = runSeeds(config, opts.seeds, opts.ticks, runOptions);
    for (const run of batch.runs) {
      const m = run.summary.metrics;
      console.log(`seed=${run.seed} ticks=${run.summary.ticksRun} energy=${m.totalEnergy.toFixed(2)} wait=${m.meanWaitTime.toFixed(2)} rides=${m.sampleCount}`);
    }
    console.log('---- pooled ----');
    console.log(`energy/run=${batch.totalEnergyStats.mean.toFixed(2)} ±${batch.totalEnergyStats.stdDev.toFixed(2)}`);
    console.log(`wait=${batch.pooled.meanWaitTime.toFixed(2)} p90=${batch.pooled.waitTimeP90} max=${batch.pooled.maxWaitTime}`);
    return 0;
  }

  const building = new Building(config);
  const summary = building.run(opts.ticks, {
    ...runOptions,
    onTick: opts.watch
      ? () => console.log(renderBuilding(building.getSnapshot()) + '\n')
      : undefined
  });

  console.log(renderBuilding(building.getSnapshot()));
  console.log(`Stopped: ${summary.stopReason} after ${summary.ticksRun} ticks (${summary.totalArrivals} arrivals, ${summary.totalDepartures} departures)`);

  if (opts.outPath) {
    writeRunReport(opts.outPath, summary);
    console.log(`Report written to ${opts.outPath}`);
  }
  return 0;
};

try {
  process.exitCode = main(process.argv.slice(2));
} catch (err) {
  if (isSimulationError(err)) {
    console.error(err.message);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
