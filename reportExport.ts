
import { writeFileSync } from 'fs';
import * as XLSX from 'xlsx';
import type { RunSummary, TickReport } from './types';
import { type CsvRow, generateCSV } from './mathUtils';
import type { BuildingSnapshot } from './Building';

export const TICK_HEADERS = [
  'tick', 'arrivals', 'departures', 'boardings', 'alightings', 'requests', 'energyDelta', 'population', 'meanWait'
] as const;

/**
 * One flat row per tick. `meanWait` is the mean over the rides that boarded in that tick (0 if none).
 */
export const tickReportsToRows = (reports: readonly TickReport[]): CsvRow[] => {
  return reports.map(r => ({
    tick: r.tick,
    arrivals: r.arrivals,
    departures: r.departures,
    boardings: r.boardings,
    alightings: r.alightings,
    requests: r.requests,
    energyDelta: r.energyDelta,
    population: r.population,
    meanWait: r.waitSamples.length > 0
      ? r.waitSamples.reduce((a, s) => a + s.waitTicks, 0) / r.waitSamples.length
      : 0
  }));
};

export const summaryToRows = (summary: RunSummary): CsvRow[] => {
  const m = summary.metrics;
  const rows: CsvRow[] = [
    { metric: 'ticksRun', value: summary.ticksRun },
    { metric: 'stopReason', value: summary.stopReason },
    { metric: 'totalArrivals', value: summary.totalArrivals },
    { metric: 'totalDepartures', value: summary.totalDepartures },
    { metric: 'finalPopulation', value: summary.finalPopulation },
    { metric: 'totalEnergy', value: m.totalEnergy },
    { metric: 'averageEnergyPerTick', value: m.averageEnergyPerTick },
    { metric: 'sampleCount', value: m.sampleCount },
    { metric: 'meanWaitTime', value: m.meanWaitTime },
    { metric: 'maxWaitTime', value: m.maxWaitTime },
    { metric: 'waitTimeP90', value: m.waitTimeP90 }
  ];
  m.perElevatorEnergy.forEach((e, i) => rows.push({ metric: `energy[${i}]`, value: e }));
  return rows;
};

export const ticksToCSV = (reports: readonly TickReport[]): string => {
  return generateCSV(tickReportsToRows(reports), TICK_HEADERS);
};

/**
 * Two sheets: "Summary" (metric/value pairs) and "Ticks" (one row per tick).
 */
export const buildRunWorkbook = (summary: RunSummary): XLSX.WorkBook => {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(summaryToRows(summary)), 'Summary');
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet(tickReportsToRows(summary.reports), { header: [...TICK_HEADERS] }),
    'Ticks'
  );
  return wb;
};

/**
 * Writes a run to disk. `.xlsx` paths get a workbook, anything else the per-tick CSV.
 */
export const writeRunReport = (path: string, summary: RunSummary) => {
  if (path.toLowerCase().endsWith('.xlsx')) {
    const data: Buffer = XLSX.write(buildRunWorkbook(summary), { type: 'buffer', bookType: 'xlsx' });
    writeFileSync(path, data);
    return;
  }
  writeFileSync(path, ticksToCSV(summary.reports));
};

/**
 * Terminal drawing of the building, top floor first. Each line shows the floor's
 * head count and the cars standing there as [name passengers].
 */
export const renderBuilding = (snapshot: BuildingSnapshot): string => {
  const lines = [...snapshot.floors].reverse().map(f => {
    const waiting = f.waiting > 0 ? ` (${f.waiting} waiting)` : '';
    const cars = snapshot.elevators
      .filter(e => e.currentFloor === f.index)
      .map(e => `[${e.name} ${e.passengers}]`)
      .join(' ');
    return `F${f.index}\t| ${String(f.residents).padStart(3)}${waiting}\t| ${cars}`.trimEnd();
  });
  lines.push(`Tick ${snapshot.tick}`);
  lines.push(`Average wait time:\t${snapshot.metrics.meanWaitTime.toFixed(2)}`);
  lines.push(`Total energy spent:\t${snapshot.metrics.totalEnergy.toFixed(2)}`);
  return lines.join('\n');
};
