// src/services/ScenarioComparator.ts
import fs from 'fs-extra';
import path from 'node:path';
import { z } from 'zod';

import {
  errorMessage,
  isRecoverable,
  NotFoundError,
  ScenarioNotFoundError,
  ValidationError,
} from 'App/errors/CustomError';
import {
  writeChartsMarkdown,
  writeCsv,
  writeJson,
  writeWorkbook,
  type ChartSpec,
  type ChartType,
  type Table,
} from 'App/services/ReportWriter';
import {
  ENERGY_FIELDS,
  METRIC_LABELS,
  METRIC_NAMES,
  METRIC_UNITS,
  type ComparisonEntry,
  type ComparisonRow,
  type ComparisonTable,
  type EnergyThroughputPoint,
  type MarginalGainRow,
  type MetricName,
  type MetricUnit,
  type SavingsRow,
  type ScenarioSummary,
} from 'App/types/experiment';
import { fileStamp } from 'App/utils/stamp';

export const SUMMARY_FILE = 'summary_by_parameter.json';

/* -------------------------------------------------------------------------------------------------
 * Stored summaries
 * ------------------------------------------------------------------------------------------------- */

const metricName = z.enum(METRIC_NAMES);

const energySchema = z.object({
  txPowerW: z.number(),
  powerW: z.number(),
  energyJ: z.number(),
  energyWh: z.number(),
  energyKwh: z.number(),
  efficiency: z.number(),
  efficiencyIndex: z.number(),
  clamped: z.enum(['min', 'max']).nullable(),
  breakdown: z.object({
    idleW: z.number(),
    processingW: z.number(),
    ueW: z.number(),
    txW: z.number(),
  }),
});

export const scenarioSummarySchema = z.object({
  scenarioId: z.string().min(1),
  label: z.string(),
  units: z.record(metricName, z.enum(METRIC_UNITS)),
  rows: z.array(
    z.object({
      scenarioId: z.string(),
      parameterValue: z.number(),
      metrics: z.record(metricName, z.number()),
      samples: z.record(metricName, z.number()),
      energy: energySchema.optional(),
    }),
  ),
});

export async function loadScenarioSummary(dir: string): Promise<ScenarioSummary> {
  const file = path.join(dir, SUMMARY_FILE);
  let raw: unknown;
  try {
    raw = await fs.readJSON(file);
  } catch (e) {
    throw new ValidationError(`Cannot read ${file}: ${errorMessage(e)}`);
  }
  const parsed = scenarioSummarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid scenario summary ${file}`,
      parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

/**
 * Newest directory (by mtime) named `<scenarioId>_<suffix>` that holds a summary,
 * searched up to `maxDepth` levels below root.
 */
export async function discoverScenario(
  root: string,
  scenarioId: string,
  maxDepth = 3,
): Promise<string> {
  const prefix = `${scenarioId}_`;
  const candidates: Array<{ dir: string; mtimeMs: number }> = [];

  const walk = async (dir: string, depth: number) => {
    if (depth > maxDepth) return;
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const e of entries) {
      if (!e.isDirectory()) continue;
      const full = path.join(dir, e.name);
      if (e.name.startsWith(prefix) && (await fs.pathExists(path.join(full, SUMMARY_FILE)))) {
        const st = await fs.stat(full);
        candidates.push({ dir: full, mtimeMs: st.mtimeMs });
      }
      await walk(full, depth + 1);
    }
  };

  if (await fs.pathExists(root)) await walk(root, 1);
  if (!candidates.length) throw new ScenarioNotFoundError(scenarioId, root);
  candidates.sort((a, b) => b.mtimeMs - a.mtimeMs || a.dir.localeCompare(b.dir));
  return candidates[0].dir;
}

/* -------------------------------------------------------------------------------------------------
 * Table operations
 * ------------------------------------------------------------------------------------------------- */

/**
 * One row per parameter value present in any summary. Cells stay absent where a scenario
 * has no data; a metric reported in different units by two scenarios is dropped.
 */
export function mergeSummaries(summaries: ScenarioSummary[]): ComparisonTable {
  const unitsSeen = new Map<MetricName, Set<MetricUnit>>();
  for (const s of summaries) {
    for (const metric of METRIC_NAMES) {
      const unit = s.units[metric];
      if (!unit) continue;
      const set = unitsSeen.get(metric) || new Set<MetricUnit>();
      set.add(unit);
      unitsSeen.set(metric, set);
    }
  }
  const units: ComparisonTable['units'] = {};
  const incomparableMetrics: MetricName[] = [];
  for (const metric of METRIC_NAMES) {
    const set = unitsSeen.get(metric);
    if (!set) continue;
    if (set.size > 1) incomparableMetrics.push(metric);
    else units[metric] = Array.from(set)[0];
  }
  if (incomparableMetrics.length) {
    console.warn(
      `[Compare] Unit mismatch, excluded from comparison: ${incomparableMetrics.join(', ')}`,
    );
  }

  const parameterValues = Array.from(
    new Set(summaries.flatMap(s => s.rows.map(r => r.parameterValue))),
  ).sort((a, b) => a - b);

  const rows: ComparisonRow[] = parameterValues.map(parameterValue => {
    const entries: Record<string, ComparisonEntry> = {};
    for (const s of summaries) {
      const row = s.rows.find(r => r.parameterValue === parameterValue);
      if (!row) continue;
      const metrics: ComparisonEntry['metrics'] = {};
      for (const metric of METRIC_NAMES) {
        const v = row.metrics[metric];
        if (v !== undefined && units[metric]) metrics[metric] = v;
      }
      entries[s.scenarioId] = row.energy ? { metrics, energy: row.energy } : { metrics };
    }
    return { parameterValue, entries };
  });

  return {
    scenarios: summaries.map(s => s.scenarioId),
    labels: Object.fromEntries(summaries.map(s => [s.scenarioId, s.label])),
    parameterValues,
    rows,
    units,
    incomparableMetrics,
  };
}

/**
 * Energy savings of every other scenario against the baseline, per parameter value.
 * undefined when the baseline is not part of the table.
 */
export function computeSavings(
  table: ComparisonTable,
  baselineId: string,
): SavingsRow[] | undefined {
  if (!table.scenarios.includes(baselineId)) return undefined;
  const out: SavingsRow[] = [];
  for (const row of table.rows) {
    const base = row.entries[baselineId]?.energy?.energyKwh;
    if (base === undefined) continue;
    for (const scenarioId of table.scenarios) {
      if (scenarioId === baselineId) continue;
      const e = row.entries[scenarioId]?.energy?.energyKwh;
      if (e === undefined) continue;
      out.push({
        parameterValue: row.parameterValue,
        scenarioId,
        baselineEnergyKwh: base,
        energyKwh: e,
        savingsPct: base <= 0 ? 0 : ((base - e) / base) * 100,
      });
    }
  }
  return out;
}

export function combinedView(table: ComparisonTable): EnergyThroughputPoint[] {
  const points: EnergyThroughputPoint[] = [];
  for (const row of table.rows) {
    for (const scenarioId of table.scenarios) {
      const entry = row.entries[scenarioId];
      const throughput = entry?.metrics.throughput;
      if (!entry?.energy || throughput === undefined) continue;
      points.push({
        scenarioId,
        parameterValue: row.parameterValue,
        energyKwh: entry.energy.energyKwh,
        throughput,
      });
    }
  }
  return points;
}

/** Points not dominated by any other (lower or equal energy and higher or equal throughput). */
export function paretoFront(points: EnergyThroughputPoint[]): EnergyThroughputPoint[] {
  return points
    .filter(
      p =>
        !points.some(
          q =>
            q.energyKwh <= p.energyKwh &&
            q.throughput >= p.throughput &&
            (q.energyKwh < p.energyKwh || q.throughput > p.throughput),
        ),
    )
    .sort((a, b) => a.energyKwh - b.energyKwh || b.throughput - a.throughput);
}

/** Throughput gained per extra joule between consecutive parameter values. */
export function marginalGain(summary: ScenarioSummary): MarginalGainRow[] {
  const usable = summary.rows
    .filter(r => r.energy && r.metrics.throughput !== undefined)
    .sort((a, b) => a.parameterValue - b.parameterValue);
  const out: MarginalGainRow[] = [];
  for (let i = 1; i < usable.length; i++) {
    const prev = usable[i - 1];
    const cur = usable[i];
    const dT = (cur.metrics.throughput ?? 0) - (prev.metrics.throughput ?? 0);
    const dE = (cur.energy?.energyJ ?? 0) - (prev.energy?.energyJ ?? 0);
    out.push({
      scenarioId: summary.scenarioId,
      fromParameter: prev.parameterValue,
      toParameter: cur.parameterValue,
      deltaThroughput: dT,
      deltaEnergyJ: dE,
      gain: dE === 0 ? null : dT / dE,
    });
  }
  return out;
}

/** Mean efficiency index over the parameter values a scenario has energy data for. */
export function meanEfficiencyIndex(table: ComparisonTable): Record<string, number | null> {
  const out: Record<string, number | null> = {};
  for (const id of table.scenarios) {
    const vals = table.rows.flatMap(r => {
      const e = r.entries[id]?.energy;
      return e ? [e.efficiencyIndex] : [];
    });
    out[id] = vals.length ? vals.reduce((a, v) => a + v, 0) / vals.length : null;
  }
  return out;
}

/* -------------------------------------------------------------------------------------------------
 * Outputs
 * ------------------------------------------------------------------------------------------------- */

export interface ComparisonOutputs {
  outputDir: string;
  table: ComparisonTable;
  savings?: SavingsRow[];
  points: EnergyThroughputPoint[];
  pareto: EnergyThroughputPoint[];
  marginal: MarginalGainRow[];
  files: string[];
}

function seriesByScenario(
  table: ComparisonTable,
  pick: (entry: ComparisonEntry) => number | undefined,
) {
  return table.scenarios.map(id => ({
    name: table.labels[id] ?? id,
    values: table.rows.map(r => {
      const entry = r.entries[id];
      const v = entry ? pick(entry) : undefined;
      return v === undefined ? null : v;
    }),
  }));
}

export function comparisonCharts(
  table: ComparisonTable,
  chartTypes: ChartType[] = ['line', 'bar'],
  savings?: SavingsRow[],
): ChartSpec[] {
  const charts: ChartSpec[] = [];
  const x = table.parameterValues;
  const add = (title: string, yLabel: string, series: ChartSpec['series']) => {
    if (!series.some(s => s.values.some(v => v !== null))) return;
    for (const type of chartTypes) {
      charts.push({ title: `${title} (${type})`, type, xLabel: 'TX power [dBm]', yLabel, x, series });
    }
  };

  for (const metric of ['throughput', 'delay', 'procDemandPerGnb'] as const) {
    const unit = table.units[metric];
    if (!unit) continue;
    add(`${METRIC_LABELS[metric]} per scenario`, unit, seriesByScenario(table, e => e.metrics[metric]));
  }
  for (const { field, label, unit } of ENERGY_FIELDS) {
    add(`${label} per scenario`, unit, seriesByScenario(table, e => e.energy?.[field]));
  }
  if (savings?.length) {
    const ids = Array.from(new Set(savings.map(s => s.scenarioId)));
    add(
      'Energy savings vs baseline',
      '%',
      ids.map(id => ({
        name: table.labels[id] ?? id,
        values: x.map(p => {
          const hit = savings.find(s => s.scenarioId === id && s.parameterValue === p);
          return hit ? hit.savingsPct : null;
        }),
      })),
    );
  }
  return charts;
}

/** Writes every comparison artifact for an already merged table into outputDir. */
export async function writeComparison(
  summaries: ScenarioSummary[],
  outputDir: string,
  opts: { baseline?: string; chartTypes?: ChartType[] } = {},
): Promise<ComparisonOutputs> {
  const table = mergeSummaries(summaries);
  const savings = opts.baseline ? computeSavings(table, opts.baseline) : undefined;
  if (opts.baseline && !savings) {
    console.warn(`[Compare] Baseline ${opts.baseline} not among compared scenarios; savings skipped`);
  }
  const points = combinedView(table);
  const pareto = paretoFront(points);
  const marginal = summaries.flatMap(marginalGain);
  const meanIndex = meanEfficiencyIndex(table);
  const files: string[] = [];

  await fs.ensureDir(outputDir);
  files.push(
    await writeJson(path.join(outputDir, 'comparison_table.json'), {
      ...table,
      baseline: opts.baseline ?? null,
      savings: savings ?? null,
      paretoFront: pareto,
      meanEfficiencyIndex: meanIndex,
    }),
  );

  const metricCols = METRIC_NAMES.filter(m => table.units[m]);
  const aggregate: Table = {
    name: 'Aggregate',
    columns: [
      'parameterValue',
      'scenarioId',
      'label',
      ...metricCols.map(m => `${m} [${table.units[m]}]`),
      'powerW',
      'energyJ',
      'energyKwh',
      'efficiency',
      'efficiencyIndex',
      'efficiencyPerUe',
    ],
    rows: table.rows.flatMap(r =>
      table.scenarios
        .filter(id => r.entries[id])
        .map(id => {
          const e = r.entries[id];
          const ues = e.metrics.activeUes;
          return [
            r.parameterValue,
            id,
            table.labels[id] ?? id,
            ...metricCols.map(m => e.metrics[m]),
            e.energy?.powerW,
            e.energy?.energyJ,
            e.energy?.energyKwh,
            e.energy?.efficiency,
            e.energy?.efficiencyIndex,
            e.energy && ues ? e.energy.efficiency / ues : undefined,
          ];
        }),
    ),
  };
  files.push(await writeCsv(path.join(outputDir, 'comparison_aggregate.csv'), aggregate));

  const tables: Table[] = [aggregate];
  if (opts.baseline && savings) {
    const t: Table = {
      name: `Savings vs ${opts.baseline}`,
      columns: ['parameterValue', 'scenarioId', 'baselineEnergyKwh', 'energyKwh', 'savingsPct'],
      rows: savings.map(s => [s.parameterValue, s.scenarioId, s.baselineEnergyKwh, s.energyKwh, s.savingsPct]),
    };
    files.push(await writeCsv(path.join(outputDir, `savings_vs_${opts.baseline}.csv`), t));
    tables.push(t);
  }

  const onFront = new Set(pareto.map(p => `${p.scenarioId}@${p.parameterValue}`));
  const energyVsThroughput: Table = {
    name: 'Energy vs throughput',
    columns: ['scenarioId', 'parameterValue', 'energyKwh', 'throughput', 'paretoOptimal'],
    rows: points.map(p => [
      p.scenarioId,
      p.parameterValue,
      p.energyKwh,
      p.throughput,
      onFront.has(`${p.scenarioId}@${p.parameterValue}`),
    ]),
  };
  files.push(await writeCsv(path.join(outputDir, 'energy_vs_throughput.csv'), energyVsThroughput));
  const front: Table = {
    name: 'Pareto front',
    columns: ['scenarioId', 'parameterValue', 'energyKwh', 'throughput'],
    rows: pareto.map(p => [p.scenarioId, p.parameterValue, p.energyKwh, p.throughput]),
  };
  files.push(await writeCsv(path.join(outputDir, 'pareto_front.csv'), front));
  const gains: Table = {
    name: 'Marginal gain',
    columns: ['scenarioId', 'fromParameter', 'toParameter', 'deltaThroughput', 'deltaEnergyJ', 'gain'],
    rows: marginal.map(g => [g.scenarioId, g.fromParameter, g.toParameter, g.deltaThroughput, g.deltaEnergyJ, g.gain]),
  };
  files.push(await writeCsv(path.join(outputDir, 'marginal_gain.csv'), gains));
  tables.push(energyVsThroughput, front, gains, {
    name: 'Mean efficiency index',
    columns: ['scenarioId', 'label', 'meanEfficiencyIndex'],
    rows: table.scenarios.map(id => [id, table.labels[id] ?? id, meanIndex[id]]),
  });

  files.push(
    await writeWorkbook(path.join(outputDir, 'comparison.xlsx'), tables, {
      scenarios: table.scenarios.join(', '),
      baseline: opts.baseline ?? '',
      excludedMetrics: table.incomparableMetrics.join(', '),
    }),
  );
  files.push(
    await writeChartsMarkdown(
      path.join(outputDir, 'charts.md'),
      'Scenario comparison',
      comparisonCharts(table, opts.chartTypes, savings),
    ),
  );

  return { outputDir, table, savings, points, pareto, marginal, files };
}

export interface CompareRequest {
  /** Directory searched for `<scenario>_<suffix>/summary_by_parameter.json`. */
  root: string;
  scenarios: string[];
  baseline?: string;
  /** `<outDir>/compare_<stamp>/` is created; default `<root>/comparisons`. */
  outDir?: string;
  chartTypes?: ChartType[];
}

export interface CompareReport extends ComparisonOutputs {
  found: Record<string, string>;
  missing: string[];
}

export async function compareScenarios(request: CompareRequest): Promise<CompareReport> {
  const found: Record<string, string> = {};
  const missing: string[] = [];
  const summaries: ScenarioSummary[] = [];

  for (const id of request.scenarios) {
    try {
      const dir = await discoverScenario(request.root, id);
      summaries.push(await loadScenarioSummary(dir));
      found[id] = dir;
    } catch (e) {
      if (!isRecoverable(e) && !(e instanceof ValidationError)) throw e;
      if (e instanceof ValidationError) {
        console.warn(`[Compare] ${id}: ${e.message}`);
      }
      missing.push(id);
    }
  }
  if (missing.length) {
    console.warn(`[Compare] No results for: ${missing.join(', ')}; these scenarios are left out`);
  }
  if (!summaries.length) {
    throw new NotFoundError(
      `No scenario results found under ${request.root}; run the simulations first`,
    );
  }

  const base = request.outDir ?? path.join(request.root, 'comparisons');
  const outputDir = path.join(base, `compare_${fileStamp()}`);
  const outputs = await writeComparison(summaries, outputDir, {
    baseline: request.baseline,
    chartTypes: request.chartTypes,
  });
  console.log(`[Compare] ${summaries.length} scenario(s) compared; outputs in ${outputDir}`);
  return { ...outputs, found, missing };
}
