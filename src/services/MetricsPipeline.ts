// src/services/MetricsPipeline.ts
import fs from 'fs-extra';
import path from 'node:path';

import { CustomError, errorMessage, isRecoverable } from 'App/errors/CustomError';
import { annotateSummary, type EnergyConfig } from 'App/services/EnergyModel';
import {
  aggregateRecords,
  summarizeRaw,
  type StatisticsByMetric,
} from 'App/services/MetricsAggregator';
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
  findScalarFiles,
  parseSweptParameter,
  readScalarFile,
  reduceArtifact,
  toMetricRecords,
  type ParameterContext,
  type ScalarEntry,
} from 'App/services/ScalarFileParser';
import {
  SUMMARY_FILE,
  writeComparison,
  type ComparisonOutputs,
} from 'App/services/ScenarioComparator';
import {
  ENERGY_FIELDS,
  METRIC_LABELS,
  METRIC_NAMES,
  type EnergyAnnotation,
  type MetricName,
  type MetricRecord,
  type MetricValues,
  type ScenarioSummary,
} from 'App/types/experiment';
import { fileStamp } from 'App/utils/stamp';

export interface RunRoot {
  dir: string;
  parameterValue: number;
}

export interface PipelineOptions {
  /** Enables energy annotation of every row. */
  energyConfig?: EnergyConfig | null;
  /** Metrics drawn and given their own workbook sheet. */
  metrics?: MetricName[];
  chartTypes?: ChartType[];
  statistics?: StatisticsByMetric;
}

const POWER_BREAKDOWN: ReadonlyArray<{ key: keyof EnergyAnnotation['breakdown']; label: string }> = [
  { key: 'idleW', label: 'Idle' },
  { key: 'processingW', label: 'Processing' },
  { key: 'ueW', label: 'UEs' },
  { key: 'txW', label: 'Transmission' },
];

export const DEFAULT_METRICS: MetricName[] = ['throughput', 'delay', 'procDemandPerGnb'];

export interface SkippedArtifact {
  filePath: string;
  code: string;
  reason: string;
}

export interface FileSummary {
  source: string;
  parameterValue: number;
  metrics: MetricValues;
}

export interface PipelineReport {
  scenarioId: string;
  label: string;
  outputDir: string;
  artifacts: number;
  skipped: SkippedArtifact[];
  summary: ScenarioSummary | null;
  files: string[];
}

/** toy3 → "Solution 3"; other identifiers are kept. */
export function scenarioLabel(scenarioId: string): string {
  const m = scenarioId.match(/^toy(\d+)$/i);
  return m ? `Solution ${m[1]}` : scenarioId;
}

interface Collected {
  records: MetricRecord[];
  perFile: FileSummary[];
  raw: Array<{ source: string; parameterValue: number; scalar: ScalarEntry }>;
  skipped: SkippedArtifact[];
}

async function collect(
  scenarioId: string,
  inputs: Array<{ filePath: string; context?: ParameterContext }>,
): Promise<Collected> {
  const out: Collected = { records: [], perFile: [], raw: [], skipped: [] };
  for (const { filePath, context } of inputs) {
    try {
      const parameterValue = parseSweptParameter(filePath, context);
      const parsed = await readScalarFile(filePath);
      const values = reduceArtifact(parsed);
      const records = toMetricRecords(values, scenarioId, parameterValue, filePath);
      out.records.push(...records);
      const metrics: MetricValues = {};
      for (const r of records) metrics[r.metric] = r.value;
      out.perFile.push({ source: filePath, parameterValue, metrics });
      for (const scalar of parsed.scalars) out.raw.push({ source: filePath, parameterValue, scalar });
    } catch (e) {
      if (!isRecoverable(e)) throw e;
      const code = e instanceof CustomError ? e.code : 'UNKNOWN';
      console.warn(`[Pipeline] Skipping ${filePath}: ${errorMessage(e)}`);
      out.skipped.push({ filePath, code, reason: errorMessage(e) });
    }
  }
  return out;
}

function scalarNameCounts(raw: Collected['raw']): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const { scalar } of raw) counts.set(scalar.name, (counts.get(scalar.name) || 0) + 1);
  return Array.from(counts.entries()).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function scenarioCharts(
  summary: ScenarioSummary,
  metrics: MetricName[] = DEFAULT_METRICS,
  chartTypes: ChartType[] = ['line'],
): ChartSpec[] {
  const x = summary.rows.map(r => r.parameterValue);
  const charts: ChartSpec[] = [];
  const add = (title: string, yLabel: string, values: Array<number | null>) => {
    if (!values.some(v => v !== null)) return;
    for (const type of chartTypes) {
      charts.push({
        title: `${summary.label}: ${title} (${type})`,
        type,
        xLabel: 'TX power [dBm]',
        yLabel,
        x,
        series: [{ name: summary.label, values }],
      });
    }
  };
  for (const metric of metrics) {
    add(
      `${METRIC_LABELS[metric]} vs TX power`,
      summary.units[metric] ?? '',
      summary.rows.map(r => r.metrics[metric] ?? null),
    );
  }
  for (const { field, label, unit } of ENERGY_FIELDS) {
    add(`${label} vs TX power`, unit, summary.rows.map(r => r.energy?.[field] ?? null));
  }
  if (summary.rows.some(r => r.energy)) {
    charts.push({
      title: `${summary.label}: Power breakdown (bar)`,
      type: 'bar',
      xLabel: 'TX power [dBm]',
      yLabel: 'W',
      x,
      series: POWER_BREAKDOWN.map(({ key, label }) => ({
        name: label,
        values: summary.rows.map(r => r.energy?.breakdown[key] ?? null),
      })),
    });
  }
  return charts;
}

function summaryTable(summary: ScenarioSummary): Table {
  const metricCols = METRIC_NAMES.filter(m => summary.units[m]);
  const withEnergy = summary.rows.some(r => r.energy);
  const energyCols = withEnergy
    ? [
        'txPowerW',
        'powerW',
        'energyJ',
        'energyWh',
        'energyKwh',
        'efficiency',
        'efficiencyIndex',
        'clamped',
        ...POWER_BREAKDOWN.map(b => b.key),
      ]
    : [];
  return {
    name: 'By parameter',
    columns: [
      'parameterValue',
      ...metricCols.map(m => `${m} [${summary.units[m]}]`),
      ...energyCols,
    ],
    rows: summary.rows.map(r => [
      r.parameterValue,
      ...metricCols.map(m => r.metrics[m]),
      ...(withEnergy
        ? [
            r.energy?.txPowerW,
            r.energy?.powerW,
            r.energy?.energyJ,
            r.energy?.energyWh,
            r.energy?.energyKwh,
            r.energy?.efficiency,
            r.energy?.efficiencyIndex,
            r.energy?.clamped ?? '',
            ...POWER_BREAKDOWN.map(b => r.energy?.breakdown[b.key]),
          ]
        : []),
    ]),
  };
}

/**
 * Writes every per-scenario output of one analysis into outputDir and returns the
 * written paths.
 */
async function writeScenarioOutputs(
  summary: ScenarioSummary,
  collected: Collected,
  outputDir: string,
  options: PipelineOptions,
): Promise<string[]> {
  const metrics = options.metrics?.length ? options.metrics : DEFAULT_METRICS;
  const files: string[] = [];

  files.push(await writeJson(path.join(outputDir, 'summary_by_file.json'), collected.perFile));
  files.push(await writeJson(path.join(outputDir, SUMMARY_FILE), summary));

  const raw: Table = {
    name: 'Raw scalars',
    columns: ['source', 'parameterValue', 'module', 'name', 'value'],
    rows: collected.raw.map(r => [r.source, r.parameterValue, r.scalar.module, r.scalar.name, r.scalar.value]),
  };
  files.push(await writeCsv(path.join(outputDir, 'scalars_raw.csv'), raw));
  const counts: Table = {
    name: 'Scalar names',
    columns: ['name', 'count'],
    rows: scalarNameCounts(collected.raw),
  };
  files.push(await writeCsv(path.join(outputDir, 'scalar_name_counts.csv'), counts));

  const bySummary = summaryTable(summary);
  files.push(await writeCsv(path.join(outputDir, 'summary_by_parameter.csv'), bySummary));
  const metricCounts: Table = {
    name: 'Metric counts',
    columns: ['metric', 'count'],
    rows: summarizeRaw(collected.records).map(c => [c.metric, c.count]),
  };
  files.push(await writeCsv(path.join(outputDir, 'metric_counts.csv'), metricCounts));

  const perMetric: Table[] = metrics
    .filter(m => summary.units[m])
    .map(m => ({
      name: METRIC_LABELS[m],
      columns: ['parameterValue', `${m} [${summary.units[m]}]`, 'samples'],
      rows: summary.rows.map(r => [r.parameterValue, r.metrics[m], r.samples[m]]),
    }));
  const byFile: Table = {
    name: 'By file',
    columns: ['source', 'parameterValue', ...METRIC_NAMES],
    rows: collected.perFile.map(f => [f.source, f.parameterValue, ...METRIC_NAMES.map(m => f.metrics[m])]),
  };
  files.push(
    await writeWorkbook(
      path.join(outputDir, 'metrics_summary.xlsx'),
      [bySummary, ...perMetric, byFile, counts, metricCounts],
      {
        scenario: summary.scenarioId,
        label: summary.label,
        artifacts: collected.perFile.length,
        skipped: collected.skipped.length,
      },
    ),
  );

  files.push(
    await writeChartsMarkdown(
      path.join(outputDir, 'charts.md'),
      `${summary.label} charts`,
      scenarioCharts(summary, metrics, options.chartTypes),
    ),
  );

  const readme = [
    `# ${summary.label} (${summary.scenarioId})`,
    '',
    `Generated ${new Date().toISOString()} from ${collected.perFile.length} artifact(s).`,
    '',
    '| File | Content |',
    '| --- | --- |',
    '| summary_by_file.json | one entry per artifact |',
    `| ${SUMMARY_FILE} | aggregated rows per TX power${options.energyConfig ? ', with energy annotation' : ''} |`,
    '| scalars_raw.csv | every scalar line read |',
    '| summary_by_parameter.csv | the same rows as a table, with the power breakdown |',
    '| scalar_name_counts.csv | scalar name frequencies |',
    '| metric_counts.csv | extracted values per metric |',
    '| metrics_summary.xlsx | the tables above as sheets |',
    '| charts.md | Mermaid charts |',
    '',
  ];
  if (collected.skipped.length) {
    readme.push('## Skipped artifacts', '');
    for (const s of collected.skipped) readme.push(`- ${s.filePath} (${s.code}): ${s.reason}`);
    readme.push('');
  }
  const readmePath = path.join(outputDir, 'README.md');
  await fs.outputFile(readmePath, readme.join('\n'), 'utf8');
  files.push(readmePath);
  return files;
}

async function analyze(
  scenarioId: string,
  inputs: Array<{ filePath: string; context?: ParameterContext }>,
  outDir: string,
  options: PipelineOptions,
  stamp: string,
): Promise<PipelineReport> {
  const label = scenarioLabel(scenarioId);
  const outputDir = path.join(outDir, `${scenarioId}_${stamp}`);
  const collected = await collect(scenarioId, inputs);

  const [aggregated] = aggregateRecords(collected.records, options.statistics, {
    [scenarioId]: label,
  });
  if (!aggregated) {
    console.warn(`[Pipeline] ${scenarioId}: no usable artifacts, nothing written`);
    return { scenarioId, label, outputDir, artifacts: 0, skipped: collected.skipped, summary: null, files: [] };
  }
  const summary = options.energyConfig ? annotateSummary(aggregated, options.energyConfig) : aggregated;
  const files = await writeScenarioOutputs(summary, collected, outputDir, options);
  console.log(
    `[Pipeline] ${scenarioId}: ${collected.perFile.length} artifact(s), ${summary.rows.length} parameter value(s) -> ${outputDir}`,
  );
  return {
    scenarioId,
    label,
    outputDir,
    artifacts: collected.perFile.length,
    skipped: collected.skipped,
    summary,
    files,
  };
}

/**
 * Orchestrator mode: every artifact below each root gets the root's parameter value.
 * Writes into `<outDir>/<scenarioId>_<stamp>/`.
 */
export async function analyzeRunRoots(
  scenarioId: string,
  roots: RunRoot[],
  outDir: string,
  options: PipelineOptions = {},
): Promise<PipelineReport> {
  const inputs: Array<{ filePath: string; context?: ParameterContext }> = [];
  for (const root of roots) {
    const files = await findScalarFiles(root.dir, { recursive: true });
    for (const filePath of files) {
      inputs.push({ filePath, context: { parameterValue: root.parameterValue } });
    }
  }
  return analyze(scenarioId, inputs, outDir, options, fileStamp());
}

export interface ScenarioAnalysisRequest extends PipelineOptions {
  /** Holds one `<scenario>/` folder of artifacts per scenario. */
  baseDir: string;
  scenarios: string[];
  outDir: string;
  /** Savings reference of the in-run comparison; default the first processed scenario. */
  baseline?: string;
}

export interface ScenarioAnalysisReport {
  reports: PipelineReport[];
  skippedScenarios: string[];
  comparison: ComparisonOutputs | null;
}

/**
 * Standalone mode: the swept parameter comes from each artifact's file name. Scenarios
 * without artifacts are skipped with a warning; the processed ones are compared in
 * `<outDir>/comparison_<stamp>/`.
 */
export async function analyzeScenarios(
  request: ScenarioAnalysisRequest,
): Promise<ScenarioAnalysisReport> {
  const stamp = fileStamp();
  const reports: PipelineReport[] = [];
  const skippedScenarios: string[] = [];

  for (const scenarioId of request.scenarios) {
    const files = await findScalarFiles(path.join(request.baseDir, scenarioId));
    if (!files.length) {
      console.warn(`[Pipeline] No .sca files in ${path.join(request.baseDir, scenarioId)}; ${scenarioId} skipped`);
      skippedScenarios.push(scenarioId);
      continue;
    }
    const report = await analyze(
      scenarioId,
      files.map(filePath => ({ filePath })),
      request.outDir,
      request,
      stamp,
    );
    if (report.summary) reports.push(report);
    else skippedScenarios.push(scenarioId);
  }

  const summaries = reports.flatMap(r => (r.summary ? [r.summary] : []));
  let comparison: ComparisonOutputs | null = null;
  if (summaries.length) {
    comparison = await writeComparison(
      summaries,
      path.join(request.outDir, `comparison_${stamp}`),
      {
        baseline: request.baseline ?? summaries[0].scenarioId,
        chartTypes: request.chartTypes,
      },
    );
  }
  return { reports, skippedScenarios, comparison };
}
