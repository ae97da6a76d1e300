// src/services/MetricsAggregator.ts
import {
  METRIC_NAMES,
  type AggregatedRow,
  type MetricName,
  type MetricRecord,
  type ScenarioSummary,
} from 'App/types/experiment';

export type Statistic = 'mean' | 'sum' | 'min' | 'max';

export type StatisticsByMetric = Partial<Record<MetricName, Statistic>>;

function reduce(values: number[], stat: Statistic): number {
  switch (stat) {
    case 'sum':
      return values.reduce((a, v) => a + v, 0);
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
    case 'mean':
    default:
      return values.reduce((a, v) => a + v, 0) / values.length;
  }
}

/**
 * Builds one row from the records of a single (scenario, parameter) group.
 * Returns null for an empty group: missing data must stay visible downstream.
 */
export function aggregateGroup(
  records: MetricRecord[],
  statistics: StatisticsByMetric = {},
): AggregatedRow | null {
  if (!records.length) return null;
  const { scenarioId, parameterValue } = records[0];
  const byMetric = new Map<MetricName, number[]>();
  for (const r of records) {
    if (r.scenarioId !== scenarioId || r.parameterValue !== parameterValue) {
      throw new Error(
        `aggregateGroup expects one group, got ${r.scenarioId}@${r.parameterValue} next to ${scenarioId}@${parameterValue}`,
      );
    }
    const list = byMetric.get(r.metric) || [];
    list.push(r.value);
    byMetric.set(r.metric, list);
  }
  const row: AggregatedRow = { scenarioId, parameterValue, metrics: {}, samples: {} };
  for (const metric of METRIC_NAMES) {
    const values = byMetric.get(metric);
    if (!values || !values.length) continue;
    row.metrics[metric] = reduce(values, statistics[metric] ?? 'mean');
    row.samples[metric] = values.length;
  }
  return row;
}

/**
 * Groups records by scenario, then by parameter value. Summaries keep the order in which
 * scenarios first appear; rows are ascending by parameter value.
 */
export function aggregateRecords(
  records: MetricRecord[],
  statistics: StatisticsByMetric = {},
  labels: Record<string, string> = {},
): ScenarioSummary[] {
  const byScenario = new Map<string, Map<number, MetricRecord[]>>();
  for (const r of records) {
    const groups = byScenario.get(r.scenarioId) || new Map<number, MetricRecord[]>();
    const list = groups.get(r.parameterValue) || [];
    list.push(r);
    groups.set(r.parameterValue, list);
    byScenario.set(r.scenarioId, groups);
  }

  const summaries: ScenarioSummary[] = [];
  for (const [scenarioId, groups] of byScenario) {
    const summary: ScenarioSummary = {
      scenarioId,
      label: labels[scenarioId] ?? scenarioId,
      units: {},
      rows: [],
    };
    const keys = Array.from(groups.keys()).sort((a, b) => a - b);
    for (const p of keys) {
      const group = groups.get(p) || [];
      for (const r of group) summary.units[r.metric] = r.unit;
      const row = aggregateGroup(group, statistics);
      if (row) summary.rows.push(row);
    }
    summaries.push(summary);
  }
  return summaries;
}

export interface MetricCount {
  metric: MetricName;
  count: number;
}

/** How often each metric was extracted, most frequent first. */
export function summarizeRaw(records: MetricRecord[]): MetricCount[] {
  const counts = new Map<MetricName, number>();
  for (const r of records) counts.set(r.metric, (counts.get(r.metric) || 0) + 1);
  return Array.from(counts, ([metric, count]) => ({ metric, count })).sort(
    (a, b) => b.count - a.count || a.metric.localeCompare(b.metric),
  );
}
