// src/utils/cli.ts
import { splitList } from 'App/config/config';
import { ValidationError } from 'App/errors/CustomError';
import { CHART_TYPES, type ChartType } from 'App/services/ReportWriter';
import { METRIC_NAMES, type MetricName } from 'App/types/experiment';

const LIST_SEP = /[,\s]+/;

/** "20,23,26" or "20 23 26" → [20, 23, 26] */
export function parseNumberList(raw: string, option = 'value'): number[] {
  const parts = splitList(raw, LIST_SEP);
  const bad = parts.filter(p => !Number.isFinite(Number(p)));
  if (bad.length) {
    throw new ValidationError(
      `Invalid ${option}: ${bad.join(', ')}`,
      bad.map(b => ({ path: option, message: `not a number: ${b}` })),
    );
  }
  return parts.map(Number);
}

export function parseMetricList(raw: string | undefined): MetricName[] | undefined {
  if (!raw) return undefined;
  const out: MetricName[] = [];
  const unknown: string[] = [];
  for (const part of splitList(raw, LIST_SEP)) {
    const metric = METRIC_NAMES.find(m => m === part);
    if (metric) out.push(metric);
    else unknown.push(part);
  }
  if (unknown.length) {
    throw new ValidationError(
      `Unknown metric(s): ${unknown.join(', ')} (known: ${METRIC_NAMES.join(', ')})`,
    );
  }
  return out;
}

export function parseChartTypes(raw: string | undefined): ChartType[] | undefined {
  if (!raw) return undefined;
  const out: ChartType[] = [];
  for (const part of splitList(raw, LIST_SEP)) {
    const type = CHART_TYPES.find(t => t === part);
    if (!type) {
      throw new ValidationError(`Unknown chart type: ${part} (known: ${CHART_TYPES.join(', ')})`);
    }
    out.push(type);
  }
  return out;
}
