// src/services/ScalarFileParser.ts
import fs from 'fs-extra';
import path from 'node:path';

import {
  ArtifactUnreadableError,
  errorMessage,
  ParameterNotFoundError,
} from 'App/errors/CustomError';
import {
  METRIC_NAMES,
  type MetricName,
  type MetricRecord,
  type MetricUnit,
} from 'App/types/experiment';

/* -------------------------------------------------------------------------------------------------
 * Scalar file grammar
 * ------------------------------------------------------------------------------------------------- */

export interface ScalarEntry {
  module: string;
  name: string;
  value: number;
}

export interface ParsedScalarFile {
  attributes: Record<string, string>;
  scalars: ScalarEntry[];
}

const ATTR_LINE = /^attr\s+(\S+)\s+(.+)$/;
// scientific notation and quoted module/name tokens both occur
const SCALAR_LINE =
  /^scalar\s+(".*?"|\S+)\s+(".*?"|\S+)\s+([+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)(?:\s|$)/;

function unquote(raw: string): string {
  const s = raw.trim();
  if (s.length >= 2 && (s[0] === '"' || s[0] === "'") && s[s.length - 1] === s[0]) {
    return s.slice(1, -1);
  }
  return s;
}

export function parseScalarText(text: string): ParsedScalarFile {
  const attributes: Record<string, string> = {};
  const scalars: ScalarEntry[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line) continue;
    const attr = line.match(ATTR_LINE);
    if (attr) {
      attributes[attr[1]] = unquote(attr[2]);
      continue;
    }
    const sc = line.match(SCALAR_LINE);
    if (sc) {
      scalars.push({
        module: unquote(sc[1]),
        name: unquote(sc[2]),
        value: Number(sc[3]),
      });
    }
  }
  return { attributes, scalars };
}

/* -------------------------------------------------------------------------------------------------
 * Swept parameter
 * ------------------------------------------------------------------------------------------------- */

export interface ParameterContext {
  /** Value the orchestrator invoked the simulator with; wins over any file name pattern. */
  parameterValue?: number;
}

const PARAM_IN_NAME = /(\d+)dBm/i;
const PARAM_POT_SUFFIX = /_pot(\d+)/i;
const PARAM_POT_DIR = /(?:^|[\\/])Pot(\d+)(?:[\\/]|$)/;

/**
 * Resolves the swept parameter of one artifact. Throws ParameterNotFoundError when
 * neither the context nor the path carries it.
 */
export function parseSweptParameter(
  filePath: string,
  context?: ParameterContext,
): number {
  if (context?.parameterValue !== undefined && Number.isFinite(context.parameterValue)) {
    return context.parameterValue;
  }
  const base = path.basename(filePath);
  const m = base.match(PARAM_IN_NAME) || base.match(PARAM_POT_SUFFIX);
  if (m) return Number(m[1]);
  const dir = path.dirname(filePath).match(PARAM_POT_DIR);
  if (dir) return Number(dir[1]);
  throw new ParameterNotFoundError(filePath);
}

/* -------------------------------------------------------------------------------------------------
 * Unit heuristics
 * ------------------------------------------------------------------------------------------------- */

/** Above this a throughput value is taken as bit/s. */
export const THROUGHPUT_BPS_THRESHOLD = 1e5;
/** Below this a delay value is taken as seconds. */
export const DELAY_SECONDS_THRESHOLD = 10;

export interface NormalizedValue<U extends MetricUnit> {
  value: number;
  unit: U;
}

export function normalizeThroughput(value: number): NormalizedValue<'Mbps'> {
  return {
    value: value > THROUGHPUT_BPS_THRESHOLD ? value / 1e6 : value,
    unit: 'Mbps',
  };
}

export function normalizeDelay(value: number): NormalizedValue<'ms'> {
  return {
    value: value < DELAY_SECONDS_THRESHOLD ? value * 1000 : value,
    unit: 'ms',
  };
}

const finite = (values: number[]) => values.filter(v => Number.isFinite(v));

export function median(values: number[]): number {
  const sorted = finite(values).sort((a, b) => a - b);
  if (!sorted.length) return Number.NaN;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

/**
 * One decision per artifact: the median picks the scale, every value follows it.
 * Non-finite values are dropped.
 */
export function normalizeThroughputSeries(values: number[]): number[] {
  const vals = finite(values);
  if (!vals.length) return [];
  return median(vals) > THROUGHPUT_BPS_THRESHOLD ? vals.map(v => v / 1e6) : vals;
}

export function normalizeDelaySeries(values: number[]): number[] {
  const vals = finite(values);
  if (!vals.length) return [];
  return median(vals) < DELAY_SECONDS_THRESHOLD ? vals.map(v => v * 1000) : vals;
}

/* -------------------------------------------------------------------------------------------------
 * Metric extraction
 * ------------------------------------------------------------------------------------------------- */

const UE_APP_MODULE = /\.ue\[(\d+)\]\.app\[(\d+)\]$/;
const GNB_MAC_MODULE = /\.gnb(\d+)\.cellularNic\.mac$/;
const UE_THROUGHPUT_NAMES = new Set([
  'cbrReceivedThroughput:mean',
  'cbrReceivedThroughtput:mean',
]);
const UE_DELAY_NAME = 'cbrFrameDelay:mean';
const GNB_PROC_NAME = 'CNProcDemand:mean';

const RADIO_PATTERNS: Array<[MetricName, RegExp, MetricUnit]> = [
  ['sinr', /sinr|snir/i, 'dB'],
  ['rsrp', /rsrp/i, 'dBm'],
  ['rsrq', /rsrq/i, 'dB'],
];

const sum = (values: number[]) => values.reduce((acc, v) => acc + v, 0);
const mean = (values: number[]) => (values.length ? sum(values) / values.length : Number.NaN);

export interface ArtifactMetrics {
  parameterValue: number;
  attributes: Record<string, string>;
  values: Partial<Record<MetricName, { value: number; unit: MetricUnit }>>;
}

/**
 * Reduces the per-entity scalars of one parsed artifact to one value per metric.
 * Metrics without matching entries are left out.
 */
export function reduceArtifact(parsed: ParsedScalarFile): ArtifactMetrics['values'] {
  const out: ArtifactMetrics['values'] = {};
  const thrRaw: number[] = [];
  const delayRaw: number[] = [];
  const procByGnb = new Map<number, number[]>();

  for (const s of parsed.scalars) {
    if (UE_APP_MODULE.test(s.module)) {
      if (UE_THROUGHPUT_NAMES.has(s.name)) thrRaw.push(s.value);
      else if (s.name === UE_DELAY_NAME) delayRaw.push(s.value);
      continue;
    }
    const gnb = s.module.match(GNB_MAC_MODULE);
    if (gnb && s.name === GNB_PROC_NAME) {
      const id = Number(gnb[1]);
      const list = procByGnb.get(id) || [];
      list.push(s.value);
      procByGnb.set(id, list);
    }
  }

  const thr = normalizeThroughputSeries(thrRaw);
  if (thr.length) {
    out.throughput = { value: sum(thr), unit: 'Mbps' };
    out.activeUes = { value: thr.filter(v => v > 0).length, unit: 'count' };
  }
  const delay = normalizeDelaySeries(delayRaw);
  if (delay.length) {
    out.delay = { value: mean(delay), unit: 'ms' };
  }
  const proc = finite(Array.from(procByGnb.values()).flat());
  if (proc.length) {
    out.procDemand = { value: sum(proc), unit: 'GOPS' };
    out.procDemandPerGnb = { value: mean(proc), unit: 'GOPS' };
    out.gnbCount = { value: procByGnb.size, unit: 'count' };
  }
  for (const [metric, pattern, unit] of RADIO_PATTERNS) {
    const vals = finite(parsed.scalars.filter(s => pattern.test(s.name)).map(s => s.value));
    if (vals.length) out[metric] = { value: mean(vals), unit };
  }
  return out;
}

export async function readScalarFile(filePath: string): Promise<ParsedScalarFile> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new ArtifactUnreadableError(filePath, errorMessage(e));
  }
  const parsed = parseScalarText(text);
  if (!parsed.scalars.length && !Object.keys(parsed.attributes).length) {
    throw new ArtifactUnreadableError(filePath, 'no attr or scalar lines');
  }
  return parsed;
}

export async function readArtifactMetrics(
  filePath: string,
  context?: ParameterContext,
): Promise<ArtifactMetrics> {
  const parameterValue = parseSweptParameter(filePath, context);
  const parsed = await readScalarFile(filePath);
  return {
    parameterValue,
    attributes: parsed.attributes,
    values: reduceArtifact(parsed),
  };
}

/** Flattens reduced artifact values into records; non-finite values are dropped. */
export function toMetricRecords(
  values: ArtifactMetrics['values'],
  scenarioId: string,
  parameterValue: number,
  source: string,
): MetricRecord[] {
  const records: MetricRecord[] = [];
  for (const metric of METRIC_NAMES) {
    const v = values[metric];
    if (!v || !Number.isFinite(v.value)) continue;
    records.push({ scenarioId, parameterValue, metric, value: v.value, unit: v.unit, source });
  }
  return records;
}

export async function extractMetricRecords(
  filePath: string,
  scenarioId: string,
  context?: ParameterContext,
): Promise<MetricRecord[]> {
  const { parameterValue, values } = await readArtifactMetrics(filePath, context);
  return toMetricRecords(values, scenarioId, parameterValue, filePath);
}

export async function findScalarFiles(
  root: string,
  opts: { recursive?: boolean } = {},
): Promise<string[]> {
  if (!(await fs.pathExists(root))) return [];
  const out: string[] = [];
  const walk = async (dir: string) => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const e of entries) {
      const full = path.join(dir, e.name);
      if (e.isDirectory()) {
        if (opts.recursive) await walk(full);
      } else if (e.isFile() && e.name.endsWith('.sca')) {
        out.push(full);
      }
    }
  };
  await walk(root);
  return out.sort();
}
