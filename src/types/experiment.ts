// src/types/experiment.ts

/* -------------------------------------------------------------------------------------------------
 * Orchestration
 * ------------------------------------------------------------------------------------------------- */

export type RunState =
  | 'pending'
  | 'running'
  | 'artifact-found'
  | 'artifact-missing'
  | 'failed';

/** One simulator invocation. A retry produces a new RunSpec with attempt + 1. */
export interface RunSpec {
  readonly scenarioConfigId: string;
  readonly parameterValue: number;
  readonly repetition: number;
  /** 1-based. */
  readonly attempt: number;
}

export interface RunResult {
  spec: RunSpec;
  exitCode: number | null;
  signal: string | null;
  expectedArtifactPath: string;
  artifactFound: boolean;
  logPath: string;
  durationSec: number;
  finishedAt: string; // ISO
  /** Set when the process could not be started or was killed by the timeout. */
  error?: string;
}

export interface RunOutcome {
  parameterValue: number;
  repetition: number;
  state: Extract<RunState, 'artifact-found' | 'failed'>;
  attempts: number;
  expectedArtifactPath: string;
  logPath: string;
  results: RunResult[];
  history: RunState[];
  /** Last lines of the final attempt's log, only for failed runs. */
  logTail?: string[];
}

export interface StatusDocument {
  scenarioConfigId: string;
  parameterValue: number;
  repetitions: number;
  maxAttempts: number;
  resultDir: string;
  resolved: number;
  failed: number;
  artifacts: string[];
  skippedExecution: boolean;
  generatedAt: string;
  runs: RunOutcome[];
}

export interface FailureManifestEntry {
  parameterValue: number;
  repetition: number;
  attempt: number;
  expectedArtifactPath: string;
  logPath: string;
  logTail?: string[];
}

/* -------------------------------------------------------------------------------------------------
 * Metrics
 * ------------------------------------------------------------------------------------------------- */

export const METRIC_NAMES = [
  'throughput',
  'activeUes',
  'delay',
  'procDemand',
  'procDemandPerGnb',
  'gnbCount',
  'sinr',
  'rsrp',
  'rsrq',
] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

export const METRIC_UNITS = ['Mbps', 'ms', 'GOPS', 'count', 'dB', 'dBm'] as const;

export type MetricUnit = (typeof METRIC_UNITS)[number];

export const METRIC_LABELS: Record<MetricName, string> = {
  throughput: 'Throughput',
  activeUes: 'Active UEs',
  delay: 'Delay',
  procDemand: 'Processing demand',
  procDemandPerGnb: 'Processing demand per gNB',
  gnbCount: 'gNB count',
  sinr: 'SINR',
  rsrp: 'RSRP',
  rsrq: 'RSRQ',
};

export interface MetricRecord {
  readonly scenarioId: string;
  readonly parameterValue: number;
  readonly metric: MetricName;
  readonly value: number;
  readonly unit: MetricUnit;
  /** Artifact the value was extracted from. */
  readonly source: string;
}

export type MetricValues = Partial<Record<MetricName, number>>;

export interface AggregatedRow {
  scenarioId: string;
  parameterValue: number;
  metrics: MetricValues;
  /** Number of contributing artifacts per metric. */
  samples: Partial<Record<MetricName, number>>;
}

export interface EnergyAnnotation {
  txPowerW: number;
  powerW: number;
  energyJ: number;
  energyWh: number;
  energyKwh: number;
  /** Mbps per watt. */
  efficiency: number;
  efficiencyIndex: number;
  /** Which bound saturated the total power, if any. */
  clamped: 'min' | 'max' | null;
  breakdown: {
    idleW: number;
    processingW: number;
    ueW: number;
    txW: number;
  };
}

export type EnergyField = 'powerW' | 'energyKwh' | 'efficiency' | 'efficiencyIndex';

export const ENERGY_FIELDS: ReadonlyArray<{ field: EnergyField; label: string; unit: string }> = [
  { field: 'energyKwh', label: 'Energy', unit: 'kWh' },
  { field: 'efficiency', label: 'Energy efficiency', unit: 'Mbps/W' },
  { field: 'efficiencyIndex', label: 'Efficiency index', unit: 'a.u.' },
  { field: 'powerW', label: 'Total power', unit: 'W' },
];

export interface EnergyAnnotatedRow extends AggregatedRow {
  energy?: EnergyAnnotation;
}

export interface ScenarioSummary {
  scenarioId: string;
  label: string;
  units: Partial<Record<MetricName, MetricUnit>>;
  rows: EnergyAnnotatedRow[];
}

/* -------------------------------------------------------------------------------------------------
 * Comparison
 * ------------------------------------------------------------------------------------------------- */

export interface ComparisonEntry {
  metrics: MetricValues;
  energy?: EnergyAnnotation;
}

export interface ComparisonRow {
  parameterValue: number;
  entries: Record<string, ComparisonEntry>;
}

export interface ComparisonTable {
  scenarios: string[];
  labels: Record<string, string>;
  parameterValues: number[];
  rows: ComparisonRow[];
  units: Partial<Record<MetricName, MetricUnit>>;
  incomparableMetrics: MetricName[];
}

export interface SavingsRow {
  parameterValue: number;
  scenarioId: string;
  baselineEnergyKwh: number;
  energyKwh: number;
  savingsPct: number;
}

export interface EnergyThroughputPoint {
  scenarioId: string;
  parameterValue: number;
  energyKwh: number;
  throughput: number;
}

export interface MarginalGainRow {
  scenarioId: string;
  fromParameter: number;
  toParameter: number;
  deltaThroughput: number;
  deltaEnergyJ: number;
  /** Mbps per joule; null when the energy did not change. */
  gain: number | null;
}
