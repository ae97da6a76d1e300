import fs from 'fs-extra';
import path from 'node:path';

import { NotFoundError, ScenarioNotFoundError } from 'App/errors/CustomError';
import {
  combinedView,
  compareScenarios,
  computeSavings,
  discoverScenario,
  marginalGain,
  mergeSummaries,
  paretoFront,
  SUMMARY_FILE,
} from 'App/services/ScenarioComparator';
import type {
  EnergyAnnotatedRow,
  EnergyAnnotation,
  MetricValues,
  ScenarioSummary,
} from 'App/types/experiment';
import { makeTempDir } from './helpers/fixtures';

const energy = (energyKwh: number, energyJ: number): EnergyAnnotation => ({
  txPowerW: 0.4,
  powerW: 60,
  energyJ,
  energyWh: energyJ / 3600,
  energyKwh,
  efficiency: 0.2,
  efficiencyIndex: 0.01,
  clamped: null,
  breakdown: { idleW: 50, processingW: 6, ueW: 4, txW: 0 },
});

const row = (
  scenarioId: string,
  parameterValue: number,
  metrics: MetricValues,
  e?: EnergyAnnotation,
): EnergyAnnotatedRow => ({
  scenarioId,
  parameterValue,
  metrics,
  samples: {},
  ...(e ? { energy: e } : {}),
});

const toy1: ScenarioSummary = {
  scenarioId: 'toy1',
  label: 'Solution 1',
  units: { throughput: 'Mbps' },
  rows: [
    row('toy1', 20, { throughput: 10 }, energy(0.4, 1440)),
    row('toy1', 26, { throughput: 14 }, energy(0.5, 1800)),
  ],
};

const toy2: ScenarioSummary = {
  scenarioId: 'toy2',
  label: 'Solution 2',
  units: { throughput: 'Mbps' },
  rows: [
    row('toy2', 20, { throughput: 12 }, energy(0.3, 1080)),
    row('toy2', 23, { throughput: 13 }, energy(0.35, 1260)),
  ],
};

describe('mergeSummaries', () => {
  it('keeps every parameter value and leaves absent cells absent', () => {
    const table = mergeSummaries([toy1, toy2]);
    expect(table.scenarios).toEqual(['toy1', 'toy2']);
    expect(table.labels).toEqual({ toy1: 'Solution 1', toy2: 'Solution 2' });
    expect(table.parameterValues).toEqual([20, 23, 26]);
    expect(Object.keys(table.rows[0].entries)).toEqual(['toy1', 'toy2']);
    expect(Object.keys(table.rows[1].entries)).toEqual(['toy2']);
    expect(Object.keys(table.rows[2].entries)).toEqual(['toy1']);
    expect(table.rows[1].entries.toy2.metrics).toEqual({ throughput: 13 });
    expect(table.incomparableMetrics).toEqual([]);
  });

  it('excludes a metric reported in different units', () => {
    const a: ScenarioSummary = {
      ...toy1,
      units: { throughput: 'Mbps', sinr: 'dB' },
      rows: [row('toy1', 20, { throughput: 10, sinr: 12 })],
    };
    const b: ScenarioSummary = {
      ...toy2,
      units: { throughput: 'Mbps', sinr: 'dBm' },
      rows: [row('toy2', 20, { throughput: 12, sinr: -80 })],
    };
    const table = mergeSummaries([a, b]);
    expect(table.incomparableMetrics).toEqual(['sinr']);
    expect(table.units).toEqual({ throughput: 'Mbps' });
    expect(table.rows[0].entries.toy1.metrics).toEqual({ throughput: 10 });
    expect(table.rows[0].entries.toy2.metrics).toEqual({ throughput: 12 });
  });
});

describe('computeSavings', () => {
  it('compares each scenario against the baseline where both have energy', () => {
    const savings = computeSavings(mergeSummaries([toy1, toy2]), 'toy1');
    expect(savings).toHaveLength(1);
    expect(savings?.[0]).toMatchObject({
      parameterValue: 20,
      scenarioId: 'toy2',
      baselineEnergyKwh: 0.4,
      energyKwh: 0.3,
    });
    expect(savings?.[0].savingsPct).toBeCloseTo(25, 10);
  });

  it('is undefined for a baseline that is not in the table', () => {
    expect(computeSavings(mergeSummaries([toy1, toy2]), 'toy9')).toBeUndefined();
  });

  it('reports zero savings against a zero-energy baseline', () => {
    const zero: ScenarioSummary = { ...toy1, rows: [row('toy1', 20, { throughput: 1 }, energy(0, 0))] };
    const savings = computeSavings(mergeSummaries([zero, toy2]), 'toy1');
    expect(savings?.map(s => s.savingsPct)).toEqual([0]);
  });
});

describe('energy/throughput trade-off', () => {
  it('keeps only the non-dominated points, cheapest first', () => {
    const points = combinedView(mergeSummaries([toy1, toy2]));
    expect(points).toHaveLength(4);
    expect(paretoFront(points).map(p => `${p.scenarioId}@${p.parameterValue}`)).toEqual([
      'toy2@20',
      'toy2@23',
      'toy1@26',
    ]);
  });

  it('computes throughput gained per extra joule', () => {
    const [gain] = marginalGain(toy1);
    expect(gain).toMatchObject({
      scenarioId: 'toy1',
      fromParameter: 20,
      toParameter: 26,
      deltaThroughput: 4,
      deltaEnergyJ: 360,
    });
    expect(gain.gain).toBeCloseTo(4 / 360, 12);
  });

  it('has no gain when the energy does not change', () => {
    const flat: ScenarioSummary = {
      ...toy1,
      rows: [row('toy1', 20, { throughput: 10 }, energy(0.4, 1440)), row('toy1', 26, { throughput: 11 }, energy(0.4, 1440))],
    };
    expect(marginalGain(flat)[0].gain).toBeNull();
  });
});

describe('stored results', () => {
  let root: string;

  const store = async (dir: string, summary: ScenarioSummary, mtime: Date) => {
    await fs.outputJSON(path.join(dir, SUMMARY_FILE), summary);
    await fs.utimes(dir, mtime, mtime);
  };

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('finds the newest result directory of a scenario', async () => {
    await store(path.join(root, 'toy1_old'), toy1, new Date('2025-01-01T00:00:00Z'));
    await store(path.join(root, 'batch', 'toy1_new'), toy1, new Date('2025-03-01T00:00:00Z'));
    await store(path.join(root, 'toy10_newest'), toy1, new Date('2025-06-01T00:00:00Z'));
    await fs.ensureDir(path.join(root, 'toy1_empty'));

    expect(await discoverScenario(root, 'toy1')).toBe(path.join(root, 'batch', 'toy1_new'));
  });

  it('throws when a scenario has no stored results', async () => {
    await expect(discoverScenario(root, 'toy3')).rejects.toBeInstanceOf(ScenarioNotFoundError);
  });

  it('compares the scenarios it finds and lists the others as missing', async () => {
    await store(path.join(root, 'toy1_a'), toy1, new Date('2025-01-01T00:00:00Z'));
    await store(path.join(root, 'toy2_a'), toy2, new Date('2025-01-01T00:00:00Z'));
    await fs.outputJSON(path.join(root, 'toy4_a', SUMMARY_FILE), { scenarioId: 'toy4' });
    const outDir = path.join(root, 'cmp');

    const report = await compareScenarios({
      root,
      scenarios: ['toy1', 'toy2', 'toy3', 'toy4'],
      baseline: 'toy1',
      outDir,
    });

    expect(report.found).toEqual({ toy1: path.join(root, 'toy1_a'), toy2: path.join(root, 'toy2_a') });
    expect(report.missing).toEqual(['toy3', 'toy4']);
    expect(path.dirname(report.outputDir)).toBe(outDir);
    expect(path.basename(report.outputDir)).toMatch(/^compare_/);
    expect(report.savings?.[0].savingsPct).toBeCloseTo(25, 10);
    expect(report.files.map(f => path.basename(f))).toEqual([
      'comparison_table.json',
      'comparison_aggregate.csv',
      'savings_vs_toy1.csv',
      'energy_vs_throughput.csv',
      'pareto_front.csv',
      'marginal_gain.csv',
      'comparison.xlsx',
      'charts.md',
    ]);
    const front = await fs.readFile(path.join(report.outputDir, 'pareto_front.csv'), 'utf8');
    expect(front).toBe(
      'scenarioId,parameterValue,energyKwh,throughput\ntoy2,20,0.3,12\ntoy2,23,0.35,13\ntoy1,26,0.5,14\n',
    );
  });

  it('fails when none of the scenarios has results', async () => {
    await expect(compareScenarios({ root, scenarios: ['toy1'] })).rejects.toBeInstanceOf(NotFoundError);
  });
});
