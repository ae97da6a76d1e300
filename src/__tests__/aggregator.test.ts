import { aggregateGroup, aggregateRecords, summarizeRaw } from 'App/services/MetricsAggregator';
import type { MetricRecord } from 'App/types/experiment';

const rec = (
  scenarioId: string,
  parameterValue: number,
  metric: MetricRecord['metric'],
  value: number,
  unit: MetricRecord['unit'] = 'Mbps',
): MetricRecord => ({ scenarioId, parameterValue, metric, value, unit, source: `${scenarioId}_${parameterValue}dBm.sca` });

describe('aggregateGroup', () => {
  it('returns null for an empty group instead of a zero row', () => {
    expect(aggregateGroup([])).toBeNull();
  });

  it('averages each metric by default and counts samples', () => {
    const row = aggregateGroup([
      rec('toy1', 20, 'throughput', 10),
      rec('toy1', 20, 'throughput', 20),
      rec('toy1', 20, 'delay', 4, 'ms'),
    ]);
    expect(row).toEqual({
      scenarioId: 'toy1',
      parameterValue: 20,
      metrics: { throughput: 15, delay: 4 },
      samples: { throughput: 2, delay: 1 },
    });
  });

  it('applies a per-metric statistic', () => {
    const row = aggregateGroup(
      [rec('toy1', 20, 'throughput', 10), rec('toy1', 20, 'throughput', 20)],
      { throughput: 'sum' },
    );
    expect(row?.metrics.throughput).toBe(30);
  });

  it('refuses records from different groups', () => {
    expect(() =>
      aggregateGroup([rec('toy1', 20, 'throughput', 1), rec('toy1', 23, 'throughput', 1)]),
    ).toThrow('aggregateGroup expects one group');
  });
});

describe('aggregateRecords', () => {
  it('keeps scenario order of appearance and sorts rows by parameter', () => {
    const summaries = aggregateRecords(
      [
        rec('toy2', 26, 'throughput', 6),
        rec('toy1', 20, 'throughput', 1),
        rec('toy2', 20, 'throughput', 2),
        rec('toy2', 20, 'delay', 8, 'ms'),
      ],
      {},
      { toy2: 'Solution 2' },
    );
    expect(summaries.map(s => s.scenarioId)).toEqual(['toy2', 'toy1']);
    expect(summaries[0].label).toBe('Solution 2');
    expect(summaries[1].label).toBe('toy1');
    expect(summaries[0].rows.map(r => r.parameterValue)).toEqual([20, 26]);
    expect(summaries[0].units).toEqual({ throughput: 'Mbps', delay: 'ms' });
    expect(summaries[0].rows[1].metrics).toEqual({ throughput: 6 });
  });

  it('produces nothing for no records', () => {
    expect(aggregateRecords([])).toEqual([]);
  });
});

describe('summarizeRaw', () => {
  it('counts records per metric, most frequent first and ties by name', () => {
    const counts = summarizeRaw([
      rec('toy1', 20, 'throughput', 10),
      rec('toy1', 23, 'delay', 5, 'ms'),
      rec('toy1', 26, 'throughput', 12),
      rec('toy2', 20, 'activeUes', 2, 'count'),
      rec('toy2', 20, 'delay', 4, 'ms'),
      rec('toy2', 26, 'throughput', 9),
      rec('toy2', 26, 'gnbCount', 1, 'count'),
    ]);
    expect(counts).toEqual([
      { metric: 'throughput', count: 3 },
      { metric: 'delay', count: 2 },
      { metric: 'activeUes', count: 1 },
      { metric: 'gnbCount', count: 1 },
    ]);
  });

  it('returns nothing for no records', () => {
    expect(summarizeRaw([])).toEqual([]);
  });
});
