import request from 'supertest';

import {
  ExperimentRunsController,
  type ExperimentRunsDeps,
} from 'App/controllers/ExperimentRunsController';
import { ExternalToolNotFoundError } from 'App/errors/CustomError';
import type { OrchestratorReport, RunRequest } from 'App/services/RunOrchestrator';
import type { CompareReport, CompareRequest } from 'App/services/ScenarioComparator';
import { createApp } from 'App/server';

const report = (req: RunRequest): OrchestratorReport => ({
  status: {
    scenarioConfigId: 'TrainingToy1',
    parameterValue: req.parameterValue,
    repetitions: req.repetitions,
    maxAttempts: 3,
    resultDir: `/results/Pot${req.parameterValue}`,
    resolved: 2,
    failed: 1,
    artifacts: [],
    skippedExecution: false,
    generatedAt: '2025-01-01T00:00:00.000Z',
    runs: [],
  },
  statusPath: `/results/Pot${req.parameterValue}/status.json`,
  failures: [],
  failedPath: `/results/Pot${req.parameterValue}/failed_runs.json`,
  analysis: null,
});

const compareReport: CompareReport = {
  outputDir: '/results/comparisons/compare_x',
  table: {
    scenarios: ['toy1'],
    labels: { toy1: 'Solution 1' },
    parameterValues: [],
    rows: [],
    units: {},
    incomparableMetrics: ['sinr'],
  },
  savings: [],
  points: [],
  pareto: [],
  marginal: [],
  files: ['/results/comparisons/compare_x/comparison_table.json'],
  found: { toy1: '/results/toy1_a' },
  missing: ['toy2'],
};

const flush = () => new Promise(resolve => setImmediate(resolve));

describe('experiment routes', () => {
  let runCalls: RunRequest[];
  let compareCalls: CompareRequest[];

  const build = (overrides: Partial<ExperimentRunsDeps> = {}) => {
    runCalls = [];
    compareCalls = [];
    const controller = new ExperimentRunsController({
      orchestrator: () => ({
        run: async (req: RunRequest) => {
          runCalls.push(req);
          return report(req);
        },
      }),
      compare: async (req: CompareRequest) => {
        compareCalls.push(req);
        return compareReport;
      },
      resultsRoot: () => '/results',
      ...overrides,
    });
    return createApp(controller);
  };

  it('accepts a run, then reports its outcome', async () => {
    const app = build();
    const started = await request(app)
      .post('/api/experiments/run')
      .send({ parameterValue: 26, repetitions: 3 });

    expect(started.status).toBe(202);
    expect(started.body.success).toBe(true);
    const { runId } = started.body.data;
    expect(typeof runId).toBe('string');
    expect(runCalls).toEqual([{ parameterValue: 26, repetitions: 3, skipExecution: false }]);

    await flush();
    const status = await request(app).get(`/api/experiments/run/${runId}`);
    expect(status.status).toBe(200);
    expect(status.body.data).toMatchObject({
      id: runId,
      state: 'finished',
      resolved: 2,
      failed: 1,
      failedPath: '/results/Pot26/failed_runs.json',
      analysisDir: null,
    });
  });

  it('records a run that aborts before starting', async () => {
    const app = build({
      orchestrator: () => ({
        run: async () => {
          throw new ExternalToolNotFoundError('opp_run');
        },
      }),
    });
    const started = await request(app).post('/api/experiments/run').send({ parameterValue: 20 });
    await flush();

    const status = await request(app).get(`/api/experiments/run/${started.body.data.runId}`);
    expect(status.body.data.state).toBe('failed');
    expect(status.body.data.error.code).toBe('EXTERNAL_TOOL_NOT_FOUND');
  });

  it('refuses a second run for a value that is still running', async () => {
    const pending = new Map<number, (value: OrchestratorReport) => void>();
    const app = build({
      orchestrator: () => ({
        run: (req: RunRequest) => {
          runCalls.push(req);
          return new Promise<OrchestratorReport>(resolve => {
            pending.set(req.parameterValue, resolve);
          });
        },
      }),
    });

    const first = await request(app).post('/api/experiments/run').send({ parameterValue: 26 });
    const duplicate = await request(app).post('/api/experiments/run').send({ parameterValue: 26 });
    const other = await request(app).post('/api/experiments/run').send({ parameterValue: 23 });

    expect(first.status).toBe(202);
    expect(duplicate.status).toBe(409);
    expect(duplicate.body.code).toBe('CONFLICT');
    expect(duplicate.body.message).toBe(`TX=26dBm is already running as ${first.body.data.runId}`);
    expect(other.status).toBe(202);
    expect(runCalls.map(r => r.parameterValue)).toEqual([26, 23]);

    pending.get(26)?.(report({ parameterValue: 26, repetitions: 1 }));
    await flush();
    const again = await request(app).post('/api/experiments/run').send({ parameterValue: 26 });
    expect(again.status).toBe(202);
  });

  it('rejects an invalid run request', async () => {
    const res = await request(build())
      .post('/api/experiments/run')
      .send({ parameterValue: 'high', repetitions: 0 });

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('VALIDATION_ERROR');
    expect(res.body.details.map((d: { path: string }) => d.path)).toEqual(['parameterValue', 'repetitions']);
    expect(runCalls).toEqual([]);
  });

  it('rejects a malformed JSON body', async () => {
    const res = await request(build())
      .post('/api/experiments/run')
      .set('Content-Type', 'application/json')
      .send('{"parameterValue": ');
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('INVALID_JSON');
  });

  it('answers 404 for an unknown run', async () => {
    const res = await request(build()).get('/api/experiments/run/nope');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, error: 'not found' });
  });

  it('lists started runs', async () => {
    const app = build();
    await request(app).post('/api/experiments/run').send({ parameterValue: 20 });
    await request(app).post('/api/experiments/run').send({ parameterValue: 26 });

    const res = await request(app).get('/api/experiments/runs');
    expect(res.status).toBe(200);
    expect(res.body.data.map((r: { request: RunRequest }) => r.request.parameterValue).sort()).toEqual([20, 26]);
  });

  it('compares stored scenarios under the results root', async () => {
    const res = await request(build())
      .post('/api/experiments/compare')
      .send({ scenarios: ['toy1', 'toy2'], baseline: 'toy1' });

    expect(res.status).toBe(200);
    expect(compareCalls).toEqual([{ root: '/results', scenarios: ['toy1', 'toy2'], baseline: 'toy1' }]);
    expect(res.body.data).toEqual({
      outputDir: '/results/comparisons/compare_x',
      found: { toy1: '/results/toy1_a' },
      missing: ['toy2'],
      savings: [],
      paretoFront: [],
      incomparableMetrics: ['sinr'],
      files: ['/results/comparisons/compare_x/comparison_table.json'],
    });
  });

  it('rejects a comparison without scenarios', async () => {
    const res = await request(build()).post('/api/experiments/compare').send({ scenarios: [] });
    expect(res.status).toBe(400);
    expect(compareCalls).toEqual([]);
  });

  it('reports health', async () => {
    const res = await request(build()).get('/health');
    expect(res.body).toEqual({ status: 'ok' });
  });
});
