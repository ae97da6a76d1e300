import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

import { loadAppConfig } from 'App/config/config';
import {
  ConflictError,
  CustomError,
  errorMessage,
  ValidationError,
} from 'App/errors/CustomError';
import {
  RunOrchestrator,
  type OrchestratorReport,
  type RunRequest,
} from 'App/services/RunOrchestrator';
import {
  compareScenarios,
  type CompareReport,
  type CompareRequest,
} from 'App/services/ScenarioComparator';

// In-memory registry of runs started by this process
export interface ExperimentRunStatus {
  id: string;
  startedAt: string;
  finishedAt?: string;
  state: 'running' | 'finished' | 'failed';
  request: RunRequest;
  resolved?: number;
  failed?: number;
  statusPath?: string;
  failedPath?: string | null;
  analysisDir?: string | null;
  error?: { code: string; message: string };
}

const runBodySchema = z
  .object({
    parameterValue: z.number().finite(),
    repetitions: z.number().int().positive().default(1),
    concurrency: z.number().int().positive().optional(),
    skipExecution: z.boolean().default(false),
    timeoutMs: z.number().int().nonnegative().optional(),
    outDir: z.string().min(1).optional(),
  })
  .strict();

const compareBodySchema = z
  .object({
    scenarios: z.array(z.string().min(1)).min(1),
    baseline: z.string().min(1).optional(),
  })
  .strict();

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid ${what}`,
      parsed.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })),
    );
  }
  return parsed.data;
}

export interface ExperimentRunsDeps {
  orchestrator: () => Pick<RunOrchestrator, 'run'>;
  compare: (request: CompareRequest) => Promise<CompareReport>;
  /** Where comparisons look for stored scenario results. */
  resultsRoot: () => string;
}

const defaultDeps = (): ExperimentRunsDeps => {
  let orchestrator: RunOrchestrator | null = null;
  return {
    orchestrator: () => {
      if (!orchestrator) {
        const config = loadAppConfig();
        orchestrator = new RunOrchestrator(config.simulator, config.orchestrator, {
          outputDir: config.outputDir,
        });
      }
      return orchestrator;
    },
    compare: compareScenarios,
    resultsRoot: () => loadAppConfig().outputDir,
  };
};

function genId() {
  return Math.random().toString(36).slice(2, 10);
}

export class ExperimentRunsController {
  private readonly runs = new Map<string, ExperimentRunStatus>();
  private readonly deps: ExperimentRunsDeps;

  constructor(deps: Partial<ExperimentRunsDeps> = {}) {
    this.deps = { ...defaultDeps(), ...deps };
  }

  /**
   * POST /api/experiments/run: 202 + { runId }, the sweep continues in the background.
   * 409 while another run for the same value is in progress.
   */
  start = (req: Request, res: Response, next: NextFunction) => {
    let request: RunRequest;
    try {
      request = parseBody(runBodySchema, req.body, 'run request');
    } catch (e) {
      return next(e);
    }
    // runs for one value share a result directory
    const busy = Array.from(this.runs.values()).find(
      r => r.state === 'running' && r.request.parameterValue === request.parameterValue,
    );
    if (busy) {
      return next(
        new ConflictError(`TX=${request.parameterValue}dBm is already running as ${busy.id}`),
      );
    }
    const id = genId();
    const status: ExperimentRunStatus = {
      id,
      startedAt: new Date().toISOString(),
      state: 'running',
      request,
    };
    this.runs.set(id, status);
    void this.execute(status);
    return res.status(202).json({ success: true, data: { runId: id } });
  };

  /** Resolves once the run is recorded as finished or failed; never rejects. */
  private async execute(status: ExperimentRunStatus): Promise<void> {
    try {
      const report: OrchestratorReport = await this.deps.orchestrator().run(status.request);
      status.resolved = report.status.resolved;
      status.failed = report.status.failed;
      status.statusPath = report.statusPath;
      status.failedPath = report.failedPath;
      status.analysisDir = report.analysis?.outputDir ?? null;
      status.state = 'finished';
    } catch (e) {
      status.state = 'failed';
      status.error = {
        code: e instanceof CustomError ? e.code : 'INTERNAL_SERVER_ERROR',
        message: errorMessage(e),
      };
      console.error(`[ExperimentRuns] run ${status.id} failed:`, status.error.message);
    } finally {
      status.finishedAt = new Date().toISOString();
    }
  }

  /** GET /api/experiments/run/:id */
  status = (req: Request, res: Response) => {
    const st = this.runs.get(req.params.id);
    if (!st) return res.status(404).json({ success: false, error: 'not found' });
    return res.status(200).json({ success: true, data: st });
  };

  /** GET /api/experiments/runs, newest first */
  list = (_req: Request, res: Response) => {
    const data = Array.from(this.runs.values()).sort(
      (a, b) => new Date(b.startedAt).getTime() - new Date(a.startedAt).getTime(),
    );
    return res.status(200).json({ success: true, data });
  };

  /** POST /api/experiments/compare */
  compare = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(compareBodySchema, req.body, 'compare request');
      const report = await this.deps.compare({
        root: this.deps.resultsRoot(),
        scenarios: body.scenarios,
        baseline: body.baseline,
      });
      return res.status(200).json({
        success: true,
        data: {
          outputDir: report.outputDir,
          found: report.found,
          missing: report.missing,
          savings: report.savings ?? null,
          paretoFront: report.pareto,
          incomparableMetrics: report.table.incomparableMetrics,
          files: report.files,
        },
      });
    } catch (e) {
      return next(e);
    }
  };
}

export default new ExperimentRunsController();
