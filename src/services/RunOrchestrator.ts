// src/services/RunOrchestrator.ts
import fs from 'fs-extra';
import path from 'node:path';

import type {
  OrchestratorSettings,
  SimulatorSettings,
} from 'App/config/config';
import {
  ArtifactMissingError,
  ConfigurationMissingError,
  ConflictError,
  errorMessage,
  ExternalToolNotFoundError,
  ValidationError,
} from 'App/errors/CustomError';
import {
  analyzeRunRoots,
  type PipelineOptions,
  type PipelineReport,
  type RunRoot,
} from 'App/services/MetricsPipeline';
import { findScalarFiles } from 'App/services/ScalarFileParser';
import {
  buildSimulatorCommand,
  expectedArtifactPath,
  logPathFor,
  pathsForParameter,
  readLogTail,
  SpawnProcessRunner,
  type ProcessExit,
  type ProcessRunner,
  type RunPaths,
} from 'App/services/SimulatorProcess';
import type {
  FailureManifestEntry,
  RunOutcome,
  RunResult,
  RunSpec,
  RunState,
  StatusDocument,
} from 'App/types/experiment';
import { runWithConcurrency } from 'App/utils/pool';

export interface RunRequest {
  /** Swept value of this invocation (transmit power, dBm). */
  parameterValue: number;
  repetitions: number;
  concurrency?: number;
  maxAttempts?: number;
  /** 0 or absent: wait for the process however long it takes. */
  timeoutMs?: number;
  /** Analysis-only mode: no process is started. */
  skipExecution?: boolean;
  /** false defers analysis to the caller (multi-value sweeps). Default true. */
  analyze?: boolean;
  /** Analysis output base; `<outDir>/<config>_<stamp>/` is created below it. */
  outDir?: string;
}

export interface OrchestratorReport {
  status: StatusDocument;
  statusPath: string;
  failures: FailureManifestEntry[];
  /** null when every RunSpec resolved. */
  failedPath: string | null;
  analysis: PipelineReport | null;
}

export type AnalysisTrigger = (
  scenarioId: string,
  roots: RunRoot[],
  outDir: string,
) => Promise<PipelineReport>;

export interface OrchestratorDeps {
  runner?: ProcessRunner;
  analyze?: AnalysisTrigger;
  pipelineOptions?: PipelineOptions;
  /** Default output base when the request names none. */
  outputDir?: string;
  onStateChange?: (spec: RunSpec, state: RunState) => void;
}

const LOG_TAIL_LINES = 20;

// Result directories with an invocation in progress, across every orchestrator in the process
const activeResultDirs = new Set<string>();

function requirePositiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer, got ${value}`, [
      { path: name, message: 'expected an integer >= 1' },
    ]);
  }
  return value;
}

const wait = (ms: number) =>
  ms > 0 ? new Promise<void>(resolve => setTimeout(resolve, ms)) : Promise.resolve();

/** One RunSpec per repetition 0..repetitions-1, all at attempt 1. */
export function buildRunMatrix(
  scenarioConfigId: string,
  request: Pick<RunRequest, 'parameterValue' | 'repetitions'>,
): RunSpec[] {
  const reps = Math.max(0, Math.floor(request.repetitions));
  return Array.from({ length: reps }, (_, repetition) => ({
    scenarioConfigId,
    parameterValue: request.parameterValue,
    repetition,
    attempt: 1,
  }));
}

async function isExecutable(binary: string): Promise<boolean> {
  if (path.isAbsolute(binary) || binary.includes(path.sep)) {
    return fs.pathExists(binary);
  }
  const dirs = (process.env.PATH || '').split(path.delimiter).filter(Boolean);
  const exts = process.platform === 'win32' ? ['', '.exe', '.cmd', '.bat'] : [''];
  for (const dir of dirs) {
    for (const ext of exts) {
      if (await fs.pathExists(path.join(dir, binary + ext))) return true;
    }
  }
  return false;
}

export class RunOrchestrator {
  private readonly runner: ProcessRunner;
  private readonly analyze: AnalysisTrigger;

  constructor(
    private readonly simulator: SimulatorSettings,
    private readonly settings: OrchestratorSettings,
    private readonly deps: OrchestratorDeps = {},
  ) {
    this.runner = deps.runner ?? new SpawnProcessRunner();
    this.analyze =
      deps.analyze ??
      ((scenarioId, roots, outDir) =>
        analyzeRunRoots(scenarioId, roots, outDir, deps.pipelineOptions));
  }

  /** Fatal checks; nothing is started when one fails. */
  async validateSetup(): Promise<void> {
    if (!(await isExecutable(this.simulator.binary))) {
      throw new ExternalToolNotFoundError(this.simulator.binary);
    }
    if (!(await fs.pathExists(this.simulator.iniPath))) {
      throw new ConfigurationMissingError(`simulator ini file ${this.simulator.iniPath}`);
    }
  }

  /**
   * One invocation per result directory at a time: a second run for the same parameter
   * value is refused with ConflictError until the first one settles.
   */
  async run(request: RunRequest): Promise<OrchestratorReport> {
    const maxAttempts = requirePositiveInteger(
      'maxAttempts',
      request.maxAttempts ?? this.settings.maxAttempts,
    );
    const width = requirePositiveInteger('concurrency', request.concurrency ?? this.settings.concurrency);
    const paths = pathsForParameter(this.simulator, request.parameterValue);
    if (activeResultDirs.has(paths.resultDir)) {
      throw new ConflictError(
        `TX=${request.parameterValue}dBm is already running into ${paths.resultDir}`,
      );
    }
    activeResultDirs.add(paths.resultDir);
    try {
      return await this.runExclusive(request, paths, maxAttempts, width);
    } finally {
      activeResultDirs.delete(paths.resultDir);
    }
  }

  private async runExclusive(
    request: RunRequest,
    paths: RunPaths,
    maxAttempts: number,
    width: number,
  ): Promise<OrchestratorReport> {
    const { configName } = this.simulator;
    const v = request.parameterValue;
    const skip = !!request.skipExecution;

    let outcomes: RunOutcome[] = [];
    if (!skip) {
      await this.validateSetup();
      await fs.ensureDir(paths.logDir);
      const matrix = buildRunMatrix(configName, request);
      console.log(
        `[Orchestrator] ${configName} TX=${v}dBm: ${matrix.length} repetition(s), ${width} in parallel, up to ${maxAttempts} attempt(s) each`,
      );
      outcomes = await runWithConcurrency(matrix, width, spec =>
        this.runWithRetries(spec, maxAttempts, request.timeoutMs ?? this.settings.timeoutMs),
      );
    } else {
      console.log(`[Orchestrator] ${configName} TX=${v}dBm: execution skipped, analysing existing artifacts`);
    }

    const artifacts = skip
      ? await findScalarFiles(paths.resultDir, { recursive: true })
      : outcomes.filter(o => o.state === 'artifact-found').map(o => o.expectedArtifactPath);
    const failed = outcomes.filter(o => o.state === 'failed');

    const status: StatusDocument = {
      scenarioConfigId: configName,
      parameterValue: v,
      repetitions: request.repetitions,
      maxAttempts,
      resultDir: paths.resultDir,
      resolved: skip ? artifacts.length : outcomes.length - failed.length,
      failed: failed.length,
      artifacts,
      skippedExecution: skip,
      generatedAt: new Date().toISOString(),
      runs: outcomes,
    };
    await fs.ensureDir(paths.resultDir);
    await fs.writeJSON(paths.statusPath, status, { spaces: 2 });

    const failures: FailureManifestEntry[] = failed.map(o => ({
      parameterValue: o.parameterValue,
      repetition: o.repetition,
      attempt: o.attempts,
      expectedArtifactPath: o.expectedArtifactPath,
      logPath: o.logPath,
      logTail: o.logTail,
    }));
    let failedPath: string | null = null;
    if (failures.length) {
      await fs.writeJSON(paths.failedPath, failures, { spaces: 2 });
      failedPath = paths.failedPath;
      console.warn(
        `[Orchestrator] ${failures.length} run(s) failed after ${maxAttempts} attempt(s); see ${paths.failedPath}`,
      );
    } else {
      // a manifest from an earlier invocation no longer applies
      await fs.remove(paths.failedPath);
    }
    console.log(
      `[Orchestrator] TX=${v}dBm done: ${status.resolved} resolved, ${status.failed} failed`,
    );

    let analysis: PipelineReport | null = null;
    if (request.analyze !== false) {
      const outDir = request.outDir ?? this.deps.outputDir ?? path.join(this.simulator.resultsBase, 'analysis');
      analysis = await this.analyze(configName, [{ dir: paths.resultDir, parameterValue: v }], outDir);
    }

    return { status, statusPath: paths.statusPath, failures, failedPath, analysis };
  }

  private notify(spec: RunSpec, state: RunState, history: RunState[]) {
    history.push(state);
    this.deps.onStateChange?.(spec, state);
  }

  private async runWithRetries(
    first: RunSpec,
    maxAttempts: number,
    timeoutMs: number,
  ): Promise<RunOutcome> {
    const expected = expectedArtifactPath(this.simulator, first.parameterValue, first.repetition);
    const history: RunState[] = [];
    const results: RunResult[] = [];
    let spec = first;
    this.notify(spec, 'pending', history);

    for (;;) {
      const logPath = logPathFor(this.simulator, spec.parameterValue, spec.repetition, spec.attempt);
      const command = buildSimulatorCommand(this.simulator, spec.parameterValue, spec.repetition);
      // an artifact left from an earlier invocation must not count for this attempt
      await fs.remove(expected);

      this.notify(spec, 'running', history);
      console.log(
        `[Orchestrator] TX=${spec.parameterValue} rep=${spec.repetition} attempt ${spec.attempt}/${maxAttempts}`,
      );
      const started = Date.now();
      let exit: ProcessExit;
      try {
        exit = await this.runner.run(command, logPath, { timeoutMs });
      } catch (e) {
        const message = errorMessage(e);
        console.error(`[Orchestrator] rep=${spec.repetition} could not run: ${message}`);
        exit = { exitCode: null, signal: null, error: message };
      }
      await wait(this.settings.settleMs);

      const artifactFound = await fs.pathExists(expected);
      results.push({
        spec,
        exitCode: exit.exitCode,
        signal: exit.signal,
        expectedArtifactPath: expected,
        artifactFound,
        logPath,
        durationSec: (Date.now() - started) / 1000,
        finishedAt: new Date().toISOString(),
        error: exit.error,
      });

      if (artifactFound) {
        this.notify(spec, 'artifact-found', history);
        return {
          parameterValue: spec.parameterValue,
          repetition: spec.repetition,
          state: 'artifact-found',
          attempts: spec.attempt,
          expectedArtifactPath: expected,
          logPath,
          results,
          history,
        };
      }

      this.notify(spec, 'artifact-missing', history);
      console.warn(
        `[Orchestrator] ${new ArtifactMissingError(expected).message} (exit ${exit.exitCode ?? exit.signal ?? 'n/a'}, log ${logPath})`,
      );
      if (spec.attempt >= maxAttempts) {
        this.notify(spec, 'failed', history);
        return {
          parameterValue: spec.parameterValue,
          repetition: spec.repetition,
          state: 'failed',
          attempts: spec.attempt,
          expectedArtifactPath: expected,
          logPath,
          results,
          history,
          logTail: await readLogTail(logPath, LOG_TAIL_LINES),
        };
      }
      spec = { ...spec, attempt: spec.attempt + 1 };
      this.notify(spec, 'pending', history);
    }
  }
}
