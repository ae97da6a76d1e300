/* eslint-disable prefer-destructuring */
import { NotFoundError, ValidationError } from 'App/errors/CustomError';
import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

const envPath = path.join(process.cwd(), '.env');

dotenv.config({ path: envPath });

export const getEnvVariable = (key: string, defaultValue?: string): string => {
  const value = process.env[key];
  if (!value) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new NotFoundError(`Missing environment variable: ${key}`);
  }
  return value;
};

export const splitList = (raw: string, sep: RegExp): string[] =>
  raw
    .split(sep)
    .map(s => s.trim())
    .filter(Boolean);

export const PORT = Number(getEnvVariable('PORT', '3000'));

export const MODE = getEnvVariable('NODE_ENV', 'development');

/** Allowed browser origins; empty allows every origin. */
export const CORS_ORIGINS = splitList(getEnvVariable('CORS_ORIGINS', ''), /[,\s]+/);

export interface SimulatorSettings {
  /** Absolute path of the simulator launcher (opp_run). */
  binary: string;
  /** Working directory of every simulator process. */
  projectRoot: string;
  /** Configuration file handed over with -f. */
  iniPath: string;
  /** Named configuration selected with -c. */
  configName: string;
  /** NED search path (-n), colon separated; empty to omit. */
  nedPath: string;
  /** Shared libraries loaded with -l. */
  libraries: string[];
  /** Per-parameter result directories are created below this base. */
  resultsBase: string;
}

export interface OrchestratorSettings {
  concurrency: number;
  maxAttempts: number;
  /** 0 disables the timeout: the orchestrator waits for process exit. */
  timeoutMs: number;
  /** Pause after process exit before checking for the artifact. */
  settleMs: number;
}

const orchestratorSettingsSchema = z.object({
  concurrency: z.coerce.number().int().min(1),
  maxAttempts: z.coerce.number().int().min(1),
  timeoutMs: z.coerce.number().int().min(0),
  settleMs: z.coerce.number().int().min(0),
});

const ORCHESTRATOR_ENV: Record<keyof OrchestratorSettings, [string, string]> = {
  concurrency: ['RUN_CONCURRENCY', '4'],
  maxAttempts: ['RUN_MAX_ATTEMPTS', '3'],
  timeoutMs: ['RUN_TIMEOUT_MS', '0'],
  settleMs: ['RUN_SETTLE_MS', '1000'],
};

/** Throws ValidationError naming the offending variables; nothing is clamped. */
export function loadOrchestratorSettings(): OrchestratorSettings {
  const raw = {
    concurrency: getEnvVariable(...ORCHESTRATOR_ENV.concurrency),
    maxAttempts: getEnvVariable(...ORCHESTRATOR_ENV.maxAttempts),
    timeoutMs: getEnvVariable(...ORCHESTRATOR_ENV.timeoutMs),
    settleMs: getEnvVariable(...ORCHESTRATOR_ENV.settleMs),
  };
  const parsed = orchestratorSettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => {
      const key = orchestratorSettingsSchema.keyof().safeParse(i.path[0]);
      const variable = key.success ? ORCHESTRATOR_ENV[key.data][0] : i.path.join('.');
      return { path: variable, message: i.message };
    });
    throw new ValidationError(
      `Invalid orchestrator settings: ${details.map(d => d.path).join(', ')}`,
      details,
    );
  }
  return parsed.data;
}

export interface AppConfig {
  mode: string;
  port: number;
  outputDir: string;
  resultsRoot: string;
  simulator: SimulatorSettings;
  orchestrator: OrchestratorSettings;
}

/**
 * Reads every setting once. Components receive the resulting object (or a slice of it)
 * through their constructors.
 */
export function loadAppConfig(): AppConfig {
  const projectRoot = getEnvVariable('SIMULATOR_PROJECT_ROOT', process.cwd());
  const configName = getEnvVariable('SIMULATOR_CONFIG_NAME', 'TrainingToy1_1');
  return {
    mode: MODE,
    port: PORT,
    outputDir: path.resolve(getEnvVariable('OUTPUT_DIR', './results')),
    resultsRoot: path.resolve(
      getEnvVariable('RESULTS_ROOT', getEnvVariable('OUTPUT_DIR', './results')),
    ),
    simulator: {
      binary: getEnvVariable('SIMULATOR_BIN', 'opp_run'),
      projectRoot,
      iniPath: getEnvVariable(
        'SIMULATOR_INI_PATH',
        path.join(projectRoot, 'omnetpp.ini'),
      ),
      configName,
      nedPath: getEnvVariable('SIMULATOR_NED_PATH', ''),
      libraries: splitList(getEnvVariable('SIMULATOR_LIBS', ''), /[,;]/),
      resultsBase: getEnvVariable(
        'RESULTS_BASE',
        path.join(projectRoot, 'results', configName),
      ),
    },
    orchestrator: loadOrchestratorSettings(),
  };
}
