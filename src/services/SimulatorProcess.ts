// src/services/SimulatorProcess.ts
import { spawn } from 'node:child_process';
import fs from 'fs-extra';
import path from 'node:path';

import type { SimulatorSettings } from 'App/config/config';

export interface SimulatorCommand {
  file: string;
  args: string[];
  cwd: string;
}

export interface ProcessExit {
  exitCode: number | null;
  signal: string | null;
  /** Spawn failure or timeout description. */
  error?: string;
}

/** Executes one command with its output captured to a log file. */
export interface ProcessRunner {
  run(
    command: SimulatorCommand,
    logPath: string,
    opts?: { timeoutMs?: number },
  ): Promise<ProcessExit>;
}

export interface RunPaths {
  resultDir: string;
  logDir: string;
  statusPath: string;
  failedPath: string;
}

export function pathsForParameter(
  settings: SimulatorSettings,
  parameterValue: number,
): RunPaths {
  const resultDir = path.join(settings.resultsBase, `Pot${parameterValue}`);
  return {
    resultDir,
    logDir: path.join(resultDir, 'logs'),
    statusPath: path.join(resultDir, 'status.json'),
    failedPath: path.join(resultDir, 'failed_runs.json'),
  };
}

/** The simulator writes ${resultdir}/${configname}/${repetition}.sca */
export function expectedArtifactPath(
  settings: SimulatorSettings,
  parameterValue: number,
  repetition: number,
): string {
  return path.join(
    pathsForParameter(settings, parameterValue).resultDir,
    settings.configName,
    `${repetition}.sca`,
  );
}

export function logPathFor(
  settings: SimulatorSettings,
  parameterValue: number,
  repetition: number,
  attempt: number,
): string {
  return path.join(
    pathsForParameter(settings, parameterValue).logDir,
    `log_TX${parameterValue}_R${repetition}_A${attempt}.txt`,
  );
}

/**
 * Full simulator command line. Both the base-station and the terminal transmit power are
 * overridden with the swept value; results go to the per-parameter directory.
 */
export function buildSimulatorCommand(
  settings: SimulatorSettings,
  parameterValue: number,
  repetition: number,
): SimulatorCommand {
  const { resultDir } = pathsForParameter(settings, parameterValue);
  const args = [
    '-r',
    String(repetition),
    '-m',
    '-u',
    'Cmdenv',
    '-c',
    settings.configName,
    '-f',
    settings.iniPath,
    '--result-dir',
    resultDir,
  ];
  if (settings.nedPath) args.push('-n', settings.nedPath);
  for (const lib of settings.libraries) args.push('-l', lib);
  args.push(
    `--*.gnb[*].cellularNic.phy.eNodeBTxPower=${parameterValue}dBm`,
    `--**.ueTxPower=${parameterValue}dBm`,
  );
  return { file: settings.binary, args, cwd: settings.projectRoot };
}

/**
 * Spawns the process with stdout and stderr piped into the log file. The log stream is
 * closed before the returned promise settles, whatever the exit path.
 */
export class SpawnProcessRunner implements ProcessRunner {
  async run(
    command: SimulatorCommand,
    logPath: string,
    opts: { timeoutMs?: number } = {},
  ): Promise<ProcessExit> {
    await fs.ensureDir(path.dirname(logPath));
    const log = fs.createWriteStream(logPath, { flags: 'w' });
    await new Promise<void>((resolve, reject) => {
      log.once('open', () => resolve());
      log.once('error', reject);
    });

    let exit: ProcessExit;
    try {
      exit = await new Promise<ProcessExit>(resolve => {
        const child = spawn(command.file, command.args, {
          cwd: command.cwd,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
        let timedOut = false;
        const timer =
          opts.timeoutMs && opts.timeoutMs > 0
            ? setTimeout(() => {
                timedOut = true;
                child.kill('SIGKILL');
              }, opts.timeoutMs)
            : null;
        child.stdout?.pipe(log, { end: false });
        child.stderr?.pipe(log, { end: false });
        child.once('error', err => {
          if (timer) clearTimeout(timer);
          resolve({ exitCode: null, signal: null, error: err.message });
        });
        child.once('close', (code, signal) => {
          if (timer) clearTimeout(timer);
          resolve({
            exitCode: code,
            signal: signal ?? null,
            error: timedOut ? `timed out after ${opts.timeoutMs} ms` : undefined,
          });
        });
      });
    } finally {
      await new Promise<void>(resolve => log.end(() => resolve()));
    }
    return exit;
  }
}

/** Last `lines` lines of a log file; a readable note when the log is gone. */
export async function readLogTail(logPath: string, lines = 20): Promise<string[]> {
  try {
    const txt = await fs.readFile(logPath, 'utf8');
    return txt.split(/\r?\n/).filter(Boolean).slice(-lines);
  } catch {
    return ['[log unavailable]'];
  }
}
