import fs from 'fs-extra';
import path from 'node:path';

import { readLogTail, SpawnProcessRunner } from 'App/services/SimulatorProcess';
import { makeTempDir } from './helpers/fixtures';

describe('SpawnProcessRunner', () => {
  let dir: string;
  const runner = new SpawnProcessRunner();
  const node = (script: string) => ({ file: process.execPath, args: ['-e', script], cwd: dir });

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('captures stdout and stderr and reports a non-zero exit', async () => {
    const logPath = path.join(dir, 'logs', 'log_TX26_R0_A1.txt');

    const exit = await runner.run(
      node("console.log('starting rep 0'); console.error('Error: no network'); process.exit(3)"),
      logPath,
    );

    expect(exit).toEqual({ exitCode: 3, signal: null, error: undefined });
    const lines = (await fs.readFile(logPath, 'utf8')).split('\n').filter(Boolean).sort();
    expect(lines).toEqual(['Error: no network', 'starting rep 0']);
  });

  it('kills a process that outlives the timeout', async () => {
    const logPath = path.join(dir, 'hang.txt');

    const exit = await runner.run(
      node("console.log('waiting'); setInterval(() => {}, 1000)"),
      logPath,
      { timeoutMs: 50 },
    );

    expect(exit.exitCode).toBeNull();
    expect(exit.signal).toBe('SIGKILL');
    expect(exit.error).toBe('timed out after 50 ms');
  });

  it('reports a binary that cannot be started and still leaves a closed log', async () => {
    const logPath = path.join(dir, 'missing.txt');

    const exit = await runner.run(
      { file: path.join(dir, 'no-such-simulator'), args: [], cwd: dir },
      logPath,
    );

    expect(exit.exitCode).toBeNull();
    expect(exit.error).toMatch(/ENOENT/);
    expect(await fs.readFile(logPath, 'utf8')).toBe('');
    // a closed log can be appended to by the next reader
    await fs.appendFile(logPath, 'checked\n');
    expect(await readLogTail(logPath)).toEqual(['checked']);
  });
});

describe('readLogTail', () => {
  it('keeps the last lines and notes a missing log', async () => {
    const dir = await makeTempDir();
    const logPath = path.join(dir, 'log.txt');
    await fs.outputFile(logPath, 'a\n\nb\r\nc\n');

    expect(await readLogTail(logPath, 2)).toEqual(['b', 'c']);
    expect(await readLogTail(path.join(dir, 'gone.txt'))).toEqual(['[log unavailable]']);
    await fs.remove(dir);
  });
});
