/*
 Runs the simulator for one or more TX power values, N repetitions each, then analyses
 the produced scalar files.

   npm run sim:run -- --tx 20,23,26 --reps 3 --threads 4
   npm run sim:run -- --tx 26 --skip-sim        # analysis of existing results only
*/
import os from 'node:os';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadAppConfig } from 'App/config/config';
import { errorMessage, ValidationError } from 'App/errors/CustomError';
import { loadEnergyConfig } from 'App/services/EnergyModel';
import { analyzeRunRoots } from 'App/services/MetricsPipeline';
import {
  RunOrchestrator,
  type OrchestratorReport,
} from 'App/services/RunOrchestrator';
import { parseChartTypes, parseMetricList, parseNumberList } from 'App/utils/cli';

export async function main(args: string[] = hideBin(process.argv)) {
  const argv = await yargs(args)
    .scriptName('sim:run')
    .option('tx', {
      type: 'string',
      demandOption: true,
      describe: 'TX power in dBm; a list such as "20,23,26" runs one sweep per value',
    })
    .option('reps', { type: 'number', default: 1, describe: 'Repetitions per value' })
    .option('threads', { type: 'number', default: 4, describe: 'Simulator processes in parallel' })
    .option('skip-sim', {
      type: 'boolean',
      default: false,
      describe: 'Do not run the simulator; analyse existing results',
    })
    .option('out', { type: 'string', describe: 'Analysis output directory' })
    .option('timeout-ms', {
      type: 'number',
      describe: 'Kill a simulator process after this many ms (default: wait for exit)',
    })
    .option('energy-cfg', { type: 'string', describe: 'Energy model JSON' })
    .option('metrics', { type: 'string', describe: 'Metrics to chart, comma separated' })
    .option('charts', { type: 'string', describe: 'Chart types: line, bar' })
    .strict()
    .help()
    .parse();

  const values = parseNumberList(argv.tx, '--tx');
  if (!values.length) throw new ValidationError('--tx needs at least one value');
  if (!Number.isInteger(argv.reps) || argv.reps < 1) {
    throw new ValidationError('--reps must be a positive integer');
  }

  const config = loadAppConfig();
  const outDir = path.resolve(argv.out ?? config.outputDir);
  const pipelineOptions = {
    energyConfig: argv['energy-cfg'] ? await loadEnergyConfig(argv['energy-cfg']) : null,
    metrics: parseMetricList(argv.metrics),
    chartTypes: parseChartTypes(argv.charts),
  };
  const concurrency = Math.max(1, Math.min(argv.threads, os.cpus().length));
  const orchestrator = new RunOrchestrator(config.simulator, config.orchestrator, {
    outputDir: outDir,
    pipelineOptions,
  });

  // several values: one combined analysis after the last sweep
  const combined = values.length > 1;
  const reports: OrchestratorReport[] = [];
  for (const parameterValue of values) {
    reports.push(
      await orchestrator.run({
        parameterValue,
        repetitions: argv.reps,
        concurrency,
        timeoutMs: argv['timeout-ms'],
        skipExecution: argv['skip-sim'],
        analyze: !combined,
        outDir,
      }),
    );
  }
  if (combined) {
    await analyzeRunRoots(
      config.simulator.configName,
      reports.map(r => ({ dir: r.status.resultDir, parameterValue: r.status.parameterValue })),
      outDir,
      pipelineOptions,
    );
  }

  console.log('\n[Run] Summary');
  for (const r of reports) {
    console.log(
      `  TX=${r.status.parameterValue}dBm resolved=${r.status.resolved} failed=${r.status.failed}` +
        (r.failedPath ? ` (manifest: ${r.failedPath})` : ''),
    );
  }
  return reports;
}

if (require.main === module) {
  main().catch(err => {
    console.error('[Run] Error:', errorMessage(err));
    process.exit(1);
  });
}
