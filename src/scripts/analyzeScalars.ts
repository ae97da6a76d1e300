/*
 Extracts metrics from <base>/<scenario>/*.sca, annotates them with the energy model and
 writes per-scenario summaries plus an in-run comparison.

   npm run sim:analyze -- --base ./sca --scenarios toy1,toy2 --energy-cfg energy.json
*/
import fs from 'fs-extra';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadAppConfig, splitList } from 'App/config/config';
import { errorMessage, NotFoundError } from 'App/errors/CustomError';
import { loadEnergyConfig } from 'App/services/EnergyModel';
import { analyzeScenarios } from 'App/services/MetricsPipeline';
import { parseChartTypes, parseMetricList } from 'App/utils/cli';

async function listScenarioDirs(baseDir: string): Promise<string[]> {
  if (!(await fs.pathExists(baseDir))) return [];
  const entries = await fs.readdir(baseDir, { withFileTypes: true });
  return entries
    .filter(e => e.isDirectory() && !e.name.startsWith('.'))
    .map(e => e.name)
    .sort();
}

export async function main(args: string[] = hideBin(process.argv)) {
  const config = loadAppConfig();
  const argv = await yargs(args)
    .scriptName('sim:analyze')
    .option('base', {
      type: 'string',
      default: config.resultsRoot,
      describe: 'Directory with one folder of .sca files per scenario',
    })
    .option('scenarios', {
      type: 'string',
      describe: 'Scenario folders, comma separated (default: every folder under --base)',
    })
    .option('out', { type: 'string', default: config.outputDir, describe: 'Output directory' })
    .option('energy-cfg', { type: 'string', describe: 'Energy model JSON' })
    .option('metrics', { type: 'string', describe: 'Metrics to chart, comma separated' })
    .option('charts', { type: 'string', default: 'line', describe: 'Chart types: line, bar' })
    .option('baseline', { type: 'string', describe: 'Savings reference (default: first scenario)' })
    .strict()
    .help()
    .parse();

  const baseDir = path.resolve(argv.base);
  const scenarios = argv.scenarios
    ? splitList(argv.scenarios, /[,\s]+/)
    : await listScenarioDirs(baseDir);
  if (!scenarios.length) throw new NotFoundError(`No scenario folders under ${baseDir}`);

  const report = await analyzeScenarios({
    baseDir,
    scenarios,
    outDir: path.resolve(argv.out),
    energyConfig: argv['energy-cfg'] ? await loadEnergyConfig(argv['energy-cfg']) : null,
    metrics: parseMetricList(argv.metrics),
    chartTypes: parseChartTypes(argv.charts),
    baseline: argv.baseline,
  });

  console.log('\n[Analyze] Summary');
  for (const r of report.reports) {
    console.log(`  ${r.scenarioId} (${r.label}): ${r.artifacts} artifact(s) -> ${r.outputDir}`);
  }
  if (report.skippedScenarios.length) {
    console.log(`  skipped: ${report.skippedScenarios.join(', ')}`);
  }
  if (report.comparison) console.log(`  comparison -> ${report.comparison.outputDir}`);
  return report;
}

if (require.main === module) {
  main().catch(err => {
    console.error('[Analyze] Error:', errorMessage(err));
    process.exit(1);
  });
}
