/*
 Compares the newest stored results of several scenarios.

   npm run sim:compare -- --root ./results --scenarios toy1,toy2,toy6 --baseline toy1
*/
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadAppConfig, splitList } from 'App/config/config';
import { errorMessage } from 'App/errors/CustomError';
import { compareScenarios } from 'App/services/ScenarioComparator';
import { parseChartTypes } from 'App/utils/cli';

export async function main(args: string[] = hideBin(process.argv)) {
  const config = loadAppConfig();
  const argv = await yargs(args)
    .scriptName('sim:compare')
    .option('root', {
      type: 'string',
      default: config.outputDir,
      describe: 'Directory holding <scenario>_<stamp>/ result folders',
    })
    .option('outdir', { type: 'string', describe: 'Output base (default: <root>/comparisons)' })
    .option('scenarios', {
      type: 'string',
      default: 'toy1,toy2,toy3,toy4,toy5,toy6',
      describe: 'Scenario identifiers, comma separated',
    })
    .option('baseline', { type: 'string', default: 'toy1', describe: 'Savings reference' })
    .option('charts', { type: 'string', default: 'line,bar', describe: 'Chart types: line, bar' })
    .strict()
    .help()
    .parse();

  const root = path.resolve(argv.root);
  const report = await compareScenarios({
    root,
    scenarios: splitList(argv.scenarios, /[,\s]+/),
    baseline: argv.baseline || undefined,
    outDir: argv.outdir ? path.resolve(argv.outdir) : undefined,
    chartTypes: parseChartTypes(argv.charts),
  });

  console.log('\n[Compare] Files');
  for (const f of report.files) console.log(`  ${path.relative(root, f)}`);
  return report;
}

if (require.main === module) {
  main().catch(err => {
    console.error('[Compare] Error:', errorMessage(err));
    process.exit(1);
  });
}
