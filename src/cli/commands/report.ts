import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { renderTextReport } from '../../core/report/text.js';
import { parsePositiveInt, reportError } from './shared.js';

export function reportCommand(): Command {
  return new Command('report')
    .description('Render the report of a recorded run (latest by default)')
    .argument('[runId]', 'Run id or unique id prefix')
    .option('-n, --top <n>', 'Patterns listed per scope')
    .option('-o, --out <file>', 'Write the report to a file instead of stdout')
    .option('--json', 'Print the stored stats as JSON')
    .action((runId: string | undefined, options) => {
      try {
        const config = resolveConfig();
        const db = new RunRepository(config.dbPath);

        try {
          const run = runId ? db.findRun(runId) : db.getLatestRun();
          if (!run) {
            console.log(chalk.yellow(runId ? `No run matches "${runId}".` : 'No runs recorded yet.'));
            process.exitCode = 1;
            return;
          }

          const stats = db.getRunStats(run.id);
          if (!stats) {
            console.log(chalk.yellow(`Run ${run.id} has no stored stats.`));
            process.exitCode = 1;
            return;
          }

          const output = options.json
            ? JSON.stringify({ run, stats }, null, 2)
            : renderTextReport({
              stats,
              root: run.root,
              generatedAt: run.createdAt,
              topN: options.top ? parsePositiveInt(options.top, 'top') : config.topN,
            });

          if (options.out) {
            writeFileSync(options.out, output + '\n', 'utf-8');
            console.log(chalk.green('✓') + ` Report saved: ${options.out}`);
          } else {
            console.log(output);
          }
        } finally {
          db.close();
        }
      } catch (err) {
        reportError(err);
      }
    });
}
