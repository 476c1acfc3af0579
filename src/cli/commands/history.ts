import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { formatInt } from '../../core/report/text.js';
import { parsePositiveInt, reportError } from './shared.js';

export function historyCommand(): Command {
  return new Command('history')
    .description('List recorded analysis runs, newest first')
    .option('-l, --limit <n>', 'Runs to show', '20')
    .option('--delete <runId>', 'Delete a run (full id or unique prefix)')
    .action((options) => {
      try {
        const db = new RunRepository(resolveConfig().dbPath);

        try {
          if (options.delete) {
            const run = db.findRun(options.delete);
            if (!run || !db.deleteRun(run.id)) {
              console.log(chalk.yellow(`No run matches "${options.delete}".`));
              process.exitCode = 1;
              return;
            }
            console.log(chalk.green('✓') + ` Deleted run ${run.id}`);
            return;
          }

          const runs = db.listRuns(parsePositiveInt(options.limit, 'limit'));
          if (runs.length === 0) {
            console.log(chalk.dim('No runs recorded yet. Run `ocrsift analyze <dir>` first.'));
            return;
          }

          console.log(chalk.bold(`Analysis runs (${db.getRunCount()} total)\n`));
          for (const run of runs) {
            const skipped = run.failures > 0 ? chalk.yellow(`  ${run.failures} skipped`) : '';
            console.log(
              `  ${chalk.cyan(run.id.slice(0, 8))}  ${run.createdAt.slice(0, 19).replace('T', ' ')}  ` +
              `${formatInt(run.files).padStart(7)} files ${formatInt(run.words).padStart(12)} words${skipped}`,
            );
            console.log(chalk.dim(`            ${run.root}`));
          }
        } finally {
          db.close();
        }
      } catch (err) {
        reportError(err);
      }
    });
}
