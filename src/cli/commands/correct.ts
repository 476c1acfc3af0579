import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { discoverFiles } from '../../core/corpus/discover.js';
import { correctFiles } from '../../core/corpus/batch.js';
import { loadRuleSet } from '../../core/rules/loader.js';
import { summarize } from '../../core/report/summarize.js';
import { arrow, formatInt } from '../../core/report/text.js';
import { parsePositiveInt, reportError } from './shared.js';

export function correctCommand(): Command {
  return new Command('correct')
    .description('Apply substitution rules and write corrected copies of OCR text files')
    .argument('<path>', 'Corpus directory or a single OCR text file')
    .option('-r, --rules <path>', 'Rule file (defaults to the configured correction rules)')
    .option('-o, --out-dir <dir>', 'Write corrected files here instead of beside the inputs')
    .option('-e, --encoding <label>', 'Text encoding of the input files')
    .option('-c, --concurrency <n>', 'Files processed at once')
    .option('-n, --top <n>', 'Corrections listed in the summary', '10')
    .option('--changes', 'Also write a <name>_changes.json log per file')
    .option('--compare <file>', 'Write before/after comparison reports for every file')
    .option('--dry-run', 'Report what would change without writing anything')
    .action(async (path: string, options) => {
      try {
        const config = resolveConfig();
        const rulesPath = resolve(options.rules ?? config.correctionRules);
        const ruleSet = loadRuleSet(rulesPath);
        const root = resolve(path);

        const files = discoverFiles(root, { include: config.include, exclude: config.exclude });
        if (files.length === 0) {
          console.log(chalk.yellow(`No files matching ${config.include.join(', ')} found.`));
          return;
        }

        console.log(chalk.bold(`Correcting ${formatInt(files.length)} files`) +
          chalk.dim(` with ${ruleSet.rules.length} rules from ${rulesPath}`));
        if (options.dryRun) console.log(chalk.dim('(dry run, nothing will be written)'));

        const result = await correctFiles(files, ruleSet, {
          root: files[0] === root ? dirname(root) : root,
          encoding: options.encoding ?? config.encoding,
          concurrency: options.concurrency ? parsePositiveInt(options.concurrency, 'concurrency') : config.concurrency,
          eras: config.eras,
          outDir: options.outDir ? resolve(options.outDir) : undefined,
          writeChanges: Boolean(options.changes),
          comparisons: Boolean(options.compare),
          dryRun: Boolean(options.dryRun),
        });

        console.log('');
        for (const file of result.files) {
          const count = file.changes === 0 ? chalk.dim('no changes') : chalk.green(`${formatInt(file.changes)} changes`);
          console.log(`  ${file.path} → ${chalk.cyan(file.outputPath)}  ${count}`);
        }

        const total = result.files.reduce((sum, f) => sum + f.changes, 0);
        console.log(chalk.bold(`\n${formatInt(total)} corrections across ${formatInt(result.files.length)} files`));

        const rows = summarize(result.stats, { limit: parsePositiveInt(options.top, 'top') });
        if (rows.length > 0) {
          console.log(chalk.bold('\nMost applied:'));
          for (const row of rows) {
            console.log(`  ${arrow(row.pattern, row.replacement).padEnd(24)} ${formatInt(row.count).padStart(8)}  ${chalk.dim(row.scope)}`);
          }
        }

        if (options.compare) {
          const reports = result.files.flatMap(f => (f.comparison === undefined ? [] : [f.comparison]));
          writeFileSync(options.compare, reports.join('\n'), 'utf-8');
          console.log(chalk.green('\n✓') + ` Comparison report saved: ${options.compare}`);
        }

        if (result.failures.length > 0) {
          console.log(chalk.bold(chalk.yellow(`\n⚠ ${result.failures.length} files skipped:`)));
          for (const failure of result.failures) {
            console.log(`  ${chalk.yellow(failure.code)} ${failure.path}: ${failure.message}`);
          }
          process.exitCode = 2;
        }
      } catch (err) {
        reportError(err);
      }
    });
}
