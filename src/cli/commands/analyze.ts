import { Command } from 'commander';
import { writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { discoverFiles } from '../../core/corpus/discover.js';
import { analyzeCorpus } from '../../core/corpus/batch.js';
import { loadRuleSet, ruleSetHash } from '../../core/rules/loader.js';
import { errorRates, summarize } from '../../core/report/summarize.js';
import { renderTextReport, arrow, formatInt } from '../../core/report/text.js';
import { parsePositiveInt, reportError } from './shared.js';

export function analyzeCommand(): Command {
  return new Command('analyze')
    .description('Count OCR error patterns across a directory of OCR text files')
    .argument('<path>', 'Corpus directory or a single OCR text file')
    .option('-r, --rules <path>', 'Rule file (defaults to the configured analysis rules)')
    .option('-e, --encoding <label>', 'Text encoding of the input files')
    .option('-c, --concurrency <n>', 'Files processed at once')
    .option('-n, --top <n>', 'Patterns listed per scope')
    .option('--max-files <n>', 'Only analyze the first n files found')
    .option('--report <file>', 'Write a plain-text report')
    .option('--json <file>', 'Write the finalized stats as JSON')
    .option('--no-save', 'Do not record the run in the history database')
    .action(async (path: string, options) => {
      try {
        const config = resolveConfig();
        const rulesPath = resolve(options.rules ?? config.analysisRules);
        const ruleSet = loadRuleSet(rulesPath);
        const topN = options.top ? parsePositiveInt(options.top, 'top') : config.topN;
        const root = resolve(path);

        console.log(chalk.bold('OCR Error Pattern Analysis\n'));
        console.log(`  Corpus: ${root}`);
        console.log(`  Rules:  ${rulesPath} (${ruleSet.wordRules.length} word, ${ruleSet.characterRules.length} character)\n`);

        let files = discoverFiles(root, { include: config.include, exclude: config.exclude });
        if (options.maxFiles) {
          files = files.slice(0, parsePositiveInt(options.maxFiles, 'max-files'));
        }
        if (files.length === 0) {
          console.log(chalk.yellow(`No files matching ${config.include.join(', ')} found.`));
          return;
        }
        console.log(`Found ${formatInt(files.length)} files. Analyzing...`);

        const result = await analyzeCorpus(files, ruleSet, {
          root: files[0] === root ? dirname(root) : root,
          encoding: options.encoding ?? config.encoding,
          concurrency: options.concurrency ? parsePositiveInt(options.concurrency, 'concurrency') : config.concurrency,
          eras: config.eras,
          onProgress: ({ done, total }) => {
            if (done % 10 === 0 || done === total) {
              console.log(chalk.dim(`  Progress: ${done}/${total} files (${((done / total) * 100).toFixed(1)}%)`));
            }
          },
        });
        const { stats, failures } = result;

        console.log(chalk.bold('\n📊 Corpus:'));
        console.log(`  Files analyzed: ${formatInt(stats.totals.files)}`);
        console.log(`  Words: ${formatInt(stats.totals.words)}`);
        console.log(`  Characters: ${formatInt(stats.totals.characters)}`);

        const rates = errorRates(stats);
        console.log(chalk.bold('\n🔎 Error rates:'));
        console.log(`  Character candidates: ${formatInt(rates.characterOccurrences)} (${rates.characterRate.toFixed(3)}%)`);
        console.log(`  Word errors: ${formatInt(rates.wordOccurrences)} (${rates.wordRate.toFixed(3)}%)`);
        console.log(`  Mixed letters/digits: ${formatInt(stats.suspicious.mixedAlphanumeric)}`);
        console.log(`  Repeated character runs: ${formatInt(stats.suspicious.repeatedCharacters)}`);

        for (const scope of ['word', 'character'] as const) {
          const rows = summarize(stats, { scope, limit: topN });
          if (rows.length === 0) continue;
          console.log(chalk.bold(`\nTop ${scope} patterns:`));
          const maxCount = Math.max(...rows.map(r => r.count), 1);
          for (const row of rows) {
            const bar = '█'.repeat(Math.max(1, Math.round((row.count / maxCount) * 20)));
            console.log(
              `  ${arrow(row.pattern, row.replacement).padEnd(24)} ${formatInt(row.count).padStart(10)} ` +
              `${(row.percent.toFixed(1) + '%').padStart(7)} ${chalk.cyan(bar)}`,
            );
          }
        }

        if (failures.length > 0) {
          console.log(chalk.bold(chalk.yellow(`\n⚠ ${failures.length} files skipped:`)));
          for (const failure of failures.slice(0, 10)) {
            console.log(`  ${chalk.yellow(failure.code)} ${failure.path}: ${failure.message}`);
          }
          if (failures.length > 10) console.log(chalk.dim(`  ...and ${failures.length - 10} more`));
        }

        if (options.report) {
          writeFileSync(options.report, renderTextReport({
            stats,
            root,
            generatedAt: new Date().toISOString(),
            failures,
            files: result.files,
            topN,
          }), 'utf-8');
          console.log(chalk.green('\n✓') + ` Report saved: ${options.report}`);
        }

        if (options.json) {
          writeFileSync(options.json, JSON.stringify({ root, rules: rulesPath, ...result }, null, 2), 'utf-8');
          console.log(chalk.green('✓') + ` JSON exported: ${options.json}`);
        }

        if (options.save) {
          const db = new RunRepository(config.dbPath);
          try {
            const run = db.saveRun({
              root,
              rulesPath,
              rulesHash: ruleSetHash(ruleSet),
              stats,
              failures: failures.length,
            });
            console.log(chalk.green('✓') + ` Run recorded: ${run.id}`);
          } finally {
            db.close();
          }
        }

        if (failures.length > 0) process.exitCode = 2;
      } catch (err) {
        reportError(err);
      }
    });
}
