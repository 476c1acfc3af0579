import { Command } from 'commander';
import chalk from 'chalk';
import { resolveConfig, saveConfig, ensureConfigDir, getConfigDir } from '../../core/config.js';
import { RunRepository } from '../../core/db/repository.js';
import { loadRuleSet } from '../../core/rules/loader.js';
import { reportError, parsePositiveInt } from './shared.js';

export function initCommand(): Command {
  return new Command('init')
    .description('Create the ocrsift config directory, run database and config file')
    .option('--analysis-rules <path>', 'Rule file used by `analyze`')
    .option('--correction-rules <path>', 'Rule file used by `correct`')
    .option('--encoding <label>', 'Text encoding of OCR files')
    .option('--include <globs...>', 'File globs to analyze')
    .option('--concurrency <n>', 'Files processed at once')
    .action(async (options) => {
      try {
        console.log(chalk.bold('Initializing ocrsift...\n'));

        ensureConfigDir();
        console.log(chalk.green('✓') + ` Config directory ${getConfigDir()}`);

        const config = resolveConfig();
        const updates = {
          analysisRules: options.analysisRules ?? config.analysisRules,
          correctionRules: options.correctionRules ?? config.correctionRules,
          encoding: options.encoding ?? config.encoding,
          include: options.include ?? config.include,
          concurrency: options.concurrency ? parsePositiveInt(options.concurrency, 'concurrency') : config.concurrency,
        };

        // Fail here, before anything is saved, if either rule file is broken.
        const analysis = loadRuleSet(updates.analysisRules);
        console.log(chalk.green('✓') + ` Analysis rules: ${analysis.rules.length} (${updates.analysisRules})`);
        const corrections = loadRuleSet(updates.correctionRules);
        console.log(chalk.green('✓') + ` Correction rules: ${corrections.rules.length} (${updates.correctionRules})`);

        const db = new RunRepository(config.dbPath);
        console.log(chalk.green('✓') + ` Run database at ${config.dbPath} (${db.getRunCount()} runs)`);
        db.close();

        const configPath = saveConfig(updates);
        console.log(chalk.green('\n✓') + ` Config saved to ${configPath}`);

        console.log(chalk.bold('\n📋 Next steps:'));
        console.log('  • Run ' + chalk.cyan('ocrsift analyze <dir>') + ' to measure error patterns');
        console.log('  • Run ' + chalk.cyan('ocrsift correct <path>') + ' to write corrected copies');
        console.log('  • Run ' + chalk.cyan('ocrsift history') + ' to review past runs');
      } catch (err) {
        reportError(err);
      }
    });
}
