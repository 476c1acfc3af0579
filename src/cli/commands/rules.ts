import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { resolveConfig } from '../../core/config.js';
import { ConfigError } from '../../core/errors.js';
import { loadRuleSet, ruleSetHash } from '../../core/rules/loader.js';
import { arrow } from '../../core/report/text.js';
import { reportError } from './shared.js';
import type { SubstitutionRule } from '../../core/types.js';

export function rulesCommand(): Command {
  const cmd = new Command('rules')
    .description('Inspect and validate substitution rule files');

  cmd
    .command('list')
    .description('List the rules of a rule file in matching order')
    .option('-k, --kind <kind>', 'Configured rule set: analysis or corrections', 'analysis')
    .option('-f, --file <path>', 'Rule file to list instead of a configured one')
    .option('-s, --scope <scope>', 'Only show character or word rules')
    .action((options) => {
      try {
        const config = resolveConfig();
        let path: string;
        if (options.file) {
          path = resolve(options.file);
        } else if (options.kind === 'analysis') {
          path = config.analysisRules;
        } else if (options.kind === 'corrections') {
          path = config.correctionRules;
        } else {
          throw new ConfigError(`Unknown rule set "${options.kind}" (expected analysis or corrections)`);
        }

        const ruleSet = loadRuleSet(path);
        console.log(chalk.bold(path) + chalk.dim(`  ${ruleSetHash(ruleSet)}\n`));

        const groups: Array<[string, readonly SubstitutionRule[]]> = [
          ['Word rules', ruleSet.wordRules],
          ['Character rules', ruleSet.characterRules],
        ];
        for (const [title, rules] of groups) {
          if (options.scope && !title.toLowerCase().startsWith(options.scope)) continue;
          console.log(chalk.bold(`${title} (${rules.length}):`));
          for (const rule of rules) {
            const priority = rule.priority !== 0 ? chalk.dim(`  priority ${rule.priority}`) : '';
            console.log(`  ${arrow(rule.pattern, rule.replacement)}${priority}`);
          }
          console.log('');
        }
      } catch (err) {
        reportError(err);
      }
    });

  cmd
    .command('check')
    .description('Validate a rule file')
    .argument('<file>', 'Rule file to validate')
    .action((file: string) => {
      try {
        const ruleSet = loadRuleSet(file);
        console.log(
          chalk.green('✓') +
          ` ${resolve(file)}: ${ruleSet.wordRules.length} word rules, ${ruleSet.characterRules.length} character rules`,
        );
      } catch (err) {
        reportError(err);
      }
    });

  return cmd;
}
