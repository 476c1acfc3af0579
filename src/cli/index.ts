import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { analyzeCommand } from './commands/analyze.js';
import { correctCommand } from './commands/correct.js';
import { rulesCommand } from './commands/rules.js';
import { historyCommand } from './commands/history.js';
import { reportCommand } from './commands/report.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('ocrsift')
  .description('OCR error pattern analysis and rule-based correction for historical text corpora')
  .version('0.1.0');

program.addCommand(initCommand());
program.addCommand(analyzeCommand());
program.addCommand(correctCommand());
program.addCommand(rulesCommand());
program.addCommand(historyCommand());
program.addCommand(reportCommand());
program.addCommand(serveCommand());

await program.parseAsync();
