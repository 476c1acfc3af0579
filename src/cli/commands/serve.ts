import { Command } from 'commander';
import chalk from 'chalk';
import { reportError } from './shared.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server')
    .action(async () => {
      // stdout carries the protocol
      console.error(chalk.bold('Starting MCP server (stdio)...'));

      try {
        // Dynamic import to avoid loading MCP deps when not needed
        const { startServer } = await import('../../mcp/server.js');
        await startServer();
      } catch (err) {
        reportError(err);
      }
    });
}
