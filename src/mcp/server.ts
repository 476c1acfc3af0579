import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { resolveConfig } from '../core/config.js';
import { RunRepository } from '../core/db/repository.js';
import { loadRuleSet } from '../core/rules/loader.js';
import { analyze } from '../core/analyzer/frequency.js';
import { correct } from '../core/corrector/engine.js';
import { errorRates, summarize } from '../core/report/summarize.js';
import { errorMessage } from '../core/errors.js';

type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(err: unknown): ToolResult {
  return { content: [{ type: 'text', text: errorMessage(err) }], isError: true };
}

export function createServer(): McpServer {
  const config = resolveConfig();
  const analysisRules = loadRuleSet(config.analysisRules);
  const correctionRules = loadRuleSet(config.correctionRules);

  const server = new McpServer({
    name: 'ocrsift',
    version: '0.1.0',
  });

  // Tool: analyze_text
  server.tool(
    'analyze_text',
    'Count OCR error patterns in a piece of text',
    {
      text: z.string().describe('OCR output to analyze'),
      era: z.string().optional().describe('Grouping label for the text, e.g. a decade'),
      limit: z.number().int().min(1).optional().default(20).describe('Max patterns returned'),
    },
    async ({ text, era, limit }) => {
      try {
        const stats = analyze(text, analysisRules, { era });
        return json({
          totals: stats.totals,
          rates: errorRates(stats),
          suspicious: stats.suspicious,
          patterns: summarize(stats, { limit }),
        });
      } catch (err) {
        return failure(err);
      }
    },
  );

  // Tool: correct_text
  server.tool(
    'correct_text',
    'Apply the configured correction rules to a piece of text',
    {
      text: z.string().describe('OCR output to correct'),
    },
    async ({ text }) => {
      try {
        const result = correct(text, correctionRules);
        return json({
          text: result.text,
          changes: result.changes.map(c => ({
            pattern: c.rule.pattern,
            replacement: c.replacement,
            scope: c.rule.scope,
            start: c.start,
            end: c.end,
          })),
        });
      } catch (err) {
        return failure(err);
      }
    },
  );

  // Tool: list_rules
  server.tool(
    'list_rules',
    'List the substitution rules of the configured analysis or correction rule set',
    {
      kind: z.enum(['analysis', 'corrections']).optional().default('analysis').describe('Which rule set'),
      scope: z.enum(['character', 'word']).optional().describe('Only rules of this scope'),
    },
    async ({ kind, scope }) => {
      const ruleSet = kind === 'analysis' ? analysisRules : correctionRules;
      const rules = scope === undefined
        ? ruleSet.rules
        : scope === 'word' ? ruleSet.wordRules : ruleSet.characterRules;
      return json(rules);
    },
  );

  // Tool: list_runs
  server.tool(
    'list_runs',
    'List recorded corpus analysis runs, newest first',
    {
      limit: z.number().int().min(1).optional().default(10).describe('Max runs'),
    },
    async ({ limit }) => {
      const db = new RunRepository(config.dbPath);
      try {
        return json(db.listRuns(limit));
      } catch (err) {
        return failure(err);
      } finally {
        db.close();
      }
    },
  );

  return server;
}

export async function startServer(): Promise<void> {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
