import {
  directoryBreakdown, eraBreakdown, errorRates, newspaperBreakdown, resolutionBreakdown, summarize,
} from './summarize.js';
import type { BreakdownRow, CorpusStats, FileFailure, FileSummary } from '../types.js';

export interface TextReportInput {
  stats: CorpusStats;
  title?: string;
  root?: string;
  generatedAt?: string;
  failures?: readonly FileFailure[];
  /** Per-file summaries; when given, the report breaks results down by paper, resolution and directory. */
  files?: readonly FileSummary[];
  topN?: number;
}

const RULE = '-'.repeat(80);
const BANNER = '='.repeat(80);

export function renderTextReport(input: TextReportInput): string {
  const { stats } = input;
  const topN = input.topN ?? 30;
  const lines: string[] = [];
  const files = stats.totals.files;

  lines.push(BANNER, input.title ?? 'OCR ERROR PATTERN ANALYSIS');
  if (input.generatedAt) lines.push(`Generated: ${input.generatedAt}`);
  lines.push(BANNER, '');

  lines.push('OVERVIEW', RULE);
  if (input.root) lines.push(`Corpus root: ${input.root}`);
  lines.push(
    `Files analyzed: ${formatInt(files)}`,
    `Words processed: ${formatInt(stats.totals.words)}`,
    `Characters: ${formatInt(stats.totals.characters)}`,
    `Average words per file: ${(stats.totals.words / Math.max(files, 1)).toFixed(1)}`,
  );
  if (input.failures && input.failures.length > 0) {
    lines.push(`Files skipped: ${formatInt(input.failures.length)}`);
  }
  lines.push('');

  const rates = errorRates(stats);
  lines.push(
    'ERROR SUMMARY', RULE,
    `Character-level candidates: ${formatInt(rates.characterOccurrences)}`,
    `Word-level errors: ${formatInt(rates.wordOccurrences)}`,
    `Words mixing letters and digits: ${formatInt(stats.suspicious.mixedAlphanumeric)}`,
    `Repeated character runs: ${formatInt(stats.suspicious.repeatedCharacters)}`,
    `Character error rate: ${rates.characterRate.toFixed(3)}%`,
    `Word error rate: ${rates.wordRate.toFixed(3)}%`,
    '',
  );

  const eras = eraBreakdown(stats);
  if (eras.length > 0) {
    lines.push('BY ERA', RULE);
    lines.push(`${'Era'.padEnd(30)} ${'Files'.padStart(8)} ${'Words'.padStart(12)} ${'Errors'.padStart(12)} ${'Rate'.padStart(8)}`);
    lines.push(RULE);
    for (const row of eras) {
      lines.push(
        `${row.era.padEnd(30)} ${formatInt(row.files).padStart(8)} ${formatInt(row.words).padStart(12)} ` +
        `${formatInt(row.occurrences).padStart(12)} ${(row.errorRate.toFixed(2) + '%').padStart(8)}`,
      );
    }
    lines.push('');
  }

  if (input.files && input.files.length > 0) {
    pushBreakdown(lines, 'BY NEWSPAPER', 'Newspaper', newspaperBreakdown(input.files));
    pushBreakdown(lines, 'BY SCAN RESOLUTION', 'Resolution', resolutionBreakdown(input.files));
    pushBreakdown(lines, 'BY DIRECTORY', 'Directory', directoryBreakdown(input.files));
  }

  lines.push(`TOP ${topN} CHARACTER PATTERNS`, RULE);
  lines.push(`${'Rank'.padEnd(6)} ${'Pattern'.padEnd(30)} ${'Frequency'.padStart(15)} ${'% of Total'.padStart(12)}`);
  lines.push(RULE);
  for (const row of summarize(stats, { scope: 'character', limit: topN })) {
    lines.push(
      `${String(row.rank).padEnd(6)} ${arrow(row.pattern, row.replacement).padEnd(30)} ` +
      `${formatInt(row.count).padStart(15)} ${(row.percent.toFixed(1) + '%').padStart(12)}`,
    );
  }
  lines.push('');

  lines.push(`TOP ${topN} WORD PATTERNS`, RULE);
  lines.push(`${'Rank'.padEnd(6)} ${'Pattern'.padEnd(30)} ${'Frequency'.padStart(15)} ${'% of Total'.padStart(12)}`);
  lines.push(RULE);
  for (const row of summarize(stats, { scope: 'word', limit: topN })) {
    lines.push(
      `${String(row.rank).padEnd(6)} ${arrow(row.pattern, row.replacement).padEnd(30)} ` +
      `${formatInt(row.count).padStart(15)} ${(row.percent.toFixed(1) + '%').padStart(12)}`,
    );
  }

  if (input.failures && input.failures.length > 0) {
    lines.push('', 'SKIPPED FILES', RULE);
    for (const failure of input.failures) {
      lines.push(`${failure.path} [${failure.code}] ${failure.message}`);
    }
  }

  lines.push('', BANNER);
  return lines.join('\n') + '\n';
}

export function arrow(pattern: string, replacement: string): string {
  return `${visible(pattern)} → ${visible(replacement)}`;
}

// Whitespace-only patterns would otherwise print as blanks.
function visible(value: string): string {
  return /^\s*$/.test(value) ? JSON.stringify(value) : value;
}

export function formatInt(n: number): string {
  return n.toLocaleString('en-US');
}

function pushBreakdown(lines: string[], title: string, label: string, rows: readonly BreakdownRow[]): void {
  lines.push(title, RULE);
  lines.push(`${label.padEnd(30)} ${'Files'.padStart(8)} ${'Words'.padStart(12)} ${'Errors'.padStart(12)} ${'Rate'.padStart(8)}`);
  lines.push(RULE);
  for (const row of rows) {
    lines.push(
      `${row.key.padEnd(30)} ${formatInt(row.files).padStart(8)} ${formatInt(row.words).padStart(12)} ` +
      `${formatInt(row.occurrences).padStart(12)} ${(row.errorRate.toFixed(2) + '%').padStart(8)}`,
    );
  }
  lines.push('');
}
