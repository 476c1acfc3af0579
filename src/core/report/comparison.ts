import { arrow, formatInt } from './text.js';
import type { CorrectionResult } from '../types.js';

export interface ComparisonReportOptions {
  /** Path or label of the corrected text, shown in the header. */
  source?: string;
  /** Characters of each text shown in the excerpts. */
  excerptLength?: number;
}

const RULE = '-'.repeat(80);
const BANNER = '='.repeat(80);

/** Before/after report for one corrected text: totals, the change log and leading excerpts. */
export function renderComparisonReport(
  original: string,
  result: CorrectionResult,
  options: ComparisonReportOptions = {},
): string {
  const excerptLength = options.excerptLength ?? 1000;
  const lines: string[] = [BANNER, 'OCR CORRECTION COMPARISON'];
  if (options.source) lines.push(`Source: ${options.source}`);
  lines.push(BANNER, '');

  lines.push(
    'SUMMARY', RULE,
    `Corrections applied: ${formatInt(result.changes.length)}`,
    `Original length: ${formatInt(original.length)} characters`,
    `Corrected length: ${formatInt(result.text.length)} characters`,
    '',
  );

  if (result.changes.length > 0) {
    lines.push('CORRECTIONS', RULE);
    for (const change of result.changes) {
      lines.push(`  ${String(change.start).padStart(8)}  ${change.rule.scope.padEnd(9)} ${arrow(change.source, change.replacement)}`);
    }
    lines.push('');
  }

  lines.push(
    `EXCERPTS (first ${formatInt(excerptLength)} characters)`, RULE,
    'Original:',
    original.slice(0, excerptLength),
    '',
    'Corrected:',
    result.text.slice(0, excerptLength),
    BANNER,
  );

  return lines.join('\n') + '\n';
}
