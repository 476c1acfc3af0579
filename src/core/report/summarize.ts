import { isFinalized } from '../analyzer/stats.js';
import { OcrSiftError, ERROR_CODES } from '../errors.js';
import type {
  BreakdownRow, CorpusStats, EraRow, ErrorRates, FileSummary, PatternStats, RuleScope, SummaryRow,
} from '../types.js';

export interface SummarizeOptions {
  scope?: RuleScope;
  limit?: number;
}

/**
 * Rank patterns by descending count, ties broken by pattern text and then
 * scope. Percentages are shares of the selected rows' total count, computed
 * before `limit` is applied.
 */
export function summarize(stats: CorpusStats, options: SummarizeOptions = {}): SummaryRow[] {
  assertFinalized(stats);

  const selected = Object.entries(stats.patterns)
    .filter(([, p]) => options.scope === undefined || p.scope === options.scope)
    .sort(([, a], [, b]) => compareRows(a, b));

  const total = selected.reduce((sum, [, p]) => sum + p.occurrences, 0);
  const limited = options.limit !== undefined ? selected.slice(0, options.limit) : selected;

  return limited.map(([key, p], idx) => ({
    rank: idx + 1,
    key,
    pattern: p.pattern,
    replacement: p.replacement,
    scope: p.scope,
    count: p.occurrences,
    percent: total > 0 ? (p.occurrences / total) * 100 : 0,
  }));
}

export function errorRates(stats: CorpusStats): ErrorRates {
  let characterOccurrences = 0;
  let wordOccurrences = 0;
  for (const p of Object.values(stats.patterns)) {
    if (p.scope === 'character') characterOccurrences += p.occurrences;
    else wordOccurrences += p.occurrences;
  }

  return {
    characterOccurrences,
    wordOccurrences,
    characterRate: (characterOccurrences / Math.max(stats.totals.characters, 1)) * 100,
    wordRate: (wordOccurrences / Math.max(stats.totals.words, 1)) * 100,
  };
}

/** Files, words and pattern occurrences per era; error rate is occurrences per 100 words. */
export function eraBreakdown(stats: CorpusStats): EraRow[] {
  const occurrences = new Map<string, number>();
  for (const p of Object.values(stats.patterns)) {
    for (const [era, count] of Object.entries(p.eras)) {
      occurrences.set(era, (occurrences.get(era) ?? 0) + count);
    }
  }

  return Object.entries(stats.eras).map(([era, totals]) => {
    const count = occurrences.get(era) ?? 0;
    return {
      era,
      files: totals.files,
      words: totals.words,
      characters: totals.characters,
      occurrences: count,
      errorRate: totals.words > 0 ? (count / totals.words) * 100 : 0,
    };
  });
}

export function newspaperBreakdown(files: readonly FileSummary[]): BreakdownRow[] {
  return breakdown(files, f => f.newspaper);
}

/** Rows keyed `<n>dpi` in ascending resolution; files without one are grouped last as `unknown`. */
export function resolutionBreakdown(files: readonly FileSummary[]): BreakdownRow[] {
  const rows = breakdown(files, f => (f.resolution === null ? 'unknown' : `${f.resolution}dpi`));
  return rows.sort((a, b) => resolutionOrder(a.key) - resolutionOrder(b.key));
}

export function directoryBreakdown(files: readonly FileSummary[]): BreakdownRow[] {
  return breakdown(files, f => f.directory);
}

// Rows sorted by key in code-unit order.
function breakdown(files: readonly FileSummary[], keyOf: (file: FileSummary) => string): BreakdownRow[] {
  const groups = new Map<string, { files: number; words: number; characters: number; occurrences: number }>();
  for (const file of files) {
    const key = keyOf(file);
    const group = groups.get(key) ?? { files: 0, words: 0, characters: 0, occurrences: 0 };
    group.files++;
    group.words += file.words;
    group.characters += file.characters;
    group.occurrences += file.occurrences;
    groups.set(key, group);
  }

  return [...groups.keys()].sort().flatMap(key => {
    const group = groups.get(key);
    if (!group) return [];
    return [{
      key,
      ...group,
      errorRate: group.words > 0 ? (group.occurrences / group.words) * 100 : 0,
    }];
  });
}

function resolutionOrder(key: string): number {
  const n = Number.parseInt(key, 10);
  return Number.isNaN(n) ? Number.POSITIVE_INFINITY : n;
}

function compareRows(a: PatternStats, b: PatternStats): number {
  if (a.occurrences !== b.occurrences) return b.occurrences - a.occurrences;
  if (a.pattern !== b.pattern) return a.pattern < b.pattern ? -1 : 1;
  if (a.scope !== b.scope) return a.scope < b.scope ? -1 : 1;
  return 0;
}

function assertFinalized(stats: CorpusStats): void {
  if (!isFinalized(stats)) {
    throw new OcrSiftError(ERROR_CODES.STATS_NOT_FINALIZED, 'Stats must be finalized before they are summarized');
  }
}
