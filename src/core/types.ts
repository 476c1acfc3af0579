export type RuleScope = 'character' | 'word';

export interface SubstitutionRule {
  readonly pattern: string;
  readonly replacement: string;
  readonly scope: RuleScope;
  readonly priority: number;
}

export interface RuleSet {
  /** Word rules followed by character rules, each in application order. */
  readonly rules: readonly SubstitutionRule[];
  readonly wordRules: readonly SubstitutionRule[];
  readonly characterRules: readonly SubstitutionRule[];
}

export interface MatchEvent {
  readonly rule: SubstitutionRule;
  readonly start: number;
  readonly end: number;
  /** The original text covered by [start, end). */
  readonly source: string;
}

export interface ChangeEvent extends MatchEvent {
  readonly replacement: string;
  readonly outputStart: number;
  readonly outputEnd: number;
}

export interface CorrectionResult {
  readonly text: string;
  readonly changes: readonly ChangeEvent[];
}

export interface PatternStats {
  readonly pattern: string;
  readonly replacement: string;
  readonly scope: RuleScope;
  readonly occurrences: number;
  readonly files: number;
  readonly eras: Readonly<Record<string, number>>;
}

export interface TextTotals {
  readonly files: number;
  readonly words: number;
  readonly characters: number;
}

export interface SuspiciousCounts {
  readonly mixedAlphanumeric: number;
  readonly repeatedCharacters: number;
}

export interface CorpusStats {
  readonly patterns: Readonly<Record<string, PatternStats>>;
  readonly totals: TextTotals;
  readonly eras: Readonly<Record<string, TextTotals>>;
  readonly suspicious: SuspiciousCounts;
}

export interface SummaryRow {
  readonly rank: number;
  readonly key: string;
  readonly pattern: string;
  readonly replacement: string;
  readonly scope: RuleScope;
  readonly count: number;
  readonly percent: number;
}

export interface ErrorRates {
  readonly characterOccurrences: number;
  readonly wordOccurrences: number;
  readonly characterRate: number;
  readonly wordRate: number;
}

export interface EraRow {
  readonly era: string;
  readonly files: number;
  readonly words: number;
  readonly characters: number;
  readonly occurrences: number;
  readonly errorRate: number;
}

export interface FileMetadata {
  path: string;
  filename: string;
  year: number | null;
  newspaperCode: string;
  resolution: number | null;
  era: string;
}

export interface FileSummary {
  path: string;
  era: string;
  newspaper: string;
  resolution: number | null;
  /** Top-level directory under the corpus root, `.` for files at the root. */
  directory: string;
  words: number;
  characters: number;
  occurrences: number;
}

export interface BreakdownRow {
  readonly key: string;
  readonly files: number;
  readonly words: number;
  readonly characters: number;
  readonly occurrences: number;
  /** Occurrences per 100 words. */
  readonly errorRate: number;
}

export interface FileFailure {
  path: string;
  code: string;
  message: string;
}

export interface EraBoundary {
  /** Exclusive upper year bound; omit for the last, open-ended era. */
  before?: number;
  label: string;
}

export interface OcrSiftConfig {
  dbPath: string;
  analysisRules: string;
  correctionRules: string;
  encoding: string;
  include: string[];
  exclude: string[];
  concurrency: number;
  topN: number;
  eras: EraBoundary[];
}

export interface AnalysisRun {
  id: string;
  root: string;
  rulesPath: string;
  rulesHash: string;
  createdAt: string;
  files: number;
  words: number;
  characters: number;
  failures: number;
}
