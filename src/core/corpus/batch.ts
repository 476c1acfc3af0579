import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, sep } from 'node:path';
import { analyze } from '../analyzer/frequency.js';
import { StatsAccumulator } from '../analyzer/stats.js';
import { correct } from '../corrector/engine.js';
import { correctionStats } from '../corrector/stats.js';
import { errorCode, errorMessage, WriteError } from '../errors.js';
import { renderComparisonReport } from '../report/comparison.js';
import { decodeText } from './decode.js';
import { DEFAULT_ERAS, extractMetadata } from './metadata.js';
import type { CorpusStats, EraBoundary, FileFailure, FileSummary, RuleSet } from '../types.js';

export interface BatchProgress {
  done: number;
  total: number;
  path: string;
  failed: boolean;
}

export interface BatchOptions {
  /**
   * Corpus root the paths were discovered under. Files are grouped by their
   * top-level directory beneath it, and `outDir` mirrors the tree below it.
   */
  root?: string;
  encoding?: string;
  concurrency?: number;
  eras?: readonly EraBoundary[];
  onProgress?: (progress: BatchProgress) => void;
}

export interface AnalyzeCorpusResult {
  stats: CorpusStats;
  files: FileSummary[];
  failures: FileFailure[];
}

export interface CorrectFilesOptions extends BatchOptions {
  /** Write corrected files here instead of next to their inputs. */
  outDir?: string;
  /** Also write `<stem>_changes.json` with the change log. */
  writeChanges?: boolean;
  /** Render a before/after comparison report for every file. */
  comparisons?: boolean;
  dryRun?: boolean;
}

export interface CorrectedFile {
  path: string;
  outputPath: string;
  changes: number;
  originalLength: number;
  correctedLength: number;
  comparison?: string;
}

export interface CorrectFilesResult {
  stats: CorpusStats;
  files: CorrectedFile[];
  failures: FileFailure[];
}

type Outcome<T> = { ok: true; value: T } | { ok: false; failure: FileFailure };

/**
 * Analyze every file independently, then reduce the partial stats in file
 * order. A file that cannot be read or decoded is reported as a failure and
 * does not affect the others.
 */
export async function analyzeCorpus(
  paths: readonly string[],
  ruleSet: RuleSet,
  options: BatchOptions = {},
): Promise<AnalyzeCorpusResult> {
  const eras = options.eras ?? DEFAULT_ERAS;

  const outcomes = await mapPool(paths, options, async (path) => {
    const text = await readText(path, options.encoding);
    const meta = extractMetadata(path, eras);
    const stats = analyze(text, ruleSet, { era: meta.era });
    const occurrences = Object.values(stats.patterns).reduce((sum, p) => sum + p.occurrences, 0);
    const summary: FileSummary = {
      path,
      era: meta.era,
      newspaper: meta.newspaperCode,
      resolution: meta.resolution,
      directory: topDirectory(path, options.root),
      words: stats.totals.words,
      characters: stats.totals.characters,
      occurrences,
    };
    return { stats, summary };
  });

  const acc = new StatsAccumulator();
  const files: FileSummary[] = [];
  const failures: FileFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      acc.add(outcome.value.stats);
      files.push(outcome.value.summary);
    } else {
      failures.push(outcome.failure);
    }
  }

  return { stats: acc.finalize(), files, failures };
}

export async function correctFiles(
  paths: readonly string[],
  ruleSet: RuleSet,
  options: CorrectFilesOptions = {},
): Promise<CorrectFilesResult> {
  const eras = options.eras ?? DEFAULT_ERAS;

  // The first input claiming an output path in input order owns it.
  const owners = new Map<string, string>();
  for (const path of paths) {
    const outputPath = correctedPath(path, options.outDir, options.root);
    if (!owners.has(outputPath)) owners.set(outputPath, path);
  }

  const outcomes = await mapPool(paths, options, async (path) => {
    const outputPath = correctedPath(path, options.outDir, options.root);
    const owner = owners.get(outputPath);
    if (owner !== path) {
      throw new WriteError(`${path} would overwrite the corrected copy of ${owner}`, { path, outputPath, owner });
    }

    const text = await readText(path, options.encoding);
    const result = correct(text, ruleSet);

    if (!options.dryRun) {
      const files: Array<[string, string]> = [[outputPath, result.text]];
      if (options.writeChanges) {
        const log = result.changes.map(c => ({
          pattern: c.rule.pattern,
          replacement: c.replacement,
          scope: c.rule.scope,
          start: c.start,
          end: c.end,
          source: c.source,
        }));
        files.push([changeLogPath(outputPath), JSON.stringify(log, null, 2)]);
      }
      await writeOutputs(files);
    }

    const { era } = extractMetadata(path, eras);
    return {
      stats: correctionStats(text, result, era),
      file: {
        path,
        outputPath,
        changes: result.changes.length,
        originalLength: text.length,
        correctedLength: result.text.length,
        comparison: options.comparisons ? renderComparisonReport(text, result, { source: path }) : undefined,
      },
    };
  });

  const acc = new StatsAccumulator();
  const files: CorrectedFile[] = [];
  const failures: FileFailure[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) {
      acc.add(outcome.value.stats);
      files.push(outcome.value.file);
    } else {
      failures.push(outcome.failure);
    }
  }

  return { stats: acc.finalize(), files, failures };
}

/**
 * `<stem>_corrected<ext>` beside the input, or under `outDir`. With a corpus
 * root the input's directories below the root are kept under `outDir`.
 */
export function correctedPath(path: string, outDir?: string, root?: string): string {
  const ext = extname(path);
  const name = `${basename(path, ext)}_corrected${ext}`;
  if (outDir === undefined) return join(dirname(path), name);

  const below = root === undefined ? undefined : relative(root, dirname(path));
  if (below === undefined || below.startsWith('..') || isAbsolute(below)) return join(outDir, name);
  return join(outDir, below, name);
}

/** First path segment below the root, `.` at the root itself; the parent directory's name without a root. */
export function topDirectory(path: string, root?: string): string {
  if (root === undefined) return basename(dirname(path));
  const below = relative(root, dirname(path));
  if (below === '') return '.';
  if (below.startsWith('..') || isAbsolute(below)) return basename(dirname(path));
  return below.split(sep)[0];
}

function changeLogPath(outputPath: string): string {
  const ext = extname(outputPath);
  const stem = basename(outputPath, ext).replace(/_corrected$/, '');
  return join(dirname(outputPath), `${stem}_changes.json`);
}

async function writeOutputs(files: ReadonlyArray<[string, string]>): Promise<void> {
  for (const [path, content] of files) {
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, 'utf-8');
    } catch (err) {
      throw new WriteError(`Could not write ${path}: ${errorMessage(err)}`, { path }, err);
    }
  }
}

async function readText(path: string, encoding?: string): Promise<string> {
  const bytes = await readFile(path);
  return decodeText(bytes, encoding, path);
}

// Outcomes keep the input order regardless of completion order.
async function mapPool<T>(
  paths: readonly string[],
  options: BatchOptions,
  task: (path: string) => Promise<T>,
): Promise<Outcome<T>[]> {
  const outcomes: Outcome<T>[] = new Array(paths.length);
  const concurrency = Math.max(1, Math.min(options.concurrency ?? 8, paths.length || 1));
  let next = 0;
  let done = 0;

  async function worker(): Promise<void> {
    while (next < paths.length) {
      const index = next++;
      const path = paths[index];
      try {
        outcomes[index] = { ok: true, value: await task(path) };
      } catch (err) {
        outcomes[index] = { ok: false, failure: { path, code: errorCode(err), message: errorMessage(err) } };
      }
      done++;
      options.onProgress?.({ done, total: paths.length, path, failed: !outcomes[index].ok });
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => worker()));
  return outcomes;
}
