import { StatsFinalizedError } from '../errors.js';
import { ruleKey } from '../rules/ruleset.js';
import type { CorpusStats, PatternStats, RuleScope, SuspiciousCounts, TextTotals } from '../types.js';

interface PatternDraft {
  pattern: string;
  replacement: string;
  scope: RuleScope;
  occurrences: number;
  files: number;
  eras: Record<string, number>;
}

interface TotalsDraft {
  files: number;
  words: number;
  characters: number;
}

interface StatsDraft {
  patterns: Map<string, PatternDraft>;
  totals: TotalsDraft;
  eras: Map<string, TotalsDraft>;
  suspicious: { mixedAlphanumeric: number; repeatedCharacters: number };
}

export function emptyStats(): CorpusStats {
  return freezeDraft(newDraft());
}

/** Sum of two stats. Commutative and associative; `emptyStats()` is the identity. */
export function mergeStats(a: CorpusStats, b: CorpusStats): CorpusStats {
  const draft = newDraft();
  addInto(draft, a);
  addInto(draft, b);
  return freezeDraft(draft);
}

export function mergeAll(parts: Iterable<CorpusStats>): CorpusStats {
  const acc = new StatsAccumulator();
  for (const part of parts) acc.add(part);
  return acc.finalize();
}

export function isFinalized(stats: CorpusStats): boolean {
  return Object.isFrozen(stats) && Object.isFrozen(stats.patterns);
}

/**
 * Single-owner reduce step for partial stats produced independently per
 * file. Not shared between workers: results are handed to it one at a time.
 */
export class StatsAccumulator {
  private draft: StatsDraft = newDraft();
  private finalized: CorpusStats | null = null;

  add(partial: CorpusStats): this {
    if (this.finalized) throw new StatsFinalizedError();
    addInto(this.draft, partial);
    return this;
  }

  finalize(): CorpusStats {
    if (!this.finalized) {
      this.finalized = freezeDraft(this.draft);
    }
    return this.finalized;
  }
}

/** Build frozen stats for a single analysed text. */
export function buildStats(input: {
  patterns: Iterable<PatternStats>;
  totals: TextTotals;
  era?: string;
  suspicious: SuspiciousCounts;
}): CorpusStats {
  const draft = newDraft();
  for (const p of input.patterns) {
    draft.patterns.set(ruleKey(p), { ...p, eras: { ...p.eras } });
  }
  draft.totals = { ...input.totals };
  if (input.era !== undefined) {
    draft.eras.set(input.era, { ...input.totals });
  }
  draft.suspicious = { ...input.suspicious };
  return freezeDraft(draft);
}

function newDraft(): StatsDraft {
  return {
    patterns: new Map(),
    totals: { files: 0, words: 0, characters: 0 },
    eras: new Map(),
    suspicious: { mixedAlphanumeric: 0, repeatedCharacters: 0 },
  };
}

function addInto(draft: StatsDraft, stats: CorpusStats): void {
  for (const [key, p] of Object.entries(stats.patterns)) {
    const existing = draft.patterns.get(key);
    if (!existing) {
      draft.patterns.set(key, {
        pattern: p.pattern,
        replacement: p.replacement,
        scope: p.scope,
        occurrences: p.occurrences,
        files: p.files,
        eras: { ...p.eras },
      });
      continue;
    }
    existing.occurrences += p.occurrences;
    existing.files += p.files;
    for (const [era, count] of Object.entries(p.eras)) {
      existing.eras[era] = (existing.eras[era] ?? 0) + count;
    }
  }

  addTotals(draft.totals, stats.totals);
  for (const [era, totals] of Object.entries(stats.eras)) {
    const existing = draft.eras.get(era);
    if (existing) {
      addTotals(existing, totals);
    } else {
      draft.eras.set(era, { ...totals });
    }
  }

  draft.suspicious.mixedAlphanumeric += stats.suspicious.mixedAlphanumeric;
  draft.suspicious.repeatedCharacters += stats.suspicious.repeatedCharacters;
}

function addTotals(target: TotalsDraft, source: TextTotals): void {
  target.files += source.files;
  target.words += source.words;
  target.characters += source.characters;
}

// Keys are sorted so that equal stats serialize identically whatever order
// the partial results were merged in.
function freezeDraft(draft: StatsDraft): CorpusStats {
  const patterns: Record<string, PatternStats> = {};
  for (const key of [...draft.patterns.keys()].sort()) {
    const p = draft.patterns.get(key);
    if (!p) continue;
    patterns[key] = Object.freeze({
      pattern: p.pattern,
      replacement: p.replacement,
      scope: p.scope,
      occurrences: p.occurrences,
      files: p.files,
      eras: Object.freeze(sortRecord(p.eras)),
    });
  }

  const eras: Record<string, TextTotals> = {};
  for (const era of [...draft.eras.keys()].sort()) {
    const totals = draft.eras.get(era);
    if (totals) eras[era] = Object.freeze({ ...totals });
  }

  return Object.freeze({
    patterns: Object.freeze(patterns),
    totals: Object.freeze({ ...draft.totals }),
    eras: Object.freeze(eras),
    suspicious: Object.freeze({ ...draft.suspicious }),
  });
}

function sortRecord(record: Record<string, number>): Record<string, number> {
  const sorted: Record<string, number> = {};
  for (const key of Object.keys(record).sort()) {
    sorted[key] = record[key];
  }
  return sorted;
}
