import { buildStats } from '../analyzer/stats.js';
import { ruleKey } from '../rules/ruleset.js';
import { tokenize } from '../scanner/tokenizer.js';
import type { CorpusStats, CorrectionResult, PatternStats } from '../types.js';

/**
 * Per-rule counts of the corrections actually applied to one text, in the
 * same shape the analyzer produces, so applied corrections can be merged
 * and ranked the same way.
 */
export function correctionStats(original: string, result: CorrectionResult, era?: string): CorpusStats {
  const counts = new Map<string, PatternStats>();

  for (const change of result.changes) {
    const key = ruleKey(change.rule);
    const existing = counts.get(key);
    const occurrences = (existing?.occurrences ?? 0) + 1;
    counts.set(key, {
      pattern: change.rule.pattern,
      replacement: change.rule.replacement,
      scope: change.rule.scope,
      occurrences,
      files: 1,
      eras: era !== undefined ? { [era]: occurrences } : {},
    });
  }

  return buildStats({
    patterns: counts.values(),
    totals: { files: 1, words: tokenize(original).tokens.length, characters: original.length },
    era,
    suspicious: { mixedAlphanumeric: 0, repeatedCharacters: 0 },
  });
}
