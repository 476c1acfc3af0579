import { tokenize, type Token } from '../scanner/tokenizer.js';
import { buildStats } from './stats.js';
import { detectSuspicious } from './suspicious.js';
import type { CorpusStats, MatchEvent, PatternStats, RuleSet, SubstitutionRule } from '../types.js';

export interface AnalyzeOptions {
  /** Opaque grouping key supplied by the caller, e.g. a historical period. */
  era?: string;
}

/**
 * Count every candidate occurrence of every rule in one text. Nothing is
 * consumed: overlapping candidates from different rules, and overlapping
 * occurrences of the same pattern, are all counted.
 */
export function analyze(text: string, ruleSet: RuleSet, options: AnalyzeOptions = {}): CorpusStats {
  const scan = tokenize(text);
  const patterns: PatternStats[] = [];

  for (const rule of ruleSet.rules) {
    const occurrences = rule.scope === 'word'
      ? countWord(scan.tokens, rule.pattern)
      : countCharacter(text, rule.pattern);
    if (occurrences === 0) continue;

    patterns.push({
      pattern: rule.pattern,
      replacement: rule.replacement,
      scope: rule.scope,
      occurrences,
      files: 1,
      eras: options.era !== undefined ? { [options.era]: occurrences } : {},
    });
  }

  return buildStats({
    patterns,
    totals: { files: 1, words: scan.tokens.length, characters: text.length },
    era: options.era,
    suspicious: detectSuspicious(text, scan.tokens),
  });
}

/** Every candidate match in offset order, for inspection and highlighting. */
export function findMatches(text: string, ruleSet: RuleSet): MatchEvent[] {
  const scan = tokenize(text);
  const events: MatchEvent[] = [];

  for (const rule of ruleSet.rules) {
    if (rule.scope === 'word') {
      for (const token of scan.tokens) {
        const span = matchWord(token, rule.pattern);
        if (span) events.push(makeEvent(rule, span.start, span.end, text));
      }
    } else {
      for (const offset of occurrenceOffsets(text, rule.pattern)) {
        events.push(makeEvent(rule, offset, offset + rule.pattern.length, text));
      }
    }
  }

  return events.sort((a, b) => a.start - b.start || b.end - a.end);
}

/**
 * Span of a token claimed by a word pattern: the whole token when it equals
 * the pattern, else its punctuation-stripped word.
 */
export function matchWord(token: Token, pattern: string): { start: number; end: number } | null {
  if (token.text === pattern) return { start: token.start, end: token.end };
  if (token.word === pattern) return { start: token.wordStart, end: token.wordEnd };
  return null;
}

export function countWord(tokens: readonly Token[], pattern: string): number {
  let count = 0;
  for (const token of tokens) {
    if (matchWord(token, pattern)) count++;
  }
  return count;
}

export function countCharacter(text: string, pattern: string): number {
  let count = 0;
  const offsets = occurrenceOffsets(text, pattern);
  while (!offsets.next().done) count++;
  return count;
}

function* occurrenceOffsets(text: string, pattern: string): Generator<number> {
  let from = 0;
  for (;;) {
    const at = text.indexOf(pattern, from);
    if (at === -1) return;
    yield at;
    from = at + 1;
  }
}

function makeEvent(rule: SubstitutionRule, start: number, end: number, text: string): MatchEvent {
  return Object.freeze({ rule, start, end, source: text.slice(start, end) });
}
