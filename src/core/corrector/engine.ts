import { matchWord } from '../analyzer/frequency.js';
import { tokenize } from '../scanner/tokenizer.js';
import type { ChangeEvent, CorrectionResult, RuleSet, SubstitutionRule } from '../types.js';

interface ClaimedSpan {
  rule: SubstitutionRule;
  start: number;
  end: number;
}

/**
 * Apply a rule set to one text in a single left-to-right pass.
 *
 * Word rules claim whole tokens first. Character rules then fill the gaps,
 * never overlapping a claimed span. Each rewritten span is exclusive and its
 * replacement goes straight to the output, so nothing inserted in this pass
 * can be matched again.
 */
export function correct(text: string, ruleSet: RuleSet): CorrectionResult {
  const claims = claimWords(text, ruleSet.wordRules);
  const changes: ChangeEvent[] = [];
  let output = '';
  let cursor = 0;
  let claimIndex = 0;

  while (cursor < text.length) {
    const claim = claims[claimIndex];
    const limit = claim ? claim.start : text.length;

    if (claim && cursor === claim.start) {
      output = emit(changes, output, claim.rule, text, claim.start, claim.end);
      cursor = claim.end;
      claimIndex++;
      continue;
    }

    const rule = matchCharacterRule(text, cursor, limit, ruleSet.characterRules);
    if (rule) {
      const end = cursor + rule.pattern.length;
      output = emit(changes, output, rule, text, cursor, end);
      cursor = end;
      continue;
    }

    output += text[cursor];
    cursor++;
  }

  return Object.freeze({ text: output, changes: Object.freeze(changes) });
}

function claimWords(text: string, wordRules: readonly SubstitutionRule[]): ClaimedSpan[] {
  if (wordRules.length === 0) return [];

  const claims: ClaimedSpan[] = [];
  for (const token of tokenize(text).tokens) {
    for (const rule of wordRules) {
      const span = matchWord(token, rule.pattern);
      if (span) {
        claims.push({ rule, start: span.start, end: span.end });
        break;
      }
    }
  }
  return claims;
}

function matchCharacterRule(
  text: string,
  at: number,
  limit: number,
  rules: readonly SubstitutionRule[],
): SubstitutionRule | null {
  for (const rule of rules) {
    if (at + rule.pattern.length > limit) continue;
    if (text.startsWith(rule.pattern, at)) return rule;
  }
  return null;
}

function emit(
  changes: ChangeEvent[],
  output: string,
  rule: SubstitutionRule,
  text: string,
  start: number,
  end: number,
): string {
  changes.push(Object.freeze({
    rule,
    start,
    end,
    source: text.slice(start, end),
    replacement: rule.replacement,
    outputStart: output.length,
    outputEnd: output.length + rule.replacement.length,
  }));
  return output + rule.replacement;
}
