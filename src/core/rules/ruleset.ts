import { InvalidRuleSetError } from '../errors.js';
import type { RuleScope, RuleSet, SubstitutionRule } from '../types.js';

export interface RuleInput {
  pattern: string;
  replacement: string;
  scope: RuleScope;
  priority?: number;
}

const WHITESPACE_RE = /\s/;

export function ruleKey(rule: Pick<SubstitutionRule, 'pattern' | 'scope'>): string {
  return `${rule.scope}:${rule.pattern}`;
}

/**
 * Validate rules and freeze them into application order: longest pattern
 * first, then higher priority, then pattern text. Word and character rules
 * are ordered independently.
 */
export function createRuleSet(inputs: readonly RuleInput[]): RuleSet {
  const seen = new Map<string, number>();
  const rules: SubstitutionRule[] = [];

  inputs.forEach((input, index) => {
    const priority = input.priority ?? 0;

    if (input.pattern.length === 0) {
      throw new InvalidRuleSetError(`Rule #${index} has an empty pattern`, { index });
    }
    if (!Number.isInteger(priority)) {
      throw new InvalidRuleSetError(`Rule #${index} ("${input.pattern}") has a non-integer priority`, { index, priority });
    }
    if (input.scope === 'word' && WHITESPACE_RE.test(input.pattern)) {
      throw new InvalidRuleSetError(
        `Word rule #${index} ("${input.pattern}") contains whitespace and can never match a token`,
        { index, pattern: input.pattern },
      );
    }

    const key = ruleKey(input);
    const previous = seen.get(key);
    if (previous !== undefined) {
      throw new InvalidRuleSetError(
        `Duplicate ${input.scope} rule for "${input.pattern}" (rules #${previous} and #${index})`,
        { pattern: input.pattern, scope: input.scope, indexes: [previous, index] },
      );
    }
    seen.set(key, index);

    rules.push(Object.freeze({
      pattern: input.pattern,
      replacement: input.replacement,
      scope: input.scope,
      priority,
    }));
  });

  const wordRules = Object.freeze(rules.filter(r => r.scope === 'word').sort(compareRules));
  const characterRules = Object.freeze(rules.filter(r => r.scope === 'character').sort(compareRules));

  return Object.freeze({
    rules: Object.freeze([...wordRules, ...characterRules]),
    wordRules,
    characterRules,
  });
}

export function compareRules(a: SubstitutionRule, b: SubstitutionRule): number {
  if (a.pattern.length !== b.pattern.length) return b.pattern.length - a.pattern.length;
  if (a.priority !== b.priority) return b.priority - a.priority;
  if (a.pattern === b.pattern) return 0;
  return a.pattern < b.pattern ? -1 : 1;
}

export function toRuleInputs(ruleSet: RuleSet): RuleInput[] {
  return ruleSet.rules.map(r => ({
    pattern: r.pattern,
    replacement: r.replacement,
    scope: r.scope,
    priority: r.priority,
  }));
}
