import { describe, it, expect } from 'vitest';
import { createRuleSet, ruleKey, toRuleInputs } from '../../../src/core/rules/ruleset.js';
import { InvalidRuleSetError } from '../../../src/core/errors.js';

describe('createRuleSet', () => {
  it('should order rules by length, then priority, then pattern', () => {
    const ruleSet = createRuleSet([
      { pattern: 'l', replacement: '1', scope: 'character' },
      { pattern: 'rn', replacement: 'm', scope: 'character' },
      { pattern: 'O', replacement: '0', scope: 'character', priority: 2 },
      { pattern: 'I', replacement: '1', scope: 'character' },
      { pattern: 'tbe', replacement: 'the', scope: 'word' },
      { pattern: 'aud', replacement: 'and', scope: 'word', priority: 5 },
      { pattern: 'AIr.', replacement: 'Mr.', scope: 'word' },
    ]);

    expect(ruleSet.characterRules.map(r => r.pattern)).toEqual(['rn', 'O', 'I', 'l']);
    expect(ruleSet.wordRules.map(r => r.pattern)).toEqual(['AIr.', 'aud', 'tbe']);
    expect(ruleSet.rules.map(r => r.pattern)).toEqual(['AIr.', 'aud', 'tbe', 'rn', 'O', 'I', 'l']);
  });

  it('should default priority to 0', () => {
    const ruleSet = createRuleSet([{ pattern: 'vv', replacement: 'w', scope: 'character' }]);
    expect(ruleSet.rules[0].priority).toBe(0);
  });

  it('should allow the same pattern in both scopes', () => {
    const ruleSet = createRuleSet([
      { pattern: 'ii', replacement: 'u', scope: 'character' },
      { pattern: 'ii', replacement: 'it', scope: 'word' },
    ]);
    expect(ruleSet.rules).toHaveLength(2);
  });

  it('should return a frozen rule set', () => {
    const ruleSet = createRuleSet([{ pattern: 'tbe', replacement: 'the', scope: 'word' }]);
    expect(Object.isFrozen(ruleSet)).toBe(true);
    expect(Object.isFrozen(ruleSet.rules)).toBe(true);
    expect(Object.isFrozen(ruleSet.rules[0])).toBe(true);
  });

  it('should reject an empty pattern', () => {
    expect(() => createRuleSet([{ pattern: '', replacement: 'x', scope: 'character' }]))
      .toThrow(InvalidRuleSetError);
  });

  it('should reject a duplicate pattern within a scope', () => {
    expect(() => createRuleSet([
      { pattern: 'tbe', replacement: 'the', scope: 'word' },
      { pattern: 'tbe', replacement: 'tho', scope: 'word' },
    ])).toThrow('Duplicate word rule for "tbe" (rules #0 and #1)');
  });

  it('should reject a non-integer priority', () => {
    expect(() => createRuleSet([{ pattern: 'rn', replacement: 'm', scope: 'character', priority: 1.5 }]))
      .toThrow(InvalidRuleSetError);
  });

  it('should reject a word pattern containing whitespace', () => {
    expect(() => createRuleSet([{ pattern: 'of tbe', replacement: 'of the', scope: 'word' }]))
      .toThrow(InvalidRuleSetError);
  });

  it('should accept an empty rule list', () => {
    const ruleSet = createRuleSet([]);
    expect(ruleSet.rules).toEqual([]);
  });
});

describe('ruleKey', () => {
  it('should combine scope and pattern', () => {
    expect(ruleKey({ scope: 'word', pattern: 'tbe' })).toBe('word:tbe');
  });
});

describe('toRuleInputs', () => {
  it('should round-trip through createRuleSet', () => {
    const ruleSet = createRuleSet([
      { pattern: 'l', replacement: '1', scope: 'character' },
      { pattern: 'tbe', replacement: 'the', scope: 'word', priority: 3 },
    ]);
    expect(toRuleInputs(ruleSet)).toEqual([
      { pattern: 'tbe', replacement: 'the', scope: 'word', priority: 3 },
      { pattern: 'l', replacement: '1', scope: 'character', priority: 0 },
    ]);
  });
});
