import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  bundledRulesPath, loadRuleSet, parseRuleFile, ruleSetHash,
} from '../../../src/core/rules/loader.js';
import { createRuleSet } from '../../../src/core/rules/ruleset.js';
import { ConfigError, InvalidRuleSetError } from '../../../src/core/errors.js';

describe('bundled rule files', () => {
  it('should load the analysis rules', () => {
    const ruleSet = loadRuleSet(bundledRulesPath('analysis'));
    expect(ruleSet.wordRules).toHaveLength(98);
    expect(ruleSet.characterRules).toHaveLength(14);
  });

  it('should load the correction rules', () => {
    const ruleSet = loadRuleSet(bundledRulesPath('corrections'));
    expect(ruleSet.wordRules).toHaveLength(91);
    expect(ruleSet.characterRules.map(r => r.pattern)).toEqual(['AIrs.', 'AIr.', 'ﬁ', 'ﬂ']);
  });

  it('should keep ambiguous diagnostic patterns out of the correction rules', () => {
    const patterns = loadRuleSet(bundledRulesPath('corrections')).rules.map(r => r.pattern);
    expect(patterns).not.toContain('arid');
    expect(patterns).not.toContain('l');
  });
});

describe('parseRuleFile', () => {
  it('should build a rule set from a parsed document', () => {
    const ruleSet = parseRuleFile({
      description: 'test rules',
      rules: [
        { pattern: 'tbe', replacement: 'the', scope: 'word' },
        { pattern: 'rn', replacement: 'm', scope: 'character', priority: 2 },
      ],
    });
    expect(ruleSet.wordRules[0].replacement).toBe('the');
    expect(ruleSet.characterRules[0].priority).toBe(2);
  });

  it('should reject an unknown scope', () => {
    expect(() => parseRuleFile({ rules: [{ pattern: 'x', replacement: 'y', scope: 'line' }] }, 'bad.json'))
      .toThrow(InvalidRuleSetError);
  });

  it('should reject a document without rules', () => {
    expect(() => parseRuleFile({ description: 'nothing' }, 'bad.json'))
      .toThrow(/^Invalid rule file bad\.json: .* at rules$/);
  });

  it('should surface rule set validation errors', () => {
    expect(() => parseRuleFile({
      rules: [
        { pattern: 'aud', replacement: 'and', scope: 'word' },
        { pattern: 'aud', replacement: 'and', scope: 'word' },
      ],
    })).toThrow(InvalidRuleSetError);
  });
});

describe('loadRuleSet', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ocrsift-rules-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a rule file from disk', () => {
    const path = join(dir, 'custom.json');
    writeFileSync(path, JSON.stringify({ rules: [{ pattern: 'vv', replacement: 'w', scope: 'character' }] }));

    const ruleSet = loadRuleSet(path);
    expect(ruleSet.characterRules.map(r => r.pattern)).toEqual(['vv']);
  });

  it('should raise ConfigError for a missing file', () => {
    expect(() => loadRuleSet(join(dir, 'missing.json'))).toThrow(ConfigError);
  });

  it('should raise InvalidRuleSetError for malformed JSON', () => {
    const path = join(dir, 'broken.json');
    writeFileSync(path, '{ "rules": [');
    expect(() => loadRuleSet(path)).toThrow(InvalidRuleSetError);
  });
});

describe('ruleSetHash', () => {
  it('should not depend on declaration order', () => {
    const a = createRuleSet([
      { pattern: 'tbe', replacement: 'the', scope: 'word' },
      { pattern: 'rn', replacement: 'm', scope: 'character' },
    ]);
    const b = createRuleSet([
      { pattern: 'rn', replacement: 'm', scope: 'character' },
      { pattern: 'tbe', replacement: 'the', scope: 'word' },
    ]);
    expect(ruleSetHash(a)).toBe(ruleSetHash(b));
    expect(ruleSetHash(a)).toHaveLength(16);
  });

  it('should change when a replacement changes', () => {
    const a = createRuleSet([{ pattern: 'tbe', replacement: 'the', scope: 'word' }]);
    const b = createRuleSet([{ pattern: 'tbe', replacement: 'The', scope: 'word' }]);
    expect(ruleSetHash(a)).not.toBe(ruleSetHash(b));
  });
});
