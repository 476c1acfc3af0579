import { describe, it, expect } from 'vitest';
import { renderComparisonReport } from '../../../src/core/report/comparison.js';
import { correct } from '../../../src/core/corrector/engine.js';
import { createRuleSet } from '../../../src/core/rules/ruleset.js';

const rules = createRuleSet([
  { pattern: 'rn', replacement: 'm', scope: 'character' },
  { pattern: 'tbe', replacement: 'the', scope: 'word' },
]);

describe('renderComparisonReport', () => {
  it('should list totals, each correction and both excerpts', () => {
    const original = 'tbe rnan';
    const report = renderComparisonReport(original, correct(original, rules), { source: 'page_ocr.txt' });

    expect(report.split('\n')).toEqual([
      '='.repeat(80),
      'OCR CORRECTION COMPARISON',
      'Source: page_ocr.txt',
      '='.repeat(80),
      '',
      'SUMMARY',
      '-'.repeat(80),
      'Corrections applied: 2',
      'Original length: 8 characters',
      'Corrected length: 7 characters',
      '',
      'CORRECTIONS',
      '-'.repeat(80),
      `  ${'0'.padStart(8)}  ${'word'.padEnd(9)} tbe → the`,
      `  ${'4'.padStart(8)}  ${'character'.padEnd(9)} rn → m`,
      '',
      'EXCERPTS (first 1,000 characters)',
      '-'.repeat(80),
      'Original:',
      'tbe rnan',
      '',
      'Corrected:',
      'the man',
      '='.repeat(80),
      '',
    ]);
  });

  it('should omit the corrections section when nothing changed', () => {
    const lines = renderComparisonReport('clean', correct('clean', rules)).split('\n');

    expect(lines[1]).toBe('OCR CORRECTION COMPARISON');
    expect(lines[2]).toBe('='.repeat(80));
    expect(lines).toContain('Corrections applied: 0');
    expect(lines).not.toContain('CORRECTIONS');
  });

  it('should cut excerpts to the requested length', () => {
    const lines = renderComparisonReport('tbe rnan', correct('tbe rnan', rules), { excerptLength: 3 }).split('\n');

    expect(lines).toContain('EXCERPTS (first 3 characters)');
    expect(lines.slice(-7, -1)).toEqual(['Original:', 'tbe', '', 'Corrected:', 'the', '='.repeat(80)]);
  });
});
