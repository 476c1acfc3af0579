import { describe, it, expect } from 'vitest';
import { arrow, renderTextReport } from '../../../src/core/report/text.js';
import { analyze } from '../../../src/core/analyzer/frequency.js';
import { createRuleSet } from '../../../src/core/rules/ruleset.js';

const rules = createRuleSet([
  { pattern: 'rn', replacement: 'm', scope: 'character' },
  { pattern: 'tbe', replacement: 'the', scope: 'word' },
]);

describe('arrow', () => {
  it('should join pattern and replacement', () => {
    expect(arrow('rn', 'm')).toBe('rn → m');
  });

  it('should quote whitespace-only values', () => {
    expect(arrow('  ', ' ')).toBe('"  " → " "');
    expect(arrow('-\n', '')).toBe('-\n → ""');
  });
});

describe('renderTextReport', () => {
  const stats = analyze('tbe rnan tbe', rules, { era: '1850-1874 (Mid 19th C)' });
  const lines = renderTextReport({
    stats,
    root: '/corpus',
    generatedAt: '2024-01-01T00:00:00.000Z',
    topN: 5,
    failures: [{ path: '/corpus/bad_ocr.txt', code: 'DECODING_ERROR', message: 'not valid utf-8' }],
  }).split('\n');

  it('should open with the title and timestamp', () => {
    expect(lines.slice(0, 4)).toEqual([
      '='.repeat(80),
      'OCR ERROR PATTERN ANALYSIS',
      'Generated: 2024-01-01T00:00:00.000Z',
      '='.repeat(80),
    ]);
  });

  it('should include the overview totals', () => {
    expect(lines).toContain('Corpus root: /corpus');
    expect(lines).toContain('Files analyzed: 1');
    expect(lines).toContain('Words processed: 3');
    expect(lines).toContain('Average words per file: 3.0');
    expect(lines).toContain('Files skipped: 1');
  });

  it('should include error rates', () => {
    expect(lines).toContain('Character-level candidates: 1');
    expect(lines).toContain('Word-level errors: 2');
    expect(lines).toContain('Word error rate: 66.667%');
  });

  it('should rank patterns per scope', () => {
    const header = lines.indexOf('TOP 5 WORD PATTERNS');
    expect(lines[header + 4]).toBe(
      `${'1'.padEnd(6)} ${'tbe → the'.padEnd(30)} ${'2'.padStart(15)} ${'100.0%'.padStart(12)}`,
    );
  });

  it('should list the era row', () => {
    expect(lines).toContain(
      `${'1850-1874 (Mid 19th C)'.padEnd(30)} ${'1'.padStart(8)} ${'3'.padStart(12)} ${'3'.padStart(12)} ${'100.00%'.padStart(8)}`,
    );
  });

  it('should list skipped files', () => {
    expect(lines).toContain('/corpus/bad_ocr.txt [DECODING_ERROR] not valid utf-8');
  });
});

describe('renderTextReport with file summaries', () => {
  const stats = analyze('tbe rnan tbe', rules, { era: '1850-1874 (Mid 19th C)' });
  const lines = renderTextReport({
    stats,
    root: '/corpus',
    generatedAt: '2024-01-01T00:00:00.000Z',
    topN: 5,
    files: [
      { path: '/corpus/1852/kea1852_400dpi_ocr.txt', era: '1850-1874 (Mid 19th C)', newspaper: 'kea', resolution: 400, directory: '1852', words: 3, characters: 12, occurrences: 3 },
    ],
  }).split('\n');

  function row(key: string): string {
    return `${key.padEnd(30)} ${'1'.padStart(8)} ${'3'.padStart(12)} ${'3'.padStart(12)} ${'100.00%'.padStart(8)}`;
  }

  it('should add a section per breakdown', () => {
    const newspaper = lines.indexOf('BY NEWSPAPER');
    expect(lines.slice(newspaper, newspaper + 6)).toEqual([
      'BY NEWSPAPER',
      '-'.repeat(80),
      `${'Newspaper'.padEnd(30)} ${'Files'.padStart(8)} ${'Words'.padStart(12)} ${'Errors'.padStart(12)} ${'Rate'.padStart(8)}`,
      '-'.repeat(80),
      row('kea'),
      '',
    ]);
    expect(lines[newspaper + 6]).toBe('BY SCAN RESOLUTION');
    expect(lines[newspaper + 10]).toBe(row('400dpi'));
    expect(lines[newspaper + 12]).toBe('BY DIRECTORY');
    expect(lines[newspaper + 16]).toBe(row('1852'));
  });

  it('should leave the breakdowns out without file summaries', () => {
    const plain = renderTextReport({ stats, root: '/corpus', generatedAt: '2024-01-01T00:00:00.000Z', topN: 5 }).split('\n');
    expect(plain).not.toContain('BY NEWSPAPER');
  });
});
