import { describe, it, expect } from 'vitest';
import { matchGlob } from '../../../src/core/corpus/glob.js';

describe('matchGlob', () => {
  it('should match files at any depth with **/', () => {
    expect(matchGlob('**/*_ocr.txt', 'kea1828012501_ocr.txt')).toBe(true);
    expect(matchGlob('**/*_ocr.txt', '1828/01/kea1828012501_ocr.txt')).toBe(true);
  });

  it('should keep * within one path segment', () => {
    expect(matchGlob('*_ocr.txt', 'batch/page_ocr.txt')).toBe(false);
    expect(matchGlob('batch/*.txt', 'batch/page_ocr.txt')).toBe(true);
  });

  it('should match one character with ?', () => {
    expect(matchGlob('page?.txt', 'page1.txt')).toBe(true);
    expect(matchGlob('page?.txt', 'page12.txt')).toBe(false);
  });

  it('should treat dots literally', () => {
    expect(matchGlob('*.txt', 'notes_txt')).toBe(false);
  });
});
