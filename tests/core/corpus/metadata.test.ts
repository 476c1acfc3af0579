import { describe, it, expect } from 'vitest';
import { classifyEra, extractMetadata, UNKNOWN_ERA } from '../../../src/core/corpus/metadata.js';

describe('extractMetadata', () => {
  it('should read year, paper code and resolution from the path', () => {
    expect(extractMetadata('/scans/400dpi/kea1828012501_ocr.txt')).toEqual({
      path: '/scans/400dpi/kea1828012501_ocr.txt',
      filename: 'kea1828012501_ocr.txt',
      year: 1828,
      newspaperCode: 'kea',
      resolution: 400,
      era: '1800-1849 (Early 19th C)',
    });
  });

  it('should fall back when the filename carries no metadata', () => {
    const meta = extractMetadata('/scans/12_ocr.txt');

    expect(meta.year).toBeNull();
    expect(meta.newspaperCode).toBe('ocr');
    expect(meta.resolution).toBeNull();
    expect(meta.era).toBe(UNKNOWN_ERA);
  });
});

describe('classifyEra', () => {
  it('should use exclusive upper bounds', () => {
    expect(classifyEra(1849)).toBe('1800-1849 (Early 19th C)');
    expect(classifyEra(1850)).toBe('1850-1874 (Mid 19th C)');
    expect(classifyEra(1939)).toBe('1920-1939 (Interwar)');
  });

  it('should put late years in the open-ended era', () => {
    expect(classifyEra(1995)).toBe('1980-2001 (Digital Era)');
  });

  it('should honour custom eras', () => {
    const eras = [{ before: 1900, label: 'old' }, { before: 2000, label: 'new' }];
    expect(classifyEra(1899, eras)).toBe('old');
    expect(classifyEra(2010, eras)).toBe(UNKNOWN_ERA);
  });
});
