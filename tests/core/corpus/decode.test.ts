import { describe, it, expect } from 'vitest';
import { decodeText } from '../../../src/core/corpus/decode.js';
import { DecodingError } from '../../../src/core/errors.js';

describe('decodeText', () => {
  it('should decode UTF-8 by default', () => {
    expect(decodeText(new TextEncoder().encode('Zürich ﬁne'))).toBe('Zürich ﬁne');
  });

  it('should decode a declared legacy encoding', () => {
    expect(decodeText(new Uint8Array([0x5a, 0xfc, 0x72]), 'latin1')).toBe('Zür');
  });

  it('should reject malformed bytes', () => {
    expect(() => decodeText(new Uint8Array([0x61, 0xff, 0x62]), 'utf-8', 'page_ocr.txt'))
      .toThrow(new DecodingError('page_ocr.txt is not valid utf-8'));
  });

  it('should reject an unknown encoding label', () => {
    expect(() => decodeText(new Uint8Array([0x61]), 'klingon')).toThrow(DecodingError);
  });
});
