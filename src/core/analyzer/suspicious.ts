import type { Token } from '../scanner/tokenizer.js';
import type { SuspiciousCounts } from '../types.js';

const LETTER_RE = /\p{L}/u;
const DIGIT_RE = /\p{N}/u;
const REPEATED_RE = /(\S)\1{2,}/gu;

/**
 * Heuristic counters that flag likely OCR damage without any rule:
 * words mixing letters and digits ("l1fted") and runs of three or more
 * identical non-whitespace characters ("eee", "---").
 */
export function detectSuspicious(text: string, tokens: readonly Token[]): SuspiciousCounts {
  let mixedAlphanumeric = 0;
  for (const token of tokens) {
    if (LETTER_RE.test(token.word) && DIGIT_RE.test(token.word)) {
      mixedAlphanumeric++;
    }
  }

  let repeatedCharacters = 0;
  REPEATED_RE.lastIndex = 0;
  while (REPEATED_RE.exec(text) !== null) {
    repeatedCharacters++;
  }

  return { mixedAlphanumeric, repeatedCharacters };
}
