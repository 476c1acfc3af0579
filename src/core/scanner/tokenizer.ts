export interface Token {
  index: number;
  /** Raw token text, exactly as it appears in the source. */
  text: string;
  start: number;
  end: number;
  /** Token with leading and trailing punctuation stripped; may be empty. */
  word: string;
  wordStart: number;
  wordEnd: number;
}

export interface ScannedText {
  source: string;
  tokens: Token[];
  /**
   * Whitespace runs around the tokens: `separators[i]` precedes `tokens[i]`,
   * and the final entry trails the last token. Always `tokens.length + 1` long.
   */
  separators: string[];
}

export interface CharacterPosition {
  offset: number;
  char: string;
  /** Containing token, or null when the character is whitespace. */
  token: Token | null;
}

const TOKEN_RE = /\S+/g;
const WORD_CHAR_RE = /[\p{L}\p{N}]/u;

export function tokenize(text: string): ScannedText {
  const tokens: Token[] = [];
  const separators: string[] = [];
  let last = 0;

  TOKEN_RE.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN_RE.exec(text)) !== null) {
    const start = match.index;
    const end = start + match[0].length;
    separators.push(text.slice(last, start));
    tokens.push(makeToken(tokens.length, match[0], start, end));
    last = end;
  }
  separators.push(text.slice(last));

  return { source: text, tokens, separators };
}

export function reconstruct(scan: ScannedText): string {
  let out = '';
  for (let i = 0; i < scan.tokens.length; i++) {
    out += scan.separators[i] + scan.tokens[i].text;
  }
  return out + scan.separators[scan.tokens.length];
}

export function* characterPositions(scan: ScannedText): Generator<CharacterPosition> {
  let tokenIndex = 0;
  for (let offset = 0; offset < scan.source.length; offset++) {
    while (tokenIndex < scan.tokens.length && scan.tokens[tokenIndex].end <= offset) {
      tokenIndex++;
    }
    const candidate = scan.tokens[tokenIndex];
    const token = candidate !== undefined && candidate.start <= offset ? candidate : null;
    yield { offset, char: scan.source[offset], token };
  }
}

function makeToken(index: number, text: string, start: number, end: number): Token {
  let head = 0;
  let tail = text.length;
  while (head < tail && !WORD_CHAR_RE.test(text[head])) head++;
  while (tail > head && !WORD_CHAR_RE.test(text[tail - 1])) tail--;

  return {
    index,
    text,
    start,
    end,
    word: text.slice(head, tail),
    wordStart: start + head,
    wordEnd: start + tail,
  };
}
