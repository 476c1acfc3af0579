export { tokenize, reconstruct, characterPositions } from './tokenizer.js';
export type { Token, ScannedText, CharacterPosition } from './tokenizer.js';
