export { correct } from './engine.js';
export { correctionStats } from './stats.js';
