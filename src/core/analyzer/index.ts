export { analyze, findMatches, matchWord, countWord, countCharacter } from './frequency.js';
export type { AnalyzeOptions } from './frequency.js';
export { emptyStats, mergeStats, mergeAll, isFinalized, buildStats, StatsAccumulator } from './stats.js';
export { detectSuspicious } from './suspicious.js';
