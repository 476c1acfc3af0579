export { discoverFiles } from './discover.js';
export type { DiscoverOptions } from './discover.js';
export { matchGlob, globToRegExp } from './glob.js';
export { decodeText } from './decode.js';
export { extractMetadata, classifyEra, DEFAULT_ERAS, UNKNOWN_ERA } from './metadata.js';
export { analyzeCorpus, correctFiles, correctedPath, topDirectory } from './batch.js';
export type {
  BatchOptions, BatchProgress, AnalyzeCorpusResult,
  CorrectFilesOptions, CorrectFilesResult, CorrectedFile,
} from './batch.js';
