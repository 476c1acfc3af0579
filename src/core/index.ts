// Core types
export * from './types.js';

// Errors
export {
  ERROR_CODES, OcrSiftError, InvalidRuleSetError, DecodingError, ConfigError, WriteError, StatsFinalizedError,
  errorCode, errorMessage,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Rules
export {
  createRuleSet, compareRules, ruleKey, toRuleInputs,
  loadRuleSet, parseRuleFile, bundledRulesPath, ruleSetHash, ruleFileSchema,
} from './rules/index.js';
export type { RuleInput, BundledRules, RuleFile } from './rules/index.js';

// Scanner
export { tokenize, reconstruct, characterPositions } from './scanner/index.js';
export type { Token, ScannedText, CharacterPosition } from './scanner/index.js';

// Analysis
export {
  analyze, findMatches, matchWord, countWord, countCharacter,
  emptyStats, mergeStats, mergeAll, isFinalized, buildStats, StatsAccumulator,
  detectSuspicious,
} from './analyzer/index.js';
export type { AnalyzeOptions } from './analyzer/index.js';

// Correction
export { correct, correctionStats } from './corrector/index.js';

// Reporting
export {
  summarize, errorRates, eraBreakdown, newspaperBreakdown, resolutionBreakdown, directoryBreakdown,
  renderTextReport, renderComparisonReport, arrow, formatInt,
} from './report/index.js';
export type { SummarizeOptions, TextReportInput, ComparisonReportOptions } from './report/index.js';

// Corpus I/O
export {
  discoverFiles, matchGlob, globToRegExp, decodeText,
  extractMetadata, classifyEra, DEFAULT_ERAS, UNKNOWN_ERA,
  analyzeCorpus, correctFiles, correctedPath, topDirectory,
} from './corpus/index.js';
export type {
  DiscoverOptions, BatchOptions, BatchProgress, AnalyzeCorpusResult,
  CorrectFilesOptions, CorrectFilesResult, CorrectedFile,
} from './corpus/index.js';

// Database
export { RunRepository } from './db/repository.js';
export type { NewRun } from './db/repository.js';

// Config
export { resolveConfig, saveConfig, defaultConfig, getConfigDir, getDbPath, ensureConfigDir } from './config.js';

// Hash
export { contentHash } from './hash.js';
