export {
  summarize, errorRates, eraBreakdown, newspaperBreakdown, resolutionBreakdown, directoryBreakdown,
} from './summarize.js';
export type { SummarizeOptions } from './summarize.js';
export { renderTextReport, arrow, formatInt } from './text.js';
export type { TextReportInput } from './text.js';
export { renderComparisonReport } from './comparison.js';
export type { ComparisonReportOptions } from './comparison.js';
