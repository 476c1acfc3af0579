import { basename } from 'node:path';
import type { EraBoundary, FileMetadata } from '../types.js';

export const UNKNOWN_ERA = 'Unknown';

export const DEFAULT_ERAS: EraBoundary[] = [
  { before: 1850, label: '1800-1849 (Early 19th C)' },
  { before: 1875, label: '1850-1874 (Mid 19th C)' },
  { before: 1900, label: '1875-1899 (Late 19th C)' },
  { before: 1920, label: '1900-1919 (WWI Era)' },
  { before: 1940, label: '1920-1939 (Interwar)' },
  { before: 1960, label: '1940-1959 (WWII-Postwar)' },
  { before: 1980, label: '1960-1979 (Modern)' },
  { label: '1980-2001 (Digital Era)' },
];

const YEAR_RE = /(\d{4})/;
const PAPER_RE = /([a-z]{3})/;
const RESOLUTION_RE = /(\d{2,4})dpi/i;

/** Metadata derived from a file's name and path, e.g. `kea1828012501_ocr.txt`. */
export function extractMetadata(filePath: string, eras: readonly EraBoundary[] = DEFAULT_ERAS): FileMetadata {
  const filename = basename(filePath);
  const yearMatch = filename.match(YEAR_RE);
  const paperMatch = filename.toLowerCase().match(PAPER_RE);
  const resolutionMatch = filePath.match(RESOLUTION_RE);
  const year = yearMatch ? Number(yearMatch[1]) : null;

  return {
    path: filePath,
    filename,
    year,
    newspaperCode: paperMatch ? paperMatch[1] : 'unknown',
    resolution: resolutionMatch ? Number(resolutionMatch[1]) : null,
    era: classifyEra(year, eras),
  };
}

/** First era whose `before` bound exceeds the year; the open-ended era catches the rest. */
export function classifyEra(year: number | null, eras: readonly EraBoundary[] = DEFAULT_ERAS): string {
  if (year === null) return UNKNOWN_ERA;
  for (const era of eras) {
    if (era.before === undefined || year < era.before) return era.label;
  }
  return UNKNOWN_ERA;
}
