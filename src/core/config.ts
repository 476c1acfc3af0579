import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_ERAS } from './corpus/metadata.js';
import { bundledRulesPath } from './rules/loader.js';
import type { OcrSiftConfig } from './types.js';

const CONFIG_FILE = 'config.json';
const DB_FILE = 'runs.db';

const configSchema = z.object({
  dbPath: z.string().min(1),
  analysisRules: z.string().min(1),
  correctionRules: z.string().min(1),
  encoding: z.string().min(1),
  include: z.array(z.string().min(1)).min(1),
  exclude: z.array(z.string()),
  concurrency: z.number().int().min(1).max(256),
  topN: z.number().int().min(1),
  eras: z.array(z.object({
    before: z.number().int().optional(),
    label: z.string().min(1),
  })).min(1),
}).strict();

export const DEFAULT_EXCLUDE = ['$RECYCLE.BIN', 'System Volume Information', 'node_modules'];

export function getConfigDir(): string {
  return process.env.OCRSIFT_HOME ?? join(homedir(), '.ocrsift');
}

export function getDbPath(): string {
  return join(getConfigDir(), DB_FILE);
}

export function defaultConfig(): OcrSiftConfig {
  return {
    dbPath: getDbPath(),
    analysisRules: bundledRulesPath('analysis'),
    correctionRules: bundledRulesPath('corrections'),
    encoding: 'utf-8',
    include: ['**/*_ocr.txt'],
    exclude: [...DEFAULT_EXCLUDE],
    concurrency: 8,
    topN: 30,
    eras: DEFAULT_ERAS.map(era => ({ ...era })),
  };
}

/**
 * Defaults, overlaid with the saved config file, overlaid with environment
 * overrides. Rule paths in the saved file resolve against the config dir.
 */
export function resolveConfig(): OcrSiftConfig {
  const configDir = getConfigDir();
  const configPath = join(configDir, CONFIG_FILE);
  const merged: Record<string, unknown> = { ...defaultConfig() };

  if (existsSync(configPath)) {
    const saved = readSavedConfig(configPath);
    for (const key of ['analysisRules', 'correctionRules', 'dbPath'] as const) {
      const value = saved[key];
      if (typeof value === 'string') saved[key] = resolve(configDir, value);
    }
    Object.assign(merged, saved);
  }

  const envEncoding = process.env.OCRSIFT_ENCODING;
  if (envEncoding) merged.encoding = envEncoding;

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid configuration in ${configPath}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
      { configPath },
    );
  }
  return parsed.data;
}

export function saveConfig(config: Partial<OcrSiftConfig>): string {
  ensureConfigDir();

  const configPath = join(getConfigDir(), CONFIG_FILE);
  const existing = existsSync(configPath) ? readSavedConfig(configPath) : {};
  const toSave = { ...existing, ...config };

  writeFileSync(configPath, JSON.stringify(toSave, null, 2) + '\n', 'utf-8');
  return configPath;
}

export function ensureConfigDir(): void {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

function readSavedConfig(configPath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${configPath}`, { configPath }, err);
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`, { configPath });
  }
  return Object.fromEntries(Object.entries(raw));
}
