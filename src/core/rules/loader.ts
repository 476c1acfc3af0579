import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, InvalidRuleSetError } from '../errors.js';
import { contentHash } from '../hash.js';
import { createRuleSet, toRuleInputs } from './ruleset.js';
import type { RuleSet } from '../types.js';

export type BundledRules = 'analysis' | 'corrections';

const ruleSchema = z.object({
  pattern: z.string(),
  replacement: z.string(),
  scope: z.enum(['character', 'word']),
  priority: z.number().int().optional(),
});

export const ruleFileSchema = z.object({
  description: z.string().optional(),
  rules: z.array(ruleSchema),
});

export type RuleFile = z.infer<typeof ruleFileSchema>;

export function parseRuleFile(raw: unknown, source = '<inline>'): RuleSet {
  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new InvalidRuleSetError(
      `Invalid rule file ${source}: ${issue?.message ?? 'unknown error'}${where ? ` at ${where}` : ''}`,
      { source, issues: parsed.error.issues.length },
    );
  }
  return createRuleSet(parsed.data.rules);
}

export function loadRuleSet(filePath: string): RuleSet {
  const path = resolve(filePath);
  if (!existsSync(path)) {
    throw new ConfigError(`Rule file not found: ${path}`, { path });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new InvalidRuleSetError(`Rule file ${path} is not valid JSON`, { path, reason: String(err) });
  }

  return parseRuleFile(raw, path);
}

/**
 * Location of a rule file shipped with the package. Works from the sources
 * and from the bundled dist/ entries alike.
 */
export function bundledRulesPath(kind: BundledRules): string {
  const fileName = `${kind}.json`;
  let dir = dirname(fileURLToPath(import.meta.url));

  for (;;) {
    const candidate = join(dir, 'rules', fileName);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  throw new ConfigError(`Bundled rule file ${fileName} could not be located`);
}

/** Stable fingerprint of a rule set, independent of the order rules were declared in. */
export function ruleSetHash(ruleSet: RuleSet): string {
  return contentHash(JSON.stringify(toRuleInputs(ruleSet)));
}
