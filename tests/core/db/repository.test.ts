import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RunRepository } from '../../../src/core/db/repository.js';
import { analyze } from '../../../src/core/analyzer/frequency.js';
import { mergeStats } from '../../../src/core/analyzer/stats.js';
import { summarize } from '../../../src/core/report/summarize.js';
import { createRuleSet } from '../../../src/core/rules/ruleset.js';
import type { CorpusStats } from '../../../src/core/types.js';

const rules = createRuleSet([
  { pattern: 'tbe', replacement: 'the', scope: 'word' },
  { pattern: 'rn', replacement: 'm', scope: 'character' },
]);

describe('RunRepository', () => {
  let dir: string;
  let db: RunRepository;
  let stats: CorpusStats;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ocrsift-db-'));
    db = new RunRepository(join(dir, 'runs.db'));
    stats = mergeStats(
      analyze('tbe rnan l1ne', rules, { era: 'early' }),
      analyze('tbe tbe cooorn', rules, { era: 'late' }),
    );
  });

  afterEach(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  function save(root = '/corpus') {
    return db.saveRun({ root, rulesPath: '/rules.json', rulesHash: 'abc123', stats, failures: 1 });
  }

  it('should save a run summary', () => {
    const run = save();

    expect(run.root).toBe('/corpus');
    expect(run.files).toBe(2);
    expect(run.words).toBe(6);
    expect(run.failures).toBe(1);
    expect(db.getRun(run.id)).toEqual(run);
    expect(db.getRunCount()).toBe(1);
  });

  it('should rebuild identical stats', () => {
    const run = save();
    const restored = db.getRunStats(run.id);

    expect(restored).toEqual(stats);
    expect(restored && summarize(restored)).toEqual(summarize(stats));
  });

  it('should return null for an unknown run', () => {
    expect(db.getRun('missing')).toBeNull();
    expect(db.getRunStats('missing')).toBeNull();
  });

  it('should find a run by a unique id prefix', () => {
    const run = save();
    expect(db.findRun(run.id.slice(0, 8))?.id).toBe(run.id);
  });

  it('should treat LIKE wildcards in a prefix literally', () => {
    save();

    expect(db.findRun('%')).toBeNull();
    expect(db.findRun('_')).toBeNull();
    expect(db.findRun('')).toBeNull();
  });

  it('should list runs newest first', () => {
    const first = save('/first');
    const second = save('/second');

    expect(db.listRuns().map(r => r.id)).toEqual([second.id, first.id]);
    expect(db.listRuns(1)).toHaveLength(1);
    expect(db.getLatestRun()?.id).toBe(second.id);
  });

  it('should delete a run with its pattern counts', () => {
    const run = save();

    expect(db.deleteRun(run.id)).toBe(true);
    expect(db.getRunStats(run.id)).toBeNull();
    expect(db.deleteRun(run.id)).toBe(false);
    expect(db.getRunCount()).toBe(0);
  });
});
