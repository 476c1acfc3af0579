import Database from 'better-sqlite3';
import { randomUUID } from 'node:crypto';
import { initializeSchema } from './schema.js';
import { emptyStats, mergeStats } from '../analyzer/stats.js';
import { ruleKey } from '../rules/ruleset.js';
import type { AnalysisRun, CorpusStats, PatternStats, RuleScope, TextTotals } from '../types.js';

export interface NewRun {
  root: string;
  rulesPath: string;
  rulesHash: string;
  stats: CorpusStats;
  failures: number;
}

export class RunRepository {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    initializeSchema(this.db);
  }

  close(): void {
    this.db.close();
  }

  // --- Runs ---

  saveRun(run: NewRun): AnalysisRun {
    const id = randomUUID();
    const now = new Date().toISOString();
    const { stats } = run;

    const insertRun = this.db.prepare(`
      INSERT INTO runs (id, root, rules_path, rules_hash, created_at, files, words, characters, failures, mixed_alphanumeric, repeated_characters)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertPattern = this.db.prepare(`
      INSERT INTO pattern_counts (run_id, scope, pattern, replacement, occurrences, files)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertPatternEra = this.db.prepare(`
      INSERT INTO pattern_era_counts (run_id, scope, pattern, era, occurrences)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertEra = this.db.prepare(`
      INSERT INTO era_totals (run_id, era, files, words, characters)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      insertRun.run(
        id, run.root, run.rulesPath, run.rulesHash, now,
        stats.totals.files, stats.totals.words, stats.totals.characters, run.failures,
        stats.suspicious.mixedAlphanumeric, stats.suspicious.repeatedCharacters,
      );
      for (const p of Object.values(stats.patterns)) {
        insertPattern.run(id, p.scope, p.pattern, p.replacement, p.occurrences, p.files);
        for (const [era, count] of Object.entries(p.eras)) {
          insertPatternEra.run(id, p.scope, p.pattern, era, count);
        }
      }
      for (const [era, totals] of Object.entries(stats.eras)) {
        insertEra.run(id, era, totals.files, totals.words, totals.characters);
      }
    })();

    return {
      id,
      root: run.root,
      rulesPath: run.rulesPath,
      rulesHash: run.rulesHash,
      createdAt: now,
      files: stats.totals.files,
      words: stats.totals.words,
      characters: stats.totals.characters,
      failures: run.failures,
    };
  }

  getRun(id: string): AnalysisRun | null {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
    return row ? rowToRun(row) : null;
  }

  /** Look a run up by full id or by a unique id prefix. */
  findRun(idOrPrefix: string): AnalysisRun | null {
    const exact = this.getRun(idOrPrefix);
    if (exact) return exact;

    if (idOrPrefix === '') return null;
    // Literal prefix match: `%` and `_` are ordinary characters here.
    const rows = this.db.prepare('SELECT * FROM runs WHERE substr(id, 1, length(?)) = ? LIMIT 2')
      .all(idOrPrefix, idOrPrefix) as RunRow[];
    return rows.length === 1 ? rowToRun(rows[0]) : null;
  }

  listRuns(limit = 20): AnalysisRun[] {
    const rows = this.db.prepare('SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(limit) as RunRow[];
    return rows.map(rowToRun);
  }

  getLatestRun(): AnalysisRun | null {
    return this.listRuns(1)[0] ?? null;
  }

  deleteRun(id: string): boolean {
    const result = this.db.prepare('DELETE FROM runs WHERE id = ?').run(id);
    return result.changes > 0;
  }

  /** Rebuild the finalized stats recorded for a run. */
  getRunStats(id: string): CorpusStats | null {
    const run = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
    if (!run) return null;

    const patternRows = this.db.prepare('SELECT * FROM pattern_counts WHERE run_id = ?').all(id) as PatternRow[];
    const eraRows = this.db.prepare('SELECT * FROM pattern_era_counts WHERE run_id = ?').all(id) as PatternEraRow[];
    const totalsRows = this.db.prepare('SELECT * FROM era_totals WHERE run_id = ?').all(id) as EraTotalsRow[];

    const patterns: Record<string, PatternStats> = {};
    for (const row of patternRows) {
      const scope = toScope(row.scope);
      const eras: Record<string, number> = {};
      for (const e of eraRows) {
        if (e.scope === row.scope && e.pattern === row.pattern) eras[e.era] = e.occurrences;
      }
      patterns[ruleKey({ scope, pattern: row.pattern })] = {
        pattern: row.pattern,
        replacement: row.replacement,
        scope,
        occurrences: row.occurrences,
        files: row.files,
        eras,
      };
    }

    const eras: Record<string, TextTotals> = {};
    for (const row of totalsRows) {
      eras[row.era] = { files: row.files, words: row.words, characters: row.characters };
    }

    return mergeStats(emptyStats(), {
      patterns,
      totals: { files: run.files, words: run.words, characters: run.characters },
      eras,
      suspicious: {
        mixedAlphanumeric: run.mixed_alphanumeric,
        repeatedCharacters: run.repeated_characters,
      },
    });
  }

  getRunCount(): number {
    const row = this.db.prepare('SELECT COUNT(*) as c FROM runs').get() as { c: number };
    return row.c;
  }
}

function rowToRun(row: RunRow): AnalysisRun {
  return {
    id: row.id,
    root: row.root,
    rulesPath: row.rules_path,
    rulesHash: row.rules_hash,
    createdAt: row.created_at,
    files: row.files,
    words: row.words,
    characters: row.characters,
    failures: row.failures,
  };
}

function toScope(value: string): RuleScope {
  if (value === 'character' || value === 'word') return value;
  throw new Error(`Unknown rule scope in run history: ${value}`);
}

// Row types for SQLite
interface RunRow {
  id: string;
  root: string;
  rules_path: string;
  rules_hash: string;
  created_at: string;
  files: number;
  words: number;
  characters: number;
  failures: number;
  mixed_alphanumeric: number;
  repeated_characters: number;
}

interface PatternRow {
  run_id: string;
  scope: string;
  pattern: string;
  replacement: string;
  occurrences: number;
  files: number;
}

interface PatternEraRow {
  run_id: string;
  scope: string;
  pattern: string;
  era: string;
  occurrences: number;
}

interface EraTotalsRow {
  run_id: string;
  era: string;
  files: number;
  words: number;
  characters: number;
}
