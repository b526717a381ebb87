import Database from 'better-sqlite3';
import type { DeadLetter, IdentifierState, RunSummary } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one row per indexing run
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  index_name TEXT NOT NULL,
  schema_version INTEGER NOT NULL,
  config_json TEXT NOT NULL,
  summary_json TEXT
);

-- Last known state of every identifier in a run
CREATE TABLE IF NOT EXISTS identifier_states (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  paper_id TEXT NOT NULL,
  state TEXT NOT NULL,
  attempts INTEGER NOT NULL DEFAULT 0,
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (run_id, paper_id)
);

-- Identifiers excluded from a run
CREATE TABLE IF NOT EXISTS dead_letters (
  run_id INTEGER NOT NULL REFERENCES runs(run_id),
  paper_id TEXT NOT NULL,
  state TEXT NOT NULL,
  error TEXT NOT NULL,
  reason TEXT NOT NULL,
  attempts INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (run_id, paper_id)
);

CREATE INDEX IF NOT EXISTS idx_identifier_states_paper ON identifier_states(paper_id, state);
`;

export interface RunRecord {
    run_id: number;
    started_at: string;
    finished_at: string | null;
    index_name: string;
    schema_version: number;
    config_json: string;
    summary_json: string | null;
}

export interface NewRun {
    startedAt: string;
    indexName: string;
    schemaVersion: number;
    config: unknown;
}

/**
 * Run ledger around better-sqlite3: what each run did to each identifier,
 * and what it dead-lettered. Backs `inspect` and resumed runs.
 */
export class RunLedger {
    private readonly db: Database.Database;
    private readonly logger = getLogger('ledger');

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        this.logger.debug({ dbPath }, 'Ledger opened');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            this.logger.info('Ledger migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    startRun(run: NewRun): number {
        const result = this.db.prepare(`
      INSERT INTO runs (started_at, index_name, schema_version, config_json)
      VALUES (?, ?, ?, ?)
    `).run(run.startedAt, run.indexName, run.schemaVersion, JSON.stringify(run.config));
        return Number(result.lastInsertRowid);
    }

    finishRun(runId: number, summary: RunSummary): void {
        this.db.prepare('UPDATE runs SET finished_at = ?, summary_json = ? WHERE run_id = ?')
            .run(summary.finishedAt, JSON.stringify(summary), runId);
    }

    getRun(runId: number): RunRecord | undefined {
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs WHERE run_id = ?').get(runId);
    }

    /**
     * Most recent runs first.
     */
    listRuns(limit = 20): RunRecord[] {
        return this.db.prepare<[number], RunRecord>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?').all(limit);
    }

    // ─── Identifiers ──────────────────────────────────────────

    recordState(runId: number, paperId: string, state: IdentifierState, attempts = 0): void {
        this.db.prepare(`
      INSERT INTO identifier_states (run_id, paper_id, state, attempts, updated_at)
      VALUES (?, ?, ?, ?, datetime('now'))
      ON CONFLICT(run_id, paper_id) DO UPDATE SET
        state = excluded.state,
        attempts = MAX(attempts, excluded.attempts),
        updated_at = excluded.updated_at
    `).run(runId, paperId, state, attempts);
    }

    /**
     * Identifiers indexed by any run against `indexName` under `schemaVersion`.
     */
    indexedIdentifiers(indexName: string, schemaVersion: number): Set<string> {
        const rows = this.db.prepare<[string, number], { paper_id: string }>(`
      SELECT DISTINCT s.paper_id FROM identifier_states s
      JOIN runs r ON r.run_id = s.run_id
      WHERE s.state = 'indexed' AND r.index_name = ? AND r.schema_version = ?
    `).all(indexName, schemaVersion);
        return new Set(rows.map((row) => row.paper_id));
    }

    stateCounts(runId: number): Record<string, number> {
        const rows = this.db.prepare<[number], { state: string; count: number }>(
            'SELECT state, COUNT(*) as count FROM identifier_states WHERE run_id = ? GROUP BY state'
        ).all(runId);
        const counts: Record<string, number> = {};
        for (const row of rows) {
            counts[row.state] = row.count;
        }
        return counts;
    }

    // ─── Dead letters ─────────────────────────────────────────

    recordDeadLetter(runId: number, deadLetter: DeadLetter): void {
        this.db.prepare(`
      INSERT OR REPLACE INTO dead_letters (run_id, paper_id, state, error, reason, attempts)
      VALUES (@run_id, @paper_id, @state, @error, @reason, @attempts)
    `).run({ run_id: runId, ...deadLetter });
    }

    getDeadLetters(runId: number): DeadLetter[] {
        return this.db.prepare<[number], DeadLetter>(
            'SELECT paper_id, state, error, reason, attempts FROM dead_letters WHERE run_id = ? ORDER BY paper_id'
        ).all(runId);
    }

    close(): void {
        this.db.close();
        this.logger.debug('Ledger closed');
    }
}
