import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { PRLifecycleState, PullRequest } from "../types.js";
import { LIFECYCLE_STATES } from "../types.js";
import type { PullRequestStore, StateCounts } from "./store.js";
import { MissingEntry, VersionMismatch } from "./store.js";
import { decodePullRequest, encodePullRequest } from "./snapshot.js";

interface PullRequestRow {
  body: string;
}

interface VersionRow {
  version: number;
}

interface StateCountRow {
  state: string;
  count: number;
}

function isLifecycleState(value: string): value is PRLifecycleState {
  return LIFECYCLE_STATES.some((state) => state === value);
}

/**
 * SQLite-backed store. The `version` column carries the optimistic check, so two
 * processes sharing the database file cannot overwrite each other's commits.
 */
export class SqliteStore implements PullRequestStore {
  private db: Database.Database;
  private getStmt: Database.Statement<[string], PullRequestRow>;
  private versionStmt: Database.Statement<[string], VersionRow>;
  private insertStmt: Database.Statement<[string, string, number, string, string, string]>;
  private updateStmt: Database.Statement<[string, number, string, string, string, number]>;
  private countStmt: Database.Statement<[], StateCountRow>;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pull_requests (
        id TEXT PRIMARY KEY,
        state TEXT NOT NULL,
        version INTEGER NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        body TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_pull_requests_state ON pull_requests(state);
    `);

    this.getStmt = this.db.prepare<[string], PullRequestRow>(`SELECT body FROM pull_requests WHERE id = ?`);
    this.versionStmt = this.db.prepare<[string], VersionRow>(`SELECT version FROM pull_requests WHERE id = ?`);
    this.insertStmt = this.db.prepare<[string, string, number, string, string, string]>(`
      INSERT INTO pull_requests (id, state, version, created_at, updated_at, body)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    this.updateStmt = this.db.prepare<[string, number, string, string, string, number]>(`
      UPDATE pull_requests SET state = ?, version = ?, updated_at = ?, body = ?
      WHERE id = ? AND version = ?
    `);
    this.countStmt = this.db.prepare<[], StateCountRow>(`
      SELECT state, COUNT(*) AS count FROM pull_requests GROUP BY state
    `);
  }

  async get(id: string): Promise<PullRequest | undefined> {
    const row = this.getStmt.get(id);
    return row ? decodePullRequest(row.body) : undefined;
  }

  async insert(pr: PullRequest): Promise<void> {
    this.insertStmt.run(pr.id, pr.state, pr.version, pr.createdAt, pr.updatedAt, encodePullRequest(pr));
  }

  async save(pr: PullRequest, expectedVersion: number): Promise<void> {
    const result = this.updateStmt.run(pr.state, pr.version, pr.updatedAt, encodePullRequest(pr), pr.id, expectedVersion);
    if (result.changes === 1) return;

    const current = this.versionStmt.get(pr.id);
    if (!current) throw new MissingEntry(pr.id);
    throw new VersionMismatch(pr.id, expectedVersion, current.version);
  }

  async countByState(): Promise<StateCounts> {
    const counts: StateCounts = {};
    for (const row of this.countStmt.all()) {
      if (isLifecycleState(row.state)) counts[row.state] = row.count;
    }
    return counts;
  }

  close(): void {
    this.db.close();
  }
}
