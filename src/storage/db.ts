import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import type { BatchSummary, LedgerEntry, WorkflowSession } from '../types.js';

interface LedgerRow {
  fingerprint: string;
  groupKey: string;
  destinationPath: string;
  processedAt: string;
}

export interface RunRow {
  id: number;
  sessionId: string;
  phase: string;
  counts: Record<string, number>;
  error: string | null;
  createdAt: string;
}

function safeParseJson<T>(value: string | null, fallback: T): T {
  if (!value) {
    return fallback;
  }
  try {
    return JSON.parse(value) as T;
  } catch {
    return fallback;
  }
}

function toLedgerEntry(row: LedgerRow): LedgerEntry {
  return {
    fingerprint: row.fingerprint,
    groupKey: row.groupKey,
    destinationPath: row.destinationPath,
    processedTimestamp: row.processedAt,
  };
}

export class AppDb {
  readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.init();
  }

  close(): void {
    this.db.close();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        fingerprint TEXT NOT NULL UNIQUE,
        groupKey TEXT NOT NULL,
        destinationPath TEXT NOT NULL,
        processedAt TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_ledger_group ON ledger(groupKey);

      CREATE TABLE IF NOT EXISTS ledger_claims (
        fingerprint TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        claimedAt INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS sessions (
        id TEXT PRIMARY KEY,
        phase TEXT NOT NULL,
        payloadJson TEXT NOT NULL,
        updatedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS group_passwords (
        groupKey TEXT PRIMARY KEY,
        passwordsJson TEXT NOT NULL,
        updatedAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        sessionId TEXT NOT NULL,
        phase TEXT NOT NULL,
        countsJson TEXT NOT NULL,
        error TEXT,
        createdAt TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
      );
    `);
  }

  hasLedgerEntry(fingerprint: string): boolean {
    const row = this.db.prepare('SELECT 1 AS present FROM ledger WHERE fingerprint = ?').get(fingerprint);
    return row !== undefined;
  }

  getLedgerEntry(fingerprint: string): LedgerEntry | null {
    const row = this.db
      .prepare('SELECT fingerprint, groupKey, destinationPath, processedAt FROM ledger WHERE fingerprint = ?')
      .get(fingerprint) as LedgerRow | undefined;
    return row ? toLedgerEntry(row) : null;
  }

  /** Returns false when the fingerprint was already present. */
  insertLedgerEntry(entry: LedgerEntry): boolean {
    const result = this.db
      .prepare(`
        INSERT INTO ledger (fingerprint, groupKey, destinationPath, processedAt)
        VALUES (@fingerprint, @groupKey, @destinationPath, @processedTimestamp)
        ON CONFLICT(fingerprint) DO NOTHING
      `)
      .run(entry);
    return result.changes > 0;
  }

  listLedgerEntries(groupKey?: string): LedgerEntry[] {
    const rows = groupKey
      ? (this.db
          .prepare('SELECT fingerprint, groupKey, destinationPath, processedAt FROM ledger WHERE groupKey = ? ORDER BY seq ASC')
          .all(groupKey) as LedgerRow[])
      : (this.db
          .prepare('SELECT fingerprint, groupKey, destinationPath, processedAt FROM ledger ORDER BY seq ASC')
          .all() as LedgerRow[]);
    return rows.map(toLedgerEntry);
  }

  /**
   * Takes the cross-process claim on a fingerprint. A claim older than
   * `ttlMs` is considered abandoned and is taken over.
   */
  tryClaim(fingerprint: string, owner: string, ttlMs: number, now = Date.now()): boolean {
    const trx = this.db.transaction((): boolean => {
      const existing = this.db
        .prepare('SELECT owner, claimedAt FROM ledger_claims WHERE fingerprint = ?')
        .get(fingerprint) as { owner: string; claimedAt: number } | undefined;

      if (existing && existing.owner !== owner && now - existing.claimedAt < ttlMs) {
        return false;
      }

      this.db
        .prepare(`
          INSERT INTO ledger_claims (fingerprint, owner, claimedAt) VALUES (?, ?, ?)
          ON CONFLICT(fingerprint) DO UPDATE SET owner = excluded.owner, claimedAt = excluded.claimedAt
        `)
        .run(fingerprint, owner, now);
      return true;
    });

    return trx.immediate();
  }

  releaseClaim(fingerprint: string, owner: string): void {
    this.db.prepare('DELETE FROM ledger_claims WHERE fingerprint = ? AND owner = ?').run(fingerprint, owner);
  }

  saveSession(session: WorkflowSession): void {
    this.db
      .prepare(`
        INSERT INTO sessions (id, phase, payloadJson) VALUES (?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET phase = excluded.phase, payloadJson = excluded.payloadJson, updatedAt = CURRENT_TIMESTAMP
      `)
      .run(session.id, session.phase, JSON.stringify(session));
  }

  getSession(id: string): WorkflowSession | null {
    const row = this.db.prepare('SELECT payloadJson FROM sessions WHERE id = ?').get(id) as
      | { payloadJson: string }
      | undefined;
    return row ? safeParseJson<WorkflowSession | null>(row.payloadJson, null) : null;
  }

  deleteSession(id: string): void {
    this.db.prepare('DELETE FROM sessions WHERE id = ?').run(id);
  }

  getGroupPasswords(groupKey: string): string[] {
    const row = this.db.prepare('SELECT passwordsJson FROM group_passwords WHERE groupKey = ?').get(groupKey) as
      | { passwordsJson: string }
      | undefined;
    return row ? safeParseJson<string[]>(row.passwordsJson, []) : [];
  }

  saveGroupPasswords(groupKey: string, passwords: string[]): void {
    this.db
      .prepare(`
        INSERT INTO group_passwords (groupKey, passwordsJson) VALUES (?, ?)
        ON CONFLICT(groupKey) DO UPDATE SET passwordsJson = excluded.passwordsJson, updatedAt = CURRENT_TIMESTAMP
      `)
      .run(groupKey, JSON.stringify(passwords));
  }

  insertRun(summary: BatchSummary): void {
    this.db
      .prepare('INSERT INTO runs (sessionId, phase, countsJson, error) VALUES (?, ?, ?, ?)')
      .run(summary.sessionId, summary.phase, JSON.stringify(summary.counts), summary.error ?? null);
  }

  listRuns(sessionId: string): RunRow[] {
    const rows = this.db
      .prepare('SELECT id, sessionId, phase, countsJson, error, createdAt FROM runs WHERE sessionId = ? ORDER BY id ASC')
      .all(sessionId) as Array<{ id: number; sessionId: string; phase: string; countsJson: string; error: string | null; createdAt: string }>;
    return rows.map((row) => ({
      id: row.id,
      sessionId: row.sessionId,
      phase: row.phase,
      counts: safeParseJson<Record<string, number>>(row.countsJson, {}),
      error: row.error,
      createdAt: row.createdAt,
    }));
  }
}
