import Database from 'better-sqlite3';
import { NewVpsRecord, VpsRecord, VpsStatus } from '../types';

interface VpsRow {
  id: number;
  user_id: string;
  container_name: string;
  plan: string;
  ram_mb: number;
  cpu_cores: number;
  arch: string;
  status: string;
  created_at: string;
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  user_id TEXT PRIMARY KEY,
  credits INTEGER NOT NULL DEFAULT 0
);
CREATE TABLE IF NOT EXISTS vps (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT NOT NULL,
  container_name TEXT NOT NULL,
  plan TEXT NOT NULL,
  ram_mb INTEGER NOT NULL,
  cpu_cores INTEGER NOT NULL,
  arch TEXT NOT NULL,
  status TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_vps_user ON vps (user_id);
`;

function toStatus(value: string): VpsStatus {
  return value === 'running' || value === 'stopped' ? value : 'unknown';
}

function toRecord(row: VpsRow): VpsRecord {
  return {
    id: row.id,
    userId: row.user_id,
    containerName: row.container_name,
    plan: row.plan,
    ramMb: row.ram_mb,
    cpuCores: row.cpu_cores,
    arch: row.arch,
    status: toStatus(row.status),
    createdAt: row.created_at,
  };
}

/**
 * Credits and VPS records, stored in SQLite. Pass ':memory:' for a throwaway database.
 */
export class BotDatabase {
  private db: Database.Database;

  constructor(filename: string) {
    this.db = new Database(filename);
    this.db.pragma('journal_mode = WAL');
    this.db.exec(SCHEMA);
  }

  // ===== CREDITS =====

  getCredits(userId: string): number {
    const row = this.db
      .prepare<[string], { credits: number }>('SELECT credits FROM users WHERE user_id = ?')
      .get(userId);
    return row ? row.credits : 0;
  }

  addCredits(userId: string, amount: number): number {
    this.db
      .prepare(
        `INSERT INTO users (user_id, credits) VALUES (?, ?)
         ON CONFLICT(user_id) DO UPDATE SET credits = credits + excluded.credits`
      )
      .run(userId, amount);
    return this.getCredits(userId);
  }

  /** Returns false when the user has never held credits. The balance never drops below zero. */
  removeCredits(userId: string, amount: number): boolean {
    const result = this.db
      .prepare('UPDATE users SET credits = MAX(0, credits - ?) WHERE user_id = ?')
      .run(amount, userId);
    return result.changes > 0;
  }

  /** Deducts `amount` only if the balance covers it, in one statement. */
  reserveCredits(userId: string, amount: number): boolean {
    const result = this.db
      .prepare('UPDATE users SET credits = credits - ? WHERE user_id = ? AND credits >= ?')
      .run(amount, userId, amount);
    return result.changes > 0;
  }

  clearCredits(userId: string): void {
    this.db.prepare('UPDATE users SET credits = 0 WHERE user_id = ?').run(userId);
  }

  countUsers(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM users').get();
    return row ? row.total : 0;
  }

  // ===== VPS =====

  createVps(record: NewVpsRecord, createdAt: Date = new Date()): number {
    const result = this.db
      .prepare(
        `INSERT INTO vps (user_id, container_name, plan, ram_mb, cpu_cores, arch, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, 'running', ?)`
      )
      .run(
        record.userId,
        record.containerName,
        record.plan,
        record.ramMb,
        record.cpuCores,
        record.arch,
        createdAt.toISOString()
      );
    return Number(result.lastInsertRowid);
  }

  getVps(id: number): VpsRecord | undefined {
    const row = this.db.prepare<[number], VpsRow>('SELECT * FROM vps WHERE id = ?').get(id);
    return row ? toRecord(row) : undefined;
  }

  listVpsByUser(userId: string): VpsRecord[] {
    return this.db
      .prepare<[string], VpsRow>('SELECT * FROM vps WHERE user_id = ? ORDER BY id')
      .all(userId)
      .map(toRecord);
  }

  listAllVps(): VpsRecord[] {
    return this.db.prepare<[], VpsRow>('SELECT * FROM vps ORDER BY id').all().map(toRecord);
  }

  updateVpsStatus(id: number, status: VpsStatus): void {
    this.db.prepare('UPDATE vps SET status = ? WHERE id = ?').run(status, id);
  }

  deleteVps(id: number): boolean {
    return this.db.prepare('DELETE FROM vps WHERE id = ?').run(id).changes > 0;
  }

  close(): void {
    this.db.close();
  }
}
