/**
 * One orchestrator per data directory, held through a SQLite heartbeat row.
 * Works over shared filesystems (NFS, CIFS, SSHFS) where PID checks alone fail.
 */

import Database from 'better-sqlite3';
import path from 'node:path';
import os from 'node:os';
import { promises as fs } from 'node:fs';
import { createLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { isProcessAlive } from '../process/table.js';

const log = createLogger('lock');

const HEARTBEAT_INTERVAL_MS = 10_000;
const STALE_THRESHOLD_MS = 30_000;

export interface LockInfo {
  host: string;
  pid: number;
  startedAt: number;
  heartbeat: number;
}

interface LockRow {
  host: string;
  pid: number;
  started_at: number;
  heartbeat: number;
}

export interface LockOwner {
  host: string;
  pid: number;
}

function openLockDb(file: string): Database.Database {
  const conn = new Database(file);
  // DELETE mode: WAL requires mmap which breaks on network filesystems
  conn.pragma('journal_mode = DELETE');
  conn.exec(`
    CREATE TABLE IF NOT EXISTS lock (
      id INTEGER PRIMARY KEY CHECK (id = 1),
      host TEXT NOT NULL,
      pid INTEGER NOT NULL,
      started_at INTEGER NOT NULL,
      heartbeat INTEGER NOT NULL
    )
  `);
  return conn;
}

function toInfo(row: LockRow): LockInfo {
  return { host: row.host, pid: row.pid, startedAt: row.started_at, heartbeat: row.heartbeat };
}

export class InstanceLock {
  private db: Database.Database | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(
    readonly file: string,
    private readonly owner: LockOwner = { host: os.hostname(), pid: process.pid },
  ) {}

  get held(): boolean {
    return this.db !== null;
  }

  /** Take the lock. Returns the current holder instead when someone else has it. */
  async acquire(): Promise<LockInfo | null> {
    if (this.db) return null;
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const db = openLockDb(this.file);

    const row = db
      .prepare<[], LockRow>('SELECT host, pid, started_at, heartbeat FROM lock WHERE id = 1')
      .get();

    if (row && this.heldByOther(row)) {
      db.close();
      return toInfo(row);
    }

    const now = Date.now();
    db.prepare(
      'INSERT OR REPLACE INTO lock (id, host, pid, started_at, heartbeat) VALUES (1, ?, ?, ?, ?)',
    ).run(this.owner.host, this.owner.pid, now, now);
    this.db = db;

    this.heartbeatTimer = setInterval(() => this.beat(), HEARTBEAT_INTERVAL_MS);
    this.heartbeatTimer.unref();
    log.debug(`acquired ${this.file}`);
    return null;
  }

  release(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    const db = this.db;
    this.db = null;
    if (!db) return;
    db.prepare('DELETE FROM lock WHERE id = 1 AND host = ? AND pid = ?').run(this.owner.host, this.owner.pid);
    db.close();
    log.debug(`released ${this.file}`);
  }

  private heldByOther(row: LockRow): boolean {
    const age = Date.now() - row.heartbeat;
    if (row.host !== this.owner.host) return age < STALE_THRESHOLD_MS;
    return row.pid !== this.owner.pid && isProcessAlive(row.pid);
  }

  private beat(): void {
    try {
      this.db?.prepare('UPDATE lock SET heartbeat = ? WHERE id = 1').run(Date.now());
    } catch (err) {
      log.warn(`heartbeat failed: ${errorMessage(err)}`);
    }
  }
}

export function describeHolder(holder: LockInfo): string {
  const since = new Date(holder.startedAt).toLocaleTimeString();
  return holder.host === os.hostname()
    ? `PID ${holder.pid}, since ${since}`
    : `PID ${holder.pid} on ${holder.host}, since ${since}`;
}
