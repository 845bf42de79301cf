import type { SqliteDatabase } from './schema.js';
import type { ManagedPause } from '../types/queue.js';

interface ManagedPauseRow {
  downloader_id: string;
  hash: string;
  name: string;
  directory: string;
  paused_at: number;
  size_remaining: number;
  free_at_pause: number;
}

function mapRowToPause(row: ManagedPauseRow): ManagedPause {
  return {
    downloaderId: row.downloader_id,
    hash: row.hash,
    name: row.name,
    directory: row.directory,
    pausedAt: row.paused_at,
    sizeRemaining: row.size_remaining,
    freeAtPause: row.free_at_pause,
  };
}

const COLUMNS = 'downloader_id, hash, name, directory, paused_at, size_remaining, free_at_pause';

/**
 * Persistent record of the pauses issued by the scheduler, keyed by
 * (downloader, hash). Anything not in here was paused by the user and is
 * never resumed by the scheduler.
 */
export class ManagedPauseLedger {
  constructor(private readonly db: SqliteDatabase) {}

  list(downloaderId?: string): ManagedPause[] {
    if (downloaderId === undefined) {
      return this.db.prepare<[], ManagedPauseRow>(`
        SELECT ${COLUMNS} FROM managed_pauses
        ORDER BY downloader_id ASC, paused_at ASC
      `).all().map(mapRowToPause);
    }

    return this.db.prepare<[string], ManagedPauseRow>(`
      SELECT ${COLUMNS} FROM managed_pauses
      WHERE downloader_id = ?
      ORDER BY paused_at ASC
    `).all(downloaderId).map(mapRowToPause);
  }

  listForDirectory(downloaderId: string, directory: string): ManagedPause[] {
    return this.db.prepare<[string, string], ManagedPauseRow>(`
      SELECT ${COLUMNS} FROM managed_pauses
      WHERE downloader_id = ? AND directory = ?
      ORDER BY paused_at ASC
    `).all(downloaderId, directory).map(mapRowToPause);
  }

  record(pause: ManagedPause): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO managed_pauses (${COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      pause.downloaderId,
      pause.hash,
      pause.name,
      pause.directory,
      pause.pausedAt,
      pause.sizeRemaining,
      pause.freeAtPause
    );
  }

  moveToDirectory(downloaderId: string, hash: string, directory: string): void {
    this.db.prepare(`
      UPDATE managed_pauses SET directory = ?
      WHERE downloader_id = ? AND hash = ?
    `).run(directory, downloaderId, hash);
  }

  remove(downloaderId: string, hash: string): void {
    this.db.prepare('DELETE FROM managed_pauses WHERE downloader_id = ? AND hash = ?').run(downloaderId, hash);
  }
}
