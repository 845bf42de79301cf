import { beforeEach, describe, expect, it, vi } from 'vitest';
import Database from 'better-sqlite3';
import { initSchema, type SqliteDatabase } from '../src/db/schema.js';
import { createStores } from './helpers.js';
import { ManagedPauseLedger } from '../src/db/ledger.js';
import type { ReportRepository } from '../src/db/reports.js';
import type { CycleReport } from '../src/types/report.js';

function report(downloaderId: string, startedAt: number): CycleReport {
  return {
    downloaderId,
    trigger: 'tick',
    addedHashes: [],
    startedAt,
    finishedAt: startedAt + 1,
    outcome: 'completed',
    error: null,
    purged: [],
    skippedDirectories: [],
    directories: [],
  };
}

describe('ManagedPauseLedger', () => {
  let ledger: ManagedPauseLedger;

  beforeEach(() => {
    ({ ledger } = createStores());
    ledger.record({ downloaderId: 'qb1', hash: 'b', name: 'B', directory: '/data', pausedAt: 20, sizeRemaining: 2, freeAtPause: 100 });
    ledger.record({ downloaderId: 'qb1', hash: 'a', name: 'A', directory: '/data', pausedAt: 10, sizeRemaining: 1, freeAtPause: 100 });
    ledger.record({ downloaderId: 'qb1', hash: 'c', name: 'C', directory: '/media', pausedAt: 30, sizeRemaining: 3, freeAtPause: 100 });
    ledger.record({ downloaderId: 'qb2', hash: 'a', name: 'A', directory: '/data', pausedAt: 5, sizeRemaining: 1, freeAtPause: 100 });
  });

  it('lists entries oldest first, per downloader', () => {
    expect(ledger.list('qb1').map((pause) => pause.hash)).toEqual(['a', 'b', 'c']);
    expect(ledger.list().map((pause) => `${pause.downloaderId}:${pause.hash}`)).toEqual([
      'qb1:a', 'qb1:b', 'qb1:c', 'qb2:a',
    ]);
  });

  it('lists entries of one directory', () => {
    expect(ledger.listForDirectory('qb1', '/data').map((pause) => pause.hash)).toEqual(['a', 'b']);
  });

  it('replaces an entry recorded twice', () => {
    ledger.record({ downloaderId: 'qb1', hash: 'a', name: 'A', directory: '/data', pausedAt: 99, sizeRemaining: 7, freeAtPause: 40 });
    expect(ledger.list('qb1')).toEqual([
      { downloaderId: 'qb1', hash: 'b', name: 'B', directory: '/data', pausedAt: 20, sizeRemaining: 2, freeAtPause: 100 },
      { downloaderId: 'qb1', hash: 'c', name: 'C', directory: '/media', pausedAt: 30, sizeRemaining: 3, freeAtPause: 100 },
      { downloaderId: 'qb1', hash: 'a', name: 'A', directory: '/data', pausedAt: 99, sizeRemaining: 7, freeAtPause: 40 },
    ]);
  });

  it('moves and removes entries', () => {
    ledger.moveToDirectory('qb1', 'a', '/media');
    expect(ledger.listForDirectory('qb1', '/media').map((pause) => pause.hash)).toEqual(['a', 'c']);

    ledger.remove('qb1', 'a');
    expect(ledger.list('qb1').map((pause) => pause.hash)).toEqual(['b', 'c']);
    expect(ledger.list('qb2').map((pause) => pause.hash)).toEqual(['a']);
  });
});

describe('initSchema', () => {
  it('adds the free space column to a ledger created without it', () => {
    const db: SqliteDatabase = new Database(':memory:');
    db.exec(`
      CREATE TABLE managed_pauses (
        downloader_id TEXT NOT NULL,
        hash TEXT NOT NULL,
        name TEXT NOT NULL,
        directory TEXT NOT NULL,
        paused_at INTEGER NOT NULL,
        size_remaining INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (downloader_id, hash)
      )
    `);
    db.prepare(`
      INSERT INTO managed_pauses (downloader_id, hash, name, directory, paused_at, size_remaining)
      VALUES ('qb1', 'old', 'OLD', '/data', 1, 5)
    `).run();
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    initSchema(db);
    initSchema(db);

    expect(new ManagedPauseLedger(db).list('qb1')).toEqual([
      { downloaderId: 'qb1', hash: 'old', name: 'OLD', directory: '/data', pausedAt: 1, sizeRemaining: 5, freeAtPause: 0 },
    ]);
    log.mockRestore();
    db.close();
  });
});

describe('ReportRepository', () => {
  let reports: ReportRepository;
  let db: SqliteDatabase;

  beforeEach(() => {
    ({ reports, db } = createStores());
  });

  function insertRaw(downloaderId: string, body: string): void {
    db.prepare(`
      INSERT INTO cycle_reports (downloader_id, trigger_kind, outcome, started_at, finished_at, report)
      VALUES (?, 'tick', 'completed', 0, 0, ?)
    `).run(downloaderId, body);
  }

  it('returns null before any cycle ran', () => {
    expect(reports.latest('qb1')).toBeNull();
  });

  it('returns reports newest first', () => {
    reports.save(report('qb1', 1));
    reports.save(report('qb2', 2));
    reports.save(report('qb1', 3));

    expect(reports.latest('qb1')).toEqual(report('qb1', 3));
    expect(reports.recent(10).map((r) => r.startedAt)).toEqual([3, 2, 1]);
    expect(reports.recent(1, 'qb1').map((r) => r.startedAt)).toEqual([3]);
  });

  it('keeps a bounded history per downloader', () => {
    for (let i = 0; i < 505; i++) {
      reports.save(report('qb1', i));
    }
    reports.save(report('qb2', 1000));

    const history = reports.recent(1000, 'qb1');
    expect(history).toHaveLength(500);
    expect(history[history.length - 1].startedAt).toBe(5);
    expect(reports.recent(1000, 'qb2')).toHaveLength(1);
  });

  it('leaves out stored rows that do not hold a report', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    reports.save(report('qb1', 1));
    insertRaw('qb1', '{"downloaderId":"qb1","trigger":"tick"}');
    insertRaw('qb1', 'not json');

    expect(reports.latest('qb1')).toBeNull();
    expect(reports.recent(10).map((r) => r.startedAt)).toEqual([1]);
    expect(warn).toHaveBeenCalledWith('[DB] Skipping invalid cycle report 2: addedHashes: Required');
    warn.mockRestore();
  });
});
