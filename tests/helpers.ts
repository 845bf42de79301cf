import { CommandRejectedError, TransientIOError } from '../src/errors.js';
import { openDatabase } from '../src/db/schema.js';
import { ManagedPauseLedger } from '../src/db/ledger.js';
import { ReportRepository } from '../src/db/reports.js';
import { GB } from '../src/utils/format.js';
import type { DownloaderClient } from '../src/clients/base.js';
import type { DiskSpace, FreeSpaceQuery } from '../src/services/space-evaluator.js';
import type { QueueItem, SchedulingPolicy } from '../src/types/queue.js';

export const DEFAULT_POLICY: SchedulingPolicy = {
  victimOrder: 'largest-remaining',
  releaseOrder: 'oldest-paused',
  smartSkip: true,
  deadlockCycles: 2,
};

let addedCounter = 1_700_000_000;

export function makeItem(overrides: Partial<QueueItem> & Pick<QueueItem, 'hash'>): QueueItem {
  const sizeRemaining = overrides.sizeRemaining ?? GB;
  return {
    name: overrides.hash.toUpperCase(),
    savePath: '/data/downloads',
    sizeTotal: sizeRemaining,
    sizeRemaining,
    addedOn: addedCounter++,
    state: 'active',
    rawState: overrides.state === 'queued' ? 'pausedDL' : 'downloading',
    ...overrides,
  };
}

export function createStores() {
  const db = openDatabase(':memory:');
  return { db, ledger: new ManagedPauseLedger(db), reports: new ReportRepository(db) };
}

/**
 * In-memory downloader: pause/resume flip item state like qBittorrent would.
 */
export class FakeClient implements DownloaderClient {
  name = 'Fake';
  readonly calls: string[] = [];
  readonly rejected = new Set<string>();
  /** Hashes whose commands are applied but whose reply is lost. */
  readonly hangUp = new Set<string>();
  unreachable = false;
  private readonly items = new Map<string, QueueItem>();

  constructor(readonly id = 'qb1', items: QueueItem[] = []) {
    for (const item of items) this.items.set(item.hash, item);
  }

  set(item: QueueItem): void {
    this.items.set(item.hash, item);
  }

  delete(hash: string): void {
    this.items.delete(hash);
  }

  item(hash: string): QueueItem | undefined {
    return this.items.get(hash);
  }

  async testConnection(): Promise<boolean> {
    return !this.unreachable;
  }

  async listItems(): Promise<QueueItem[]> {
    if (this.unreachable) throw new TransientIOError('connection refused');
    return [...this.items.values()].map((item) => ({ ...item }));
  }

  async pause(hash: string): Promise<void> {
    this.command('pause', hash, 'queued', 'pausedDL');
  }

  async resume(hash: string): Promise<void> {
    this.command('resume', hash, 'active', 'downloading');
  }

  private command(name: string, hash: string, state: QueueItem['state'], rawState: string): void {
    if (this.unreachable) throw new TransientIOError('connection refused');
    if (this.rejected.has(hash)) throw new CommandRejectedError(`${name} rejected`, hash);
    this.calls.push(`${name}:${hash}`);
    const item = this.items.get(hash);
    if (item) this.items.set(hash, { ...item, state, rawState });
    if (this.hangUp.has(hash)) throw new TransientIOError('socket hang up');
  }
}

/**
 * Free-space query answering from a mutable table, in GB.
 */
export function fakeDisk(freeGb: Record<string, number>, sizeGb = 1000): FreeSpaceQuery & { set(path: string, gb: number): void } {
  const query = async (path: string): Promise<DiskSpace> => {
    const free = freeGb[path];
    if (free === undefined) throw new Error(`no such mount: ${path}`);
    return { free: free * GB, size: sizeGb * GB };
  };
  return Object.assign(query, {
    set(path: string, gb: number) {
      freeGb[path] = gb;
    },
  });
}
