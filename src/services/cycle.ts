import type { ManagedPauseLedger } from '../db/ledger.js';
import type {
  DirectorySets,
  ManagedPause,
  MonitoredDirectory,
  QueueItem,
  SchedulingPolicy,
  SpaceEvaluation,
  SpaceStatus,
} from '../types/queue.js';
import type { DeferReason, DeferredItem, ItemRef, RejectedItem } from '../types/report.js';

/**
 * Working state of one directory during one cycle. The active/queued maps
 * start from the snapshot and follow every command committed in the cycle.
 */
export interface DirectoryCycle {
  directory: MonitoredDirectory;
  freeBytes: number;
  totalBytes: number;
  status: SpaceStatus;
  active: Map<string, QueueItem>;
  queued: Map<string, QueueItem>;
  critical: boolean;
  paused: QueueItem[];
  resumed: QueueItem[];
  interventions: QueueItem[];
  deferred: DeferredItem[];
  rejected: RejectedItem[];
}

export function createDirectoryCycle(sets: DirectorySets, evaluation: SpaceEvaluation): DirectoryCycle {
  return {
    directory: sets.directory,
    freeBytes: evaluation.freeBytes,
    totalBytes: evaluation.totalBytes,
    status: evaluation.status,
    active: new Map(sets.active.map((item) => [item.hash, item])),
    queued: new Map(sets.queued.map((item) => [item.hash, item])),
    critical: false,
    paused: [],
    resumed: [],
    interventions: [],
    deferred: [],
    rejected: [],
  };
}

export function toItemRef(item: QueueItem): ItemRef {
  return { hash: item.hash, name: item.name, sizeRemaining: item.sizeRemaining };
}

export function defer(cycle: DirectoryCycle, item: QueueItem, reason: DeferReason): void {
  cycle.deferred.push({ ...toItemRef(item), reason });
}

/**
 * Downloader-wide bound on what the scheduler lets run at once: an item
 * count and, optionally, the summed remaining bytes of active items.
 */
export class ActiveBudget {
  private activeItems: number;
  private activeBytes: number;

  constructor(
    readonly maxItems: number,
    readonly maxBytes: number | null,
    active: QueueItem[],
  ) {
    this.activeItems = active.length;
    this.activeBytes = active.reduce((sum, item) => sum + item.sizeRemaining, 0);
  }

  get items(): number {
    return this.activeItems;
  }

  get bytes(): number {
    return this.activeBytes;
  }

  hasSlot(): boolean {
    return this.activeItems < this.maxItems;
  }

  /**
   * Why `item` cannot start now, or null when it fits.
   */
  check(item: QueueItem): DeferReason | null {
    if (!this.hasSlot()) return 'active-limit';
    if (this.maxBytes !== null && item.sizeRemaining > 0 && this.activeBytes + item.sizeRemaining > this.maxBytes) {
      return 'active-bytes-limit';
    }
    return null;
  }

  overBytes(): boolean {
    return this.maxBytes !== null && this.activeBytes > this.maxBytes;
  }

  admit(item: QueueItem): void {
    this.activeItems++;
    this.activeBytes += item.sizeRemaining;
  }

  release(item: QueueItem): void {
    this.activeItems = Math.max(0, this.activeItems - 1);
    this.activeBytes = Math.max(0, this.activeBytes - item.sizeRemaining);
  }
}

export type ResumeKind = 'release' | 'deadlock';

/**
 * Issues commands for the current cycle. Both return false when the
 * downloader rejected the command and throw when it could not be reached.
 */
export interface QueueCommands {
  pause(cycle: DirectoryCycle, item: QueueItem): Promise<boolean>;
  resume(cycle: DirectoryCycle, item: QueueItem, kind: ResumeKind): Promise<boolean>;
}

export interface CycleContext {
  downloaderId: string;
  ledger: ManagedPauseLedger;
  /** Hashes ledgered when the cycle started; only these may be resumed. */
  ledgerBefore: ReadonlySet<string>;
  commands: QueueCommands;
  budget: ActiveBudget;
  policy: SchedulingPolicy;
}

export interface LedgeredItem {
  item: QueueItem;
  pause: ManagedPause;
}

/**
 * QueuedSet ∩ ledger(directory), restricted to entries that predate the cycle.
 */
export function resumableItems(context: CycleContext, cycle: DirectoryCycle): LedgeredItem[] {
  const result: LedgeredItem[] = [];
  for (const pause of context.ledger.listForDirectory(context.downloaderId, cycle.directory.path)) {
    const item = cycle.queued.get(pause.hash);
    if (item && context.ledgerBefore.has(pause.hash)) {
      result.push({ item, pause });
    }
  }
  return result;
}
