import type { DirectoryStatus, TriggerKind } from './queue.js';

export interface ItemRef {
  hash: string;
  name: string;
  sizeRemaining: number;
}

export type DeferReason = 'headroom' | 'active-limit' | 'active-bytes-limit';

export interface DeferredItem extends ItemRef {
  reason: DeferReason;
}

export interface RejectedItem extends ItemRef {
  command: 'pause' | 'resume';
  message: string;
}

export type PurgeReason = 'missing' | 'not-paused' | 'unmonitored';

export interface PurgedEntry {
  hash: string;
  name: string;
  directory: string;
  reason: PurgeReason;
}

export interface DirectoryReport {
  directory: string;
  status: DirectoryStatus;
  freeBytes: number;
  lowWatermark: number;
  paused: ItemRef[];
  resumed: ItemRef[];
  deadlockInterventions: ItemRef[];
  deferred: DeferredItem[];
  rejected: RejectedItem[];
}

export interface SkippedDirectory {
  directory: string;
  reason: string;
}

export type CycleOutcome = 'completed' | 'skipped';

export interface CycleReport {
  downloaderId: string;
  trigger: TriggerKind;
  addedHashes: string[];
  startedAt: number;
  finishedAt: number;
  outcome: CycleOutcome;
  error: string | null;
  purged: PurgedEntry[];
  skippedDirectories: SkippedDirectory[];
  directories: DirectoryReport[];
}
