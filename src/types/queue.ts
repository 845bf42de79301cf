export type ActivityState =
  | 'active'   // Consuming downloader I/O: downloading, stalled, checking, forced, allocating
  | 'queued'   // Held without I/O: paused, stopped, queued for schedule
  | 'ignored'; // Seeding, errored, moving, ...

export interface QueueItem {
  hash: string;
  name: string;
  savePath: string;
  sizeTotal: number;
  sizeRemaining: number;
  addedOn: number;           // unix timestamp
  state: ActivityState;
  rawState: string;          // State as reported by the downloader
}

export interface MonitoredDirectory {
  path: string;
  lowWatermark: number;      // bytes
}

export interface DirectorySets {
  directory: MonitoredDirectory;
  active: QueueItem[];
  queued: QueueItem[];
}

export type SpaceStatus = 'OK' | 'LOW';

export type DirectoryStatus = SpaceStatus | 'CRITICAL';

export interface SpaceEvaluation {
  directory: MonitoredDirectory;
  freeBytes: number;
  totalBytes: number;
  status: SpaceStatus;
}

export interface ManagedPause {
  downloaderId: string;
  hash: string;
  name: string;
  directory: string;
  pausedAt: number;
  sizeRemaining: number;     // At the time of the pause
  freeAtPause: number;       // Free bytes of the directory when paused
}

export type TriggerKind = 'tick' | 'item-added' | 'manual' | 'startup';

export interface Trigger {
  kind: TriggerKind;
  addedHashes: string[];
}

export type VictimOrder = 'largest-remaining' | 'newest-first';

export type ReleaseOrder = 'oldest-paused' | 'smallest-first';

export interface SchedulingPolicy {
  victimOrder: VictimOrder;
  releaseOrder: ReleaseOrder;
  smartSkip: boolean;
  deadlockCycles: number;
}
