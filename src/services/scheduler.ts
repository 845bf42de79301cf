import { errorMessage } from '../errors.js';
import type { Orchestrator, ManagedDownloader } from './orchestrator.js';
import type { Trigger, TriggerKind } from '../types/queue.js';
import type { CycleReport } from '../types/report.js';

interface PendingRun {
  trigger: Trigger;
  promise: Promise<CycleReport>;
  resolve: (report: CycleReport) => void;
  reject: (error: unknown) => void;
}

interface Lane {
  pending: PendingRun | null;
  draining: Promise<void> | null;
}

// When triggers coalesce, the more specific kind wins
const KIND_RANK: Record<TriggerKind, number> = {
  tick: 0,
  startup: 1,
  manual: 2,
  'item-added': 3,
};

function createPendingRun(trigger: Trigger): PendingRun {
  let resolve: (report: CycleReport) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<CycleReport>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { trigger: { kind: trigger.kind, addedHashes: [...trigger.addedHashes] }, promise, resolve, reject };
}

function mergeTrigger(pending: PendingRun, trigger: Trigger): void {
  if (KIND_RANK[trigger.kind] > KIND_RANK[pending.trigger.kind]) {
    pending.trigger.kind = trigger.kind;
  }
  for (const hash of trigger.addedHashes) {
    if (!pending.trigger.addedHashes.includes(hash)) {
      pending.trigger.addedHashes.push(hash);
    }
  }
}

/**
 * Drives cycles from the periodic tick, item-added notifications and manual
 * runs. Each downloader has one lane: a cycle runs to completion before the
 * next one for the same downloader starts, and triggers arriving meanwhile
 * collapse into a single follow-up cycle. Lanes run independently.
 */
export class QueueScheduler {
  private readonly lanes = new Map<string, Lane>();
  private downloaders = new Map<string, ManagedDownloader>();
  private interval: NodeJS.Timeout | null = null;

  constructor(
    private readonly orchestrator: Orchestrator,
    downloaders: ManagedDownloader[],
  ) {
    this.setDownloaders(downloaders);
  }

  setDownloaders(downloaders: ManagedDownloader[]): void {
    this.downloaders = new Map(downloaders.map((downloader) => [downloader.client.id, downloader]));
  }

  downloaderIds(): string[] {
    return [...this.downloaders.keys()];
  }

  has(downloaderId: string): boolean {
    return this.downloaders.has(downloaderId);
  }

  start(intervalSeconds: number): void {
    this.stopInterval();
    console.log(`[Scheduler] Starting periodic cycle every ${intervalSeconds} seconds`);

    this.interval = setInterval(() => {
      this.tick();
    }, intervalSeconds * 1000);

    this.triggerAll({ kind: 'startup', addedHashes: [] });
  }

  /**
   * Run a cycle for every downloader in the background.
   */
  tick(): void {
    this.triggerAll({ kind: 'tick', addedHashes: [] });
  }

  /**
   * An item was added: classify it (and hold it if its directory is LOW)
   * without waiting for the next tick.
   */
  notifyItemAdded(hash: string, downloaderId?: string): void {
    const ids = downloaderId ? [downloaderId] : this.downloaderIds();
    for (const id of ids) {
      this.runInBackground(id, { kind: 'item-added', addedHashes: [hash] });
    }
  }

  /**
   * Run a manual cycle and wait for it. A downloader whose cycle fails is
   * logged and left out of the result; the others still report.
   */
  async runNow(downloaderId?: string): Promise<CycleReport[]> {
    const ids = downloaderId ? [downloaderId] : this.downloaderIds();
    const results = await Promise.allSettled(
      ids.map((id) => this.trigger(id, { kind: 'manual', addedHashes: [] })),
    );

    const reports: CycleReport[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        reports.push(result.value);
      } else {
        console.error(`[Scheduler] ${ids[index]}: manual cycle failed:`, errorMessage(result.reason));
      }
    });
    return reports;
  }

  trigger(downloaderId: string, trigger: Trigger): Promise<CycleReport> {
    const downloader = this.downloaders.get(downloaderId);
    if (!downloader) {
      return Promise.reject(new Error(`Unknown downloader: ${downloaderId}`));
    }

    const lane = this.getLane(downloaderId);
    if (lane.pending) {
      mergeTrigger(lane.pending, trigger);
    } else {
      lane.pending = createPendingRun(trigger);
    }
    const { promise } = lane.pending;

    if (!lane.draining) {
      lane.draining = this.drain(downloaderId, lane);
    }
    return promise;
  }

  async stop(): Promise<void> {
    this.stopInterval();
    const draining = [...this.lanes.values()]
      .map((lane) => lane.draining)
      .filter((promise): promise is Promise<void> => promise !== null);
    await Promise.all(draining);
    console.log('[Scheduler] Stopped');
  }

  private triggerAll(trigger: Trigger): void {
    for (const id of this.downloaderIds()) {
      this.runInBackground(id, trigger);
    }
  }

  private runInBackground(downloaderId: string, trigger: Trigger): void {
    this.trigger(downloaderId, trigger).catch((error) => {
      console.error(`[Scheduler] ${downloaderId}: ${trigger.kind} cycle failed:`, errorMessage(error));
    });
  }

  private getLane(downloaderId: string): Lane {
    let lane = this.lanes.get(downloaderId);
    if (!lane) {
      lane = { pending: null, draining: null };
      this.lanes.set(downloaderId, lane);
    }
    return lane;
  }

  private async drain(downloaderId: string, lane: Lane): Promise<void> {
    // Yield first so `lane.draining` is assigned before the loop can finish
    await Promise.resolve();
    try {
      while (lane.pending) {
        const run = lane.pending;
        lane.pending = null;

        const downloader = this.downloaders.get(downloaderId);
        if (!downloader) {
          run.reject(new Error(`Unknown downloader: ${downloaderId}`));
          continue;
        }

        try {
          run.resolve(await this.orchestrator.runCycle(downloader, run.trigger));
        } catch (error) {
          run.reject(error);
        }
      }
    } finally {
      lane.draining = null;
    }
  }

  private stopInterval(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }
}
