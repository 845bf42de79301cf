import { formatBytes } from '../utils/format.js';
import type { CycleContext, DirectoryCycle } from './cycle.js';
import type { QueueItem, VictimOrder } from '../types/queue.js';

export interface OverflowResult {
  deficit: number;
  estimatedReclaim: number;
  critical: boolean;
}

/**
 * Pause order. `largest-remaining` pauses the item with the most bytes still
 * to write first; on a tie the newest item goes first so older downloads
 * keep running. `newest-first` orders by addition time alone.
 */
export function orderVictims(items: QueueItem[], order: VictimOrder): QueueItem[] {
  const sorted = [...items];
  if (order === 'newest-first') {
    return sorted.sort((a, b) => b.addedOn - a.addedOn);
  }
  return sorted.sort((a, b) => b.sizeRemaining - a.sizeRemaining || b.addedOn - a.addedOn);
}

/**
 * Pause active items of a LOW directory until the estimated avoided growth
 * covers the deficit.
 *
 * Items already held for the directory are credited with what they covered
 * when they were paused: their remaining bytes, capped at the deepest deficit
 * recorded on their pauses. An unchanged snapshot therefore pauses nothing
 * new, while any further drop in free space needs new victims.
 */
export async function runOverflow(context: CycleContext, cycle: DirectoryCycle): Promise<OverflowResult> {
  const { lowWatermark } = cycle.directory;
  const deficit = lowWatermark - cycle.freeBytes;
  const pauses = context.ledger.listForDirectory(context.downloaderId, cycle.directory.path);
  const ledgered = new Set(pauses.map((pause) => pause.hash));

  let banked = 0;
  let lowestFree = Infinity;
  for (const pause of pauses) {
    const item = cycle.queued.get(pause.hash);
    if (item) {
      banked += item.sizeRemaining;
      lowestFree = Math.min(lowestFree, pause.freeAtPause);
    }
  }
  let estimatedReclaim = banked > 0 ? Math.min(banked, Math.max(0, lowWatermark - lowestFree)) : 0;

  const victims = orderVictims(
    [...cycle.active.values()].filter((item) => !ledgered.has(item.hash)),
    context.policy.victimOrder,
  );

  for (const victim of victims) {
    if (estimatedReclaim >= deficit) break;
    if (await context.commands.pause(cycle, victim)) {
      estimatedReclaim += victim.sizeRemaining;
    }
  }

  const critical = estimatedReclaim < deficit;
  cycle.critical = critical;

  if (critical) {
    console.warn(
      `[Overflow] ${context.downloaderId}: ${cycle.directory.path} is CRITICAL, ` +
      `deficit ${formatBytes(deficit)} but only ${formatBytes(estimatedReclaim)} can be held back`
    );
  } else if (cycle.paused.length > 0) {
    console.log(
      `[Overflow] ${context.downloaderId}: ${cycle.directory.path} paused ${cycle.paused.length} item(s), ` +
      `estimate ${formatBytes(estimatedReclaim)} for deficit ${formatBytes(deficit)}`
    );
  }

  return { deficit, estimatedReclaim, critical };
}
