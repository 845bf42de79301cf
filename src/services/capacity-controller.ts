import { formatBytes } from '../utils/format.js';
import type { CycleContext, DirectoryCycle } from './cycle.js';
import type { QueueItem } from '../types/queue.js';

interface CapacityCandidate {
  cycle: DirectoryCycle;
  item: QueueItem;
}

function newestActive(cycles: DirectoryCycle[]): CapacityCandidate | null {
  let newest: CapacityCandidate | null = null;
  for (const cycle of cycles) {
    for (const item of cycle.active.values()) {
      if (item.sizeRemaining === 0) continue;
      if (!newest || item.addedOn > newest.item.addedOn) {
        newest = { cycle, item };
      }
    }
  }
  return newest;
}

/**
 * Pause the newest active items, across all directories of the downloader,
 * until the active bytes fit `maxActiveBytes` again. The last active item
 * keeps running even when it alone exceeds the cap. Returns the number of
 * items paused.
 */
export async function runCapacity(context: CycleContext, cycles: DirectoryCycle[]): Promise<number> {
  const { budget } = context;
  let paused = 0;

  while (budget.overBytes() && budget.items > 1) {
    const candidate = newestActive(cycles);
    if (!candidate) break;

    // A rejected pause drops the item from the cycle, so the loop moves on
    if (await context.commands.pause(candidate.cycle, candidate.item)) {
      paused++;
    }
  }

  if (paused > 0) {
    console.log(
      `[Capacity] ${context.downloaderId}: paused ${paused} item(s), ` +
      `active ${formatBytes(budget.bytes)} of ${formatBytes(budget.maxBytes ?? 0)}`
    );
  }
  if (budget.overBytes()) {
    console.warn(
      `[Capacity] ${context.downloaderId}: active ${formatBytes(budget.bytes)} still above ` +
      `${formatBytes(budget.maxBytes ?? 0)}, leaving the rest running`
    );
  }

  return paused;
}
