import { formatBytes } from '../utils/format.js';
import { defer, resumableItems, type CycleContext, type DirectoryCycle, type LedgeredItem } from './cycle.js';
import type { ReleaseOrder } from '../types/queue.js';

export interface ReleaseResult {
  headroom: number;
  released: number;
}

export function orderCandidates(candidates: LedgeredItem[], order: ReleaseOrder): LedgeredItem[] {
  const sorted = [...candidates];
  if (order === 'smallest-first') {
    return sorted.sort((a, b) => a.item.sizeRemaining - b.item.sizeRemaining || a.pause.pausedAt - b.pause.pausedAt);
  }
  return sorted.sort((a, b) => a.pause.pausedAt - b.pause.pausedAt);
}

/**
 * Resume ledgered items of an OK directory while the headroom above the
 * watermark can absorb their remaining bytes and the downloader-wide active
 * budget has room.
 */
export async function runRelease(context: CycleContext, cycle: DirectoryCycle): Promise<ReleaseResult> {
  let headroom = cycle.freeBytes - cycle.directory.lowWatermark;
  const candidates = orderCandidates(resumableItems(context, cycle), context.policy.releaseOrder);
  let released = 0;

  for (const { item } of candidates) {
    if (item.sizeRemaining > headroom) {
      defer(cycle, item, 'headroom');
      if (context.policy.smartSkip) continue;
      break;
    }

    const blocked = context.budget.check(item);
    if (blocked) {
      defer(cycle, item, blocked);
      continue;
    }

    if (await context.commands.resume(cycle, item, 'release')) {
      headroom -= item.sizeRemaining;
      released++;
    }
  }

  if (released > 0 || cycle.deferred.length > 0) {
    console.log(
      `[Release] ${context.downloaderId}: ${cycle.directory.path} resumed ${released}, ` +
      `deferred ${cycle.deferred.length}, headroom left ${formatBytes(headroom)}`
    );
  }

  return { headroom, released };
}
