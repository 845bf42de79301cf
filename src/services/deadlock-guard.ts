import { resumableItems, type CycleContext, type DirectoryCycle, type LedgeredItem } from './cycle.js';
import type { QueueItem } from '../types/queue.js';

/**
 * Consecutive stalled cycles per (downloader, directory).
 */
export class StallTracker {
  private readonly streaks = new Map<string, number>();

  private key(downloaderId: string, directory: string): string {
    return `${downloaderId}\u0000${directory}`;
  }

  observe(downloaderId: string, directory: string, stalled: boolean): number {
    const key = this.key(downloaderId, directory);
    if (!stalled) {
      this.streaks.delete(key);
      return 0;
    }
    const streak = (this.streaks.get(key) ?? 0) + 1;
    this.streaks.set(key, streak);
    return streak;
  }

  reset(downloaderId: string, directory: string): void {
    this.streaks.delete(this.key(downloaderId, directory));
  }
}

function smallestFirst(candidates: LedgeredItem[]): LedgeredItem[] {
  return [...candidates].sort((a, b) => a.item.sizeRemaining - b.item.sizeRemaining || a.pause.pausedAt - b.pause.pausedAt);
}

/**
 * Force one ledgered item back to work when a directory has had no active
 * item, but ledgered queued items, for more cycles than allowed. LOW
 * directories wait `deadlockCycles`; OK directories only one cycle.
 *
 * Ignores headroom but not the active item limit: when that is saturated
 * other directories are making progress. The byte budget is ignored only
 * while nothing at all is active on the downloader.
 */
export async function runDeadlockGuard(
  context: CycleContext,
  cycle: DirectoryCycle,
  tracker: StallTracker,
): Promise<QueueItem | null> {
  const candidates = resumableItems(context, cycle);
  const stalled = cycle.active.size === 0 && candidates.length > 0;
  const streak = tracker.observe(context.downloaderId, cycle.directory.path, stalled);
  const threshold = cycle.status === 'OK' ? 1 : context.policy.deadlockCycles;

  if (!stalled || streak <= threshold) {
    return null;
  }

  if (!context.budget.hasSlot()) {
    console.log(
      `[DeadlockGuard] ${context.downloaderId}: ${cycle.directory.path} stalled for ${streak} cycles, ` +
      `active limit reached (${context.budget.items}/${context.budget.maxItems}), waiting`
    );
    return null;
  }

  const idle = context.budget.items === 0;
  const admissible = smallestFirst(candidates).filter(({ item }) => idle || context.budget.check(item) === null);
  if (admissible.length === 0) {
    console.log(
      `[DeadlockGuard] ${context.downloaderId}: ${cycle.directory.path} stalled for ${streak} cycles, ` +
      `held items exceed the active byte limit, waiting`
    );
    return null;
  }

  for (const { item } of admissible) {
    if (await context.commands.resume(cycle, item, 'deadlock')) {
      tracker.reset(context.downloaderId, cycle.directory.path);
      console.warn(
        `[DeadlockGuard] ${context.downloaderId}: ${cycle.directory.path} stalled for ${streak} cycles ` +
        `(status ${cycle.status}), force-resumed ${item.name}`
      );
      return item;
    }
  }

  return null;
}
