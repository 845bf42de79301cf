import type { DirectorySets, MonitoredDirectory, QueueItem } from '../types/queue.js';

export interface PathMatchOptions {
  ignoreCase: boolean;
}

/**
 * Canonical form used on both sides of a path comparison: forward slashes,
 * no repeated or trailing separators, optionally lowercased.
 */
export function normalizePath(value: string, options: PathMatchOptions): string {
  let normalized = value.trim().replace(/\\/g, '/').replace(/\/{2,}/g, '/');
  if (normalized.length > 1) {
    normalized = normalized.replace(/\/+$/, '');
  }
  return options.ignoreCase ? normalized.toLowerCase() : normalized;
}

function isWithin(path: string, directory: string): boolean {
  if (path === directory) return true;
  const prefix = directory.endsWith('/') ? directory : `${directory}/`;
  return path.startsWith(prefix);
}

/**
 * The monitored directory owning `savePath`: longest match on a path-segment
 * boundary, so /data/tv never claims /data/tv2.
 */
export function matchDirectory(
  savePath: string,
  directories: MonitoredDirectory[],
  options: PathMatchOptions,
): MonitoredDirectory | null {
  if (!savePath.trim()) return null;

  const target = normalizePath(savePath, options);
  let best: MonitoredDirectory | null = null;
  let bestLength = -1;

  for (const directory of directories) {
    const candidate = normalizePath(directory.path, options);
    if (isWithin(target, candidate) && candidate.length > bestLength) {
      best = directory;
      bestLength = candidate.length;
    }
  }
  return best;
}

/**
 * Partition a downloader snapshot into per-directory active/queued sets.
 * Items outside every monitored directory and items in an ignored state are
 * dropped. Every directory gets an entry, even when empty.
 */
export function classify(
  items: QueueItem[],
  directories: MonitoredDirectory[],
  options: PathMatchOptions,
): Map<string, DirectorySets> {
  const sets = new Map<string, DirectorySets>();
  for (const directory of directories) {
    sets.set(directory.path, { directory, active: [], queued: [] });
  }

  for (const item of items) {
    if (item.state === 'ignored') continue;

    const directory = matchDirectory(item.savePath, directories, options);
    if (!directory) continue;

    const entry = sets.get(directory.path);
    if (!entry) continue;

    if (item.state === 'active') {
      entry.active.push(item);
    } else {
      entry.queued.push(item);
    }
  }

  return sets;
}
