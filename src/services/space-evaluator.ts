import * as fs from 'fs';
import checkDiskSpace from 'check-disk-space';
import { ConfigurationError, TransientIOError, errorMessage, withTimeout } from '../errors.js';
import { formatBytes } from '../utils/format.js';
import type { MonitoredDirectory, SpaceEvaluation } from '../types/queue.js';

export interface DiskSpace {
  free: number;   // bytes available at the mount containing the path
  size: number;   // total bytes of that mount
}

export type FreeSpaceQuery = (path: string) => Promise<DiskSpace>;

function isMissingPathError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error)) return false;
  return error.code === 'ENOENT' || error.code === 'ENOTDIR';
}

/**
 * Free space at the filesystem containing `directory`. The directory itself
 * must exist; check-disk-space would otherwise answer for a parent.
 */
export const diskFreeSpace: FreeSpaceQuery = async (directory) => {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(directory);
  } catch (error) {
    if (isMissingPathError(error)) {
      throw new ConfigurationError(`Monitored directory does not exist: ${directory}`, 'directories');
    }
    throw new TransientIOError(`Cannot stat ${directory}: ${errorMessage(error)}`, { cause: error });
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Monitored path is not a directory: ${directory}`, 'directories');
  }

  const { free, size } = await checkDiskSpace(directory);
  return { free, size };
};

/**
 * Query free space for one directory and derive its status. Never cached:
 * free space moves outside the scheduler's control.
 */
export async function evaluateDirectory(
  directory: MonitoredDirectory,
  query: FreeSpaceQuery,
  timeoutMs: number,
): Promise<SpaceEvaluation> {
  let space: DiskSpace;
  try {
    space = await withTimeout(query(directory.path), timeoutMs, `Free-space query for ${directory.path}`);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof TransientIOError) {
      throw error;
    }
    throw new TransientIOError(`Free-space query failed for ${directory.path}: ${errorMessage(error)}`, { cause: error });
  }

  if (space.size > 0 && directory.lowWatermark >= space.size) {
    throw new ConfigurationError(
      `Watermark ${formatBytes(directory.lowWatermark)} for ${directory.path} is not below the volume capacity ${formatBytes(space.size)}`,
      'lowWatermarkGb',
    );
  }

  return {
    directory,
    freeBytes: space.free,
    totalBytes: space.size,
    status: space.free < directory.lowWatermark ? 'LOW' : 'OK',
  };
}
