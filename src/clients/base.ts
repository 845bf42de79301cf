import type { QueueItem } from '../types/queue.js';

/**
 * Connection to one downloader instance.
 *
 * `pause` and `resume` throw CommandRejectedError when the downloader refuses
 * the command and TransientIOError when it cannot be reached.
 */
export interface DownloaderClient {
  readonly id: string;
  name: string;
  testConnection(): Promise<boolean>;
  listItems(): Promise<QueueItem[]>;
  pause(hash: string): Promise<void>;
  resume(hash: string): Promise<void>;
}
