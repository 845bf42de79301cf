import type { DownloaderClient } from './base.js';
import { QBittorrentClient } from './qbittorrent.js';
import type { DownloaderConfig } from '../config.js';

export function createClient(downloader: DownloaderConfig, timeoutMs: number): DownloaderClient {
  return new QBittorrentClient({ ...downloader, timeoutMs });
}

export function createClients(downloaders: DownloaderConfig[], timeoutMs: number): DownloaderClient[] {
  return downloaders.map((downloader) => createClient(downloader, timeoutMs));
}

export async function testConnections(clients: DownloaderClient[]): Promise<void> {
  for (const client of clients) {
    const ok = await client.testConnection();
    if (ok) {
      console.log(`[Clients] ${client.id}: connected to ${client.name}`);
    } else {
      console.warn(`[Clients] ${client.id}: ${client.name} not reachable, cycles will be skipped until it is`);
    }
  }
}

export type { DownloaderClient } from './base.js';
