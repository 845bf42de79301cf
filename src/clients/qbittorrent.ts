import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { DownloaderClient } from './base.js';
import { CommandRejectedError, TransientIOError, errorMessage } from '../errors.js';
import type { DownloaderConfig } from '../config.js';
import type { ActivityState, QueueItem } from '../types/queue.js';
import type { QBTorrentInfo } from '../types/qbittorrent.js';

const ACTIVE_STATES: ReadonlySet<string> = new Set([
  'downloading',
  'stalledDL',
  'metaDL',
  'forcedMetaDL',
  'checkingDL',
  'forcedDL',
  'allocating',
]);

const QUEUED_STATES: ReadonlySet<string> = new Set([
  'pausedDL',
  'stoppedDL',
  'queuedDL',
]);

export function toActivityState(state: string): ActivityState {
  if (ACTIVE_STATES.has(state)) return 'active';
  if (QUEUED_STATES.has(state)) return 'queued';
  return 'ignored';
}

export function toQueueItem(torrent: QBTorrentInfo): QueueItem {
  return {
    hash: torrent.hash,
    name: torrent.name,
    savePath: torrent.save_path,
    sizeTotal: torrent.size ?? torrent.total_size ?? 0,
    sizeRemaining: Math.max(0, torrent.amount_left ?? 0),
    addedOn: torrent.added_on ?? 0,
    state: toActivityState(torrent.state),
    rawState: torrent.state,
  };
}

/**
 * qBittorrent >= 5.0 (WebAPI 2.11) renamed pause/resume to stop/start.
 */
export function usesStopStart(webapiVersion: string): boolean {
  const [major = 0, minor = 0] = webapiVersion.trim().split('.').map((part) => parseInt(part, 10) || 0);
  return major > 2 || (major === 2 && minor >= 11);
}

export type ClientSettings = Pick<DownloaderConfig, 'id' | 'url' | 'username' | 'password' | 'tag'> & {
  /** Per-request timeout, the configured command timeout */
  timeoutMs: number;
};

/**
 * qBittorrent WebUI API client
 * Documentation: https://github.com/qbittorrent/qBittorrent/wiki/WebUI-API-(qBittorrent-5.0)
 */
export class QBittorrentClient implements DownloaderClient {
  name = 'qBittorrent';
  readonly id: string;
  private sid: string | null = null;
  private stopStart: boolean | null = null;
  private readonly http: AxiosInstance;

  constructor(
    private readonly settings: ClientSettings,
    http?: AxiosInstance,
  ) {
    this.id = settings.id;
    this.http = http ?? axios.create();
  }

  private url(endpoint: string): string {
    return `${this.settings.url.replace(/\/+$/, '')}/api/v2/${endpoint}`;
  }

  private async login(): Promise<void> {
    const form = new URLSearchParams();
    form.append('username', this.settings.username);
    form.append('password', this.settings.password);

    let response: AxiosResponse<string>;
    try {
      response = await this.http.post<string>(this.url('auth/login'), form, {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Referer: this.settings.url,
        },
        responseType: 'text',
        timeout: this.settings.timeoutMs,
      });
    } catch (error) {
      throw new TransientIOError(`[${this.id}] Login request failed: ${errorMessage(error)}`, { cause: error });
    }

    const cookies = response.headers['set-cookie'] ?? [];
    const sid = cookies
      .map((cookie) => cookie.match(/SID=([^;]+)/)?.[1])
      .find((value) => value !== undefined);

    if (!sid || String(response.data).trim() === 'Fails.') {
      throw new TransientIOError(`[${this.id}] Login rejected, check username/password`);
    }

    this.sid = sid;
    console.log(`[qBittorrent] ${this.id}: login successful`);

    let version: string;
    try {
      version = await this.request<string>('get', 'app/webapiVersion', { responseType: 'text' }, true);
    } catch (error) {
      this.sid = null;
      throw new TransientIOError(`[${this.id}] Cannot read WebAPI version: ${errorMessage(error)}`, { cause: error });
    }
    this.stopStart = usesStopStart(String(version));
    console.log(`[qBittorrent] ${this.id}: WebAPI ${version} (${this.stopStart ? 'stop/start' : 'pause/resume'})`);
  }

  private async ensureLoggedIn(): Promise<void> {
    if (this.sid) {
      return;
    }
    await this.login();
  }

  private async request<T>(
    method: 'get' | 'post',
    endpoint: string,
    options: { params?: Record<string, string>; form?: URLSearchParams; responseType?: 'json' | 'text' } = {},
    reauthenticated = false,
  ): Promise<T> {
    try {
      const response = await this.http.request<T>({
        method,
        url: this.url(endpoint),
        params: options.params,
        data: options.form,
        responseType: options.responseType ?? 'json',
        timeout: this.settings.timeoutMs,
        headers: {
          Cookie: `SID=${this.sid ?? ''}`,
          ...(options.form ? { 'Content-Type': 'application/x-www-form-urlencoded' } : {}),
        },
      });
      return response.data;
    } catch (error) {
      // Session expired: log in again once
      if (axios.isAxiosError(error) && error.response?.status === 403 && !reauthenticated) {
        this.sid = null;
        await this.login();
        return this.request<T>(method, endpoint, options, true);
      }
      throw error;
    }
  }

  async testConnection(): Promise<boolean> {
    try {
      this.sid = null;
      await this.login();
      return true;
    } catch (error) {
      console.error(`[qBittorrent] ${this.id}: connection test failed:`, errorMessage(error));
      return false;
    }
  }

  async listItems(): Promise<QueueItem[]> {
    await this.ensureLoggedIn();

    let torrents: unknown;
    try {
      torrents = await this.request<unknown>('get', 'torrents/info', {
        params: this.settings.tag ? { tag: this.settings.tag } : undefined,
      });
    } catch (error) {
      throw new TransientIOError(`[${this.id}] Failed to list torrents: ${errorMessage(error)}`, { cause: error });
    }

    if (!Array.isArray(torrents)) {
      throw new TransientIOError(`[${this.id}] Unexpected torrents/info response`);
    }
    return torrents.filter(isTorrentInfo).map(toQueueItem);
  }

  async pause(hash: string): Promise<void> {
    await this.ensureLoggedIn();
    await this.command(this.stopStart ? 'stop' : 'pause', hash);
  }

  async resume(hash: string): Promise<void> {
    await this.ensureLoggedIn();
    await this.command(this.stopStart ? 'start' : 'resume', hash);
  }

  private async command(action: 'stop' | 'start' | 'pause' | 'resume', hash: string): Promise<void> {
    const form = new URLSearchParams();
    form.append('hashes', hash);

    try {
      await this.request<string>('post', `torrents/${action}`, { form, responseType: 'text' });
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      if (status !== undefined && status >= 400 && status < 500) {
        throw new CommandRejectedError(`[${this.id}] ${action} rejected for ${hash} (HTTP ${status})`, hash);
      }
      throw new TransientIOError(`[${this.id}] ${action} failed for ${hash}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

function isTorrentInfo(value: unknown): value is QBTorrentInfo {
  if (typeof value !== 'object' || value === null) return false;
  return 'hash' in value && typeof value.hash === 'string'
    && 'save_path' in value && typeof value.save_path === 'string'
    && 'state' in value && typeof value.state === 'string';
}
