import type { FastifyPluginAsync } from 'fastify';
import type { ManagedPauseLedger } from '../db/ledger.js';
import type { ReportRepository } from '../db/reports.js';
import type { QueueScheduler } from '../services/scheduler.js';

export interface ApiOptions {
  scheduler: QueueScheduler;
  ledger: ManagedPauseLedger;
  reports: ReportRepository;
}

interface DownloaderQuery {
  downloader?: string;
  limit?: string;
}

interface RunBody {
  downloader?: unknown;
}

interface ItemAddedBody {
  downloader?: unknown;
  hash?: unknown;
}

const DEFAULT_REPORT_LIMIT = 20;
const MAX_REPORT_LIMIT = 200;

function asString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

export function parseLimit(value: string | undefined): number {
  const limit = parseInt(value ?? '', 10);
  if (isNaN(limit) || limit < 1) return DEFAULT_REPORT_LIMIT;
  return Math.min(limit, MAX_REPORT_LIMIT);
}

export const apiRoutes: FastifyPluginAsync<ApiOptions> = async (app, { scheduler, ledger, reports }) => {
  // Latest cycle per downloader
  app.get('/api/status', async () => {
    return {
      downloaders: scheduler.downloaderIds().map((id) => ({
        id,
        managedPauses: ledger.list(id).length,
        lastReport: reports.latest(id),
      })),
    };
  });

  app.get<{ Querystring: DownloaderQuery }>('/api/reports', async (request) => {
    const downloader = asString(request.query.downloader);
    return { reports: reports.recent(parseLimit(request.query.limit), downloader) };
  });

  app.get<{ Querystring: DownloaderQuery }>('/api/ledger', async (request) => {
    return { pauses: ledger.list(asString(request.query.downloader)) };
  });

  // Run a cycle now and wait for the result
  app.post<{ Body: RunBody | undefined }>('/api/run', async (request, reply) => {
    const downloader = asString(request.body?.downloader);
    if (downloader && !scheduler.has(downloader)) {
      reply.status(404);
      return { success: false, error: `Unknown downloader: ${downloader}` };
    }

    const results = await scheduler.runNow(downloader);
    return { success: true, reports: results };
  });

  // Hook for qBittorrent's "Run external program on torrent added":
  //   curl -X POST "http://host:8090/api/events/item-added?hash=%I"
  app.post<{ Body: ItemAddedBody | undefined; Querystring: ItemAddedBody }>(
    '/api/events/item-added',
    async (request, reply) => {
      const hash = asString(request.body?.hash) ?? asString(request.query.hash);
      const downloader = asString(request.body?.downloader) ?? asString(request.query.downloader);

      if (!hash) {
        reply.status(400);
        return { success: false, error: 'hash is required' };
      }
      if (downloader && !scheduler.has(downloader)) {
        reply.status(404);
        return { success: false, error: `Unknown downloader: ${downloader}` };
      }

      scheduler.notifyItemAdded(hash.toLowerCase(), downloader);
      reply.status(202);
      return { success: true };
    },
  );
};
