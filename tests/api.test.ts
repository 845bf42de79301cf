import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { parseLimit } from '../src/routes/api.js';
import { createServer } from '../src/server.js';
import { Orchestrator } from '../src/services/orchestrator.js';
import { QueueScheduler } from '../src/services/scheduler.js';
import { GB } from '../src/utils/format.js';
import { createStores, DEFAULT_POLICY, fakeDisk, FakeClient } from './helpers.js';
import type { ManagedPauseLedger } from '../src/db/ledger.js';

describe('parseLimit', () => {
  it('defaults and clamps the report limit', () => {
    expect(parseLimit(undefined)).toBe(20);
    expect(parseLimit('abc')).toBe(20);
    expect(parseLimit('0')).toBe(20);
    expect(parseLimit('7')).toBe(7);
    expect(parseLimit('5000')).toBe(200);
  });
});

describe('API routes', () => {
  let app: FastifyInstance;
  let scheduler: QueueScheduler;
  let ledger: ManagedPauseLedger;

  beforeEach(async () => {
    const stores = createStores();
    ledger = stores.ledger;
    const orchestrator = new Orchestrator(
      { commandTimeoutMs: 1000, maxActiveBytes: null, ignoreCase: true, policy: DEFAULT_POLICY },
      { ledger, reports: stores.reports, freeSpace: fakeDisk({ '/data': 900 }) },
    );
    scheduler = new QueueScheduler(orchestrator, [
      { client: new FakeClient('qb1'), directories: [{ path: '/data', lowWatermark: 50 * GB }], maxActive: 5 },
    ]);
    app = await createServer({ scheduler, ledger, reports: stores.reports });
  });

  afterEach(async () => {
    await app.close();
    vi.restoreAllMocks();
  });

  it('answers the health check', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('reports status per downloader', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/status' });
    expect(response.json()).toEqual({ downloaders: [{ id: 'qb1', managedPauses: 0, lastReport: null }] });
  });

  it('runs a cycle on demand and keeps its report', async () => {
    const run = await app.inject({ method: 'POST', url: '/api/run', payload: { downloader: 'qb1' } });

    expect(run.statusCode).toBe(200);
    const body = run.json();
    expect(body.success).toBe(true);
    expect(body.reports).toHaveLength(1);
    expect(body.reports[0]).toMatchObject({ downloaderId: 'qb1', trigger: 'manual', outcome: 'completed' });

    const history = await app.inject({ method: 'GET', url: '/api/reports?downloader=qb1&limit=5' });
    expect(history.json().reports).toEqual(body.reports);
  });

  it('rejects a run for an unknown downloader', async () => {
    const response = await app.inject({ method: 'POST', url: '/api/run', payload: { downloader: 'nope' } });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ success: false, error: 'Unknown downloader: nope' });
  });

  it('lists the ledger', async () => {
    ledger.record({ downloaderId: 'qb1', hash: 'abc', name: 'ABC', directory: '/data', pausedAt: 1, sizeRemaining: 2, freeAtPause: 3 });

    const response = await app.inject({ method: 'GET', url: '/api/ledger?downloader=qb1' });
    expect(response.json()).toEqual({
      pauses: [
        { downloaderId: 'qb1', hash: 'abc', name: 'ABC', directory: '/data', pausedAt: 1, sizeRemaining: 2, freeAtPause: 3 },
      ],
    });
  });

  describe('item-added events', () => {
    it('requires a hash', async () => {
      const response = await app.inject({ method: 'POST', url: '/api/events/item-added', payload: {} });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ success: false, error: 'hash is required' });
    });

    it('accepts the hash as a query parameter', async () => {
      const notify = vi.spyOn(scheduler, 'notifyItemAdded').mockImplementation(() => {});

      const response = await app.inject({ method: 'POST', url: '/api/events/item-added?hash=ABCDEF' });

      expect(response.statusCode).toBe(202);
      expect(response.json()).toEqual({ success: true });
      expect(notify).toHaveBeenCalledWith('abcdef', undefined);
    });

    it('accepts a form body', async () => {
      const notify = vi.spyOn(scheduler, 'notifyItemAdded').mockImplementation(() => {});

      const response = await app.inject({
        method: 'POST',
        url: '/api/events/item-added',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        payload: 'hash=abc123&downloader=qb1',
      });

      expect(response.statusCode).toBe(202);
      expect(notify).toHaveBeenCalledWith('abc123', 'qb1');
    });

    it('rejects an unknown downloader', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/api/events/item-added',
        payload: { hash: 'abc', downloader: 'nope' },
      });
      expect(response.statusCode).toBe(404);
    });
  });
});
