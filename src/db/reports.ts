import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { SqliteDatabase } from './schema.js';
import type { CycleReport } from '../types/report.js';

interface ReportRow {
  id: number;
  report: string;
}

const itemRefSchema = z.object({
  hash: z.string(),
  name: z.string(),
  sizeRemaining: z.number(),
});

const directoryReportSchema = z.object({
  directory: z.string(),
  status: z.enum(['OK', 'LOW', 'CRITICAL']),
  freeBytes: z.number(),
  lowWatermark: z.number(),
  paused: z.array(itemRefSchema),
  resumed: z.array(itemRefSchema),
  deadlockInterventions: z.array(itemRefSchema),
  deferred: z.array(itemRefSchema.extend({ reason: z.enum(['headroom', 'active-limit', 'active-bytes-limit']) })),
  rejected: z.array(itemRefSchema.extend({ command: z.enum(['pause', 'resume']), message: z.string() })),
});

const cycleReportSchema: z.ZodType<CycleReport> = z.object({
  downloaderId: z.string(),
  trigger: z.enum(['tick', 'item-added', 'manual', 'startup']),
  addedHashes: z.array(z.string()),
  startedAt: z.number(),
  finishedAt: z.number(),
  outcome: z.enum(['completed', 'skipped']),
  error: z.string().nullable(),
  purged: z.array(z.object({
    hash: z.string(),
    name: z.string(),
    directory: z.string(),
    reason: z.enum(['missing', 'not-paused', 'unmonitored']),
  })),
  skippedDirectories: z.array(z.object({ directory: z.string(), reason: z.string() })),
  directories: z.array(directoryReportSchema),
});

const MAX_REPORTS_PER_DOWNLOADER = 500;

export class ReportRepository {
  constructor(private readonly db: SqliteDatabase) {}

  save(report: CycleReport): void {
    this.db.prepare(`
      INSERT INTO cycle_reports (downloader_id, trigger_kind, outcome, started_at, finished_at, report)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      report.downloaderId,
      report.trigger,
      report.outcome,
      report.startedAt,
      report.finishedAt,
      JSON.stringify(report)
    );

    // Keep the history bounded
    this.db.prepare(`
      DELETE FROM cycle_reports
      WHERE downloader_id = ? AND id NOT IN (
        SELECT id FROM cycle_reports WHERE downloader_id = ? ORDER BY id DESC LIMIT ?
      )
    `).run(report.downloaderId, report.downloaderId, MAX_REPORTS_PER_DOWNLOADER);
  }

  latest(downloaderId: string): CycleReport | null {
    const row = this.db.prepare<[string], ReportRow>(`
      SELECT id, report FROM cycle_reports
      WHERE downloader_id = ?
      ORDER BY id DESC
      LIMIT 1
    `).get(downloaderId);

    return row ? parseReport(row) : null;
  }

  recent(limit: number, downloaderId?: string): CycleReport[] {
    if (downloaderId === undefined) {
      return this.db.prepare<[number], ReportRow>(`
        SELECT id, report FROM cycle_reports ORDER BY id DESC LIMIT ?
      `).all(limit).flatMap(parseStoredReport);
    }

    return this.db.prepare<[string, number], ReportRow>(`
      SELECT id, report FROM cycle_reports
      WHERE downloader_id = ?
      ORDER BY id DESC
      LIMIT ?
    `).all(downloaderId, limit).flatMap(parseStoredReport);
  }
}

/**
 * Stored reports are checked on the way out; a row that does not hold a
 * valid report is logged and left out.
 */
function parseReport(row: ReportRow): CycleReport | null {
  let value: unknown;
  try {
    value = JSON.parse(row.report);
  } catch (error) {
    console.warn(`[DB] Skipping unreadable cycle report ${row.id}:`, errorMessage(error));
    return null;
  }

  const result = cycleReportSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || '(root)';
    console.warn(`[DB] Skipping invalid cycle report ${row.id}: ${field}: ${issue?.message ?? 'invalid'}`);
    return null;
  }
  return result.data;
}

function parseStoredReport(row: ReportRow): CycleReport[] {
  const report = parseReport(row);
  return report ? [report] : [];
}
