import axios, { type AxiosInstance } from 'axios';
import { errorMessage } from '../errors.js';
import { formatBytes } from '../utils/format.js';
import type { CycleReport } from '../types/report.js';

export interface Notifier {
  notify(report: CycleReport): Promise<void>;
}

export function hasActivity(report: CycleReport): boolean {
  return report.directories.some((dir) =>
    dir.paused.length > 0
    || dir.resumed.length > 0
    || dir.deadlockInterventions.length > 0
    || dir.status === 'CRITICAL'
  );
}

/**
 * One-line summary, e.g.
 * "qb1 [tick] completed: /data LOW 40.00 GB free, paused 1, resumed 0, forced 0"
 */
export function summarizeReport(report: CycleReport): string {
  const head = `${report.downloaderId} [${report.trigger}] ${report.outcome}`;
  if (report.outcome === 'skipped') {
    return `${head}: ${report.error ?? 'unknown error'}`;
  }

  const parts = report.directories.map((dir) =>
    `${dir.directory} ${dir.status} ${formatBytes(dir.freeBytes)} free, ` +
    `paused ${dir.paused.length}, resumed ${dir.resumed.length}, forced ${dir.deadlockInterventions.length}`
  );
  for (const skipped of report.skippedDirectories) {
    parts.push(`${skipped.directory} skipped`);
  }
  return parts.length > 0 ? `${head}: ${parts.join('; ')}` : head;
}

/**
 * POSTs reports that changed something (or flag a CRITICAL directory) to a
 * webhook. Delivery failures are logged and never reach the cycle.
 */
export class WebhookNotifier implements Notifier {
  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly http: AxiosInstance = axios.create(),
  ) {}

  async notify(report: CycleReport): Promise<void> {
    if (!hasActivity(report)) return;

    try {
      await this.http.post(this.url, {
        title: 'Space Guard',
        text: summarizeReport(report),
        report,
      }, {
        timeout: this.timeoutMs,
      });
    } catch (error) {
      console.error(`[Notifier] Failed to deliver report for ${report.downloaderId}:`, errorMessage(error));
    }
  }
}
