import {
  ConfigurationError,
  InvariantViolationError,
  TransientIOError,
  errorMessage,
  withTimeout,
} from '../errors.js';
import { formatBytes } from '../utils/format.js';
import { classify, matchDirectory } from './classifier.js';
import { runCapacity } from './capacity-controller.js';
import { CycleCommands } from './commands.js';
import { ActiveBudget, createDirectoryCycle, toItemRef, type CycleContext, type DirectoryCycle } from './cycle.js';
import { runDeadlockGuard, StallTracker } from './deadlock-guard.js';
import { runOverflow } from './overflow-controller.js';
import { runRelease } from './release-controller.js';
import { evaluateDirectory, type FreeSpaceQuery } from './space-evaluator.js';
import { summarizeReport, type Notifier } from './notifier.js';
import type { DownloaderClient } from '../clients/base.js';
import type { ManagedPauseLedger } from '../db/ledger.js';
import type { ReportRepository } from '../db/reports.js';
import type { MonitoredDirectory, QueueItem, SchedulingPolicy, Trigger } from '../types/queue.js';
import type { CycleReport, DirectoryReport, PurgedEntry } from '../types/report.js';

/**
 * A downloader under management: its connection, the directories it owns
 * and its active item limit.
 */
export interface ManagedDownloader {
  client: DownloaderClient;
  directories: MonitoredDirectory[];
  maxActive: number;
}

export interface OrchestratorSettings {
  commandTimeoutMs: number;
  maxActiveBytes: number | null;
  ignoreCase: boolean;
  policy: SchedulingPolicy;
}

export interface OrchestratorDeps {
  ledger: ManagedPauseLedger;
  freeSpace: FreeSpaceQuery;
  reports?: ReportRepository;
  notifier?: Notifier;
  stallTracker?: StallTracker;
  now?: () => number;
}

function toDirectoryReport(cycle: DirectoryCycle): DirectoryReport {
  return {
    directory: cycle.directory.path,
    status: cycle.critical ? 'CRITICAL' : cycle.status,
    freeBytes: cycle.freeBytes,
    lowWatermark: cycle.directory.lowWatermark,
    paused: cycle.paused.map(toItemRef),
    resumed: cycle.resumed.map(toItemRef),
    deadlockInterventions: cycle.interventions.map(toItemRef),
    deferred: cycle.deferred,
    rejected: cycle.rejected,
  };
}

/**
 * Runs the admission cycle for one downloader:
 * snapshot -> ledger reconciliation -> classification -> space evaluation
 * -> overflow (LOW) -> capacity -> release (OK) -> deadlock guard -> report.
 *
 * Callers must not run two cycles of the same downloader at once; the
 * QueueScheduler serializes them.
 */
export class Orchestrator {
  private readonly ledger: ManagedPauseLedger;
  private readonly freeSpace: FreeSpaceQuery;
  private readonly reports: ReportRepository | undefined;
  private readonly notifier: Notifier | undefined;
  private readonly stallTracker: StallTracker;
  private readonly now: () => number;

  constructor(
    private settings: OrchestratorSettings,
    deps: OrchestratorDeps,
  ) {
    this.ledger = deps.ledger;
    this.freeSpace = deps.freeSpace;
    this.reports = deps.reports;
    this.notifier = deps.notifier;
    this.stallTracker = deps.stallTracker ?? new StallTracker();
    this.now = deps.now ?? Date.now;
  }

  updateSettings(settings: OrchestratorSettings): void {
    this.settings = settings;
  }

  async runCycle(downloader: ManagedDownloader, trigger: Trigger): Promise<CycleReport> {
    const { client } = downloader;
    const report: CycleReport = {
      downloaderId: client.id,
      trigger: trigger.kind,
      addedHashes: trigger.addedHashes,
      startedAt: this.now(),
      finishedAt: 0,
      outcome: 'completed',
      error: null,
      purged: [],
      skippedDirectories: [],
      directories: [],
    };
    const cycles: DirectoryCycle[] = [];

    try {
      const items = await this.fetchSnapshot(client);
      report.purged = this.reconcileLedger(downloader, items);
      const ledgerBefore = new Set(this.ledger.list(client.id).map((pause) => pause.hash));

      const sets = classify(items, downloader.directories, { ignoreCase: this.settings.ignoreCase });
      for (const entry of sets.values()) {
        try {
          const evaluation = await evaluateDirectory(entry.directory, this.freeSpace, this.settings.commandTimeoutMs);
          cycles.push(createDirectoryCycle(entry, evaluation));
        } catch (error) {
          if (!(error instanceof ConfigurationError)) throw error;
          console.error(`[Orchestrator] ${client.id}: skipping ${entry.directory.path}: ${error.message}`);
          report.skippedDirectories.push({ directory: entry.directory.path, reason: error.message });
        }
      }

      const budget = new ActiveBudget(
        downloader.maxActive,
        this.settings.maxActiveBytes,
        [...sets.values()].flatMap((entry) => entry.active),
      );
      const context: CycleContext = {
        downloaderId: client.id,
        ledger: this.ledger,
        ledgerBefore,
        commands: new CycleCommands(client, this.ledger, budget, this.settings.commandTimeoutMs, this.now),
        budget,
        policy: this.settings.policy,
      };

      for (const cycle of cycles) {
        if (cycle.status === 'LOW') {
          console.warn(
            `[Orchestrator] ${client.id}: ${cycle.directory.path} low on space, ` +
            `${formatBytes(cycle.freeBytes)} free, watermark ${formatBytes(cycle.directory.lowWatermark)}`
          );
          await runOverflow(context, cycle);
        }
      }

      await runCapacity(context, cycles);

      for (const cycle of cycles) {
        if (cycle.status === 'OK' && this.ledger.listForDirectory(client.id, cycle.directory.path).length > 0) {
          await runRelease(context, cycle);
        }
      }

      for (const cycle of cycles) {
        await runDeadlockGuard(context, cycle, this.stallTracker);
      }
    } catch (error) {
      report.outcome = 'skipped';
      report.error = errorMessage(error);
      console.error(`[Orchestrator] ${client.id}: cycle skipped: ${report.error}`);
    }

    report.directories = cycles.map(toDirectoryReport);
    report.finishedAt = this.now();

    console.log(`[Orchestrator] ${summarizeReport(report)}`);
    this.persist(report);
    if (this.notifier) {
      await this.notifier.notify(report);
    }
    return report;
  }

  private async fetchSnapshot(client: DownloaderClient): Promise<QueueItem[]> {
    try {
      return await withTimeout(client.listItems(), this.settings.commandTimeoutMs, `${client.id} snapshot`);
    } catch (error) {
      if (error instanceof TransientIOError) throw error;
      throw new TransientIOError(`${client.id} snapshot failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Bring the ledger in line with the snapshot before any decision is made.
   */
  private reconcileLedger(downloader: ManagedDownloader, items: QueueItem[]): PurgedEntry[] {
    const { client } = downloader;
    const byHash = new Map(items.map((item) => [item.hash, item]));
    const purged: PurgedEntry[] = [];

    for (const pause of this.ledger.list(client.id)) {
      const item = byHash.get(pause.hash);
      const entry = { hash: pause.hash, name: pause.name, directory: pause.directory };

      if (!item) {
        const violation = new InvariantViolationError(
          `ledger references ${pause.name} (${pause.hash}) which no longer exists`,
          pause.hash,
        );
        console.warn(`[Orchestrator] ${client.id}: ${violation.message}, purging`);
        this.ledger.remove(client.id, pause.hash);
        purged.push({ ...entry, reason: 'missing' });
        continue;
      }

      if (item.state === 'active') {
        // Resumed by the user: no longer ours to manage
        console.log(`[Orchestrator] ${client.id}: ${item.name} was resumed outside the scheduler, forgetting it`);
        this.ledger.remove(client.id, pause.hash);
        continue;
      }

      if (item.state === 'ignored') {
        console.log(`[Orchestrator] ${client.id}: ${item.name} is no longer paused (${item.rawState}), purging`);
        this.ledger.remove(client.id, pause.hash);
        purged.push({ ...entry, reason: 'not-paused' });
        continue;
      }

      const directory = matchDirectory(item.savePath, downloader.directories, { ignoreCase: this.settings.ignoreCase });
      if (!directory) {
        console.log(`[Orchestrator] ${client.id}: ${item.name} moved out of the monitored directories, purging`);
        this.ledger.remove(client.id, pause.hash);
        purged.push({ ...entry, reason: 'unmonitored' });
      } else if (directory.path !== pause.directory) {
        this.ledger.moveToDirectory(client.id, pause.hash, directory.path);
      }
    }

    return purged;
  }

  private persist(report: CycleReport): void {
    if (!this.reports) return;
    try {
      this.reports.save(report);
    } catch (error) {
      console.error(`[Orchestrator] ${report.downloaderId}: failed to store report:`, errorMessage(error));
    }
  }
}
