import { CommandRejectedError, TransientIOError, errorMessage, withTimeout } from '../errors.js';
import { formatBytes } from '../utils/format.js';
import { toItemRef, type ActiveBudget, type DirectoryCycle, type QueueCommands, type ResumeKind } from './cycle.js';
import type { DownloaderClient } from '../clients/base.js';
import type { ManagedPauseLedger } from '../db/ledger.js';
import type { QueueItem } from '../types/queue.js';

/**
 * Fire-and-confirm command issuance for one downloader cycle. A pause is
 * ledgered before it is sent and dropped again only on an explicit
 * rejection; a resume leaves the ledger once the downloader accepted it.
 * An aborted cycle therefore never leaves a scheduler pause unrecorded.
 */
export class CycleCommands implements QueueCommands {
  constructor(
    private readonly client: DownloaderClient,
    private readonly ledger: ManagedPauseLedger,
    private readonly budget: ActiveBudget,
    private readonly timeoutMs: number,
    private readonly now: () => number,
  ) {}

  async pause(cycle: DirectoryCycle, item: QueueItem): Promise<boolean> {
    // Ledgered first; only a rejection takes the entry back
    this.ledger.record({
      downloaderId: this.client.id,
      hash: item.hash,
      name: item.name,
      directory: cycle.directory.path,
      pausedAt: this.now(),
      sizeRemaining: item.sizeRemaining,
      freeAtPause: cycle.freeBytes,
    });

    if (!(await this.send('pause', cycle, item))) {
      this.ledger.remove(this.client.id, item.hash);
      return false;
    }

    cycle.active.delete(item.hash);
    cycle.queued.set(item.hash, item);
    cycle.paused.push(item);
    this.budget.release(item);

    console.log(`[Commands] ${this.client.id}: paused ${item.name} (remaining ${formatBytes(item.sizeRemaining)}) in ${cycle.directory.path}`);
    return true;
  }

  async resume(cycle: DirectoryCycle, item: QueueItem, kind: ResumeKind): Promise<boolean> {
    if (!(await this.send('resume', cycle, item))) {
      return false;
    }

    this.ledger.remove(this.client.id, item.hash);
    cycle.queued.delete(item.hash);
    cycle.active.set(item.hash, item);
    if (kind === 'deadlock') {
      cycle.interventions.push(item);
    } else {
      cycle.resumed.push(item);
    }
    this.budget.admit(item);

    console.log(`[Commands] ${this.client.id}: resumed ${item.name} (remaining ${formatBytes(item.sizeRemaining)}) in ${cycle.directory.path}`);
    return true;
  }

  private async send(command: 'pause' | 'resume', cycle: DirectoryCycle, item: QueueItem): Promise<boolean> {
    const call = command === 'pause' ? this.client.pause(item.hash) : this.client.resume(item.hash);

    try {
      await withTimeout(call, this.timeoutMs, `${command} ${item.hash}`);
      return true;
    } catch (error) {
      if (error instanceof CommandRejectedError) {
        console.warn(`[Commands] ${this.client.id}: ${command} of ${item.name} rejected: ${error.message}`);
        cycle.rejected.push({ ...toItemRef(item), command, message: error.message });
        // Out of consideration for the rest of this cycle
        cycle.active.delete(item.hash);
        cycle.queued.delete(item.hash);
        return false;
      }
      if (error instanceof TransientIOError) {
        throw error;
      }
      throw new TransientIOError(`${command} ${item.hash} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
