/**
 * Single-writer channel for note mutations.
 *
 * Background work never touches the note store directly. It submits a
 * mutation closure here; queued closures are applied together, in
 * submission order, on a later turn of the event loop, and the store is
 * saved once per batch. Batches never overlap: the next batch starts only
 * after the previous save settled.
 *
 * A failed save is reported through {@link SyncStatus}. It is not retried and
 * the in-memory mutations that preceded it stay applied.
 *
 * @module store/MutationChannel
 */

import type { NoteMutation, NoteStore } from './noteStore';
import { errorMessage } from '../errors';
import { log, logError } from '../logger';

export type SyncStatus =
  | { state: 'idle' }
  | { state: 'syncing' }
  | { state: 'success' }
  | { state: 'error'; message: string };

/** Runs a callback on a later turn of the writer context. */
export type WriterScheduler = (callback: () => void) => void;

export interface MutationChannelOptions {
  schedule?: WriterScheduler;
  onStatusChange?: (status: SyncStatus) => void;
}

interface PendingMutation {
  noteId: string;
  mutation: NoteMutation;
}

const nextTurn: WriterScheduler = callback => {
  setImmediate(callback);
};

export class MutationChannel {
  private pending: PendingMutation[] = [];
  private flushScheduled = false;
  private tail: Promise<void> = Promise.resolve();
  private currentStatus: SyncStatus = { state: 'idle' };
  private readonly schedule: WriterScheduler;
  private readonly onStatusChange: ((status: SyncStatus) => void) | undefined;

  constructor(private readonly store: NoteStore, options: MutationChannelOptions = {}) {
    this.schedule = options.schedule ?? nextTurn;
    this.onStatusChange = options.onStatusChange;
  }

  get status(): SyncStatus {
    return this.currentStatus;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Queue a mutation for `noteId`. Never applies it synchronously. */
  submit(noteId: string, mutation: NoteMutation): void {
    this.pending.push({ noteId, mutation });
    if (this.flushScheduled) return;

    this.flushScheduled = true;
    this.schedule(() => {
      this.flushScheduled = false;
      this.flush().catch(err => logError('MutationChannel: flush failed', err));
    });
  }

  /** Applies everything queued so far; resolves after the batch is saved. */
  flush(): Promise<void> {
    const batch = this.tail.then(() => this.applyPending());
    // The next batch chains on a settled tail even if this one failed
    this.tail = batch.catch(err => logError('MutationChannel: batch failed', err));
    return batch;
  }

  /** Resolves once nothing is queued and the last batch has settled. */
  async drained(): Promise<void> {
    await this.tail;
    while (this.pending.length > 0) {
      await this.flush();
    }
  }

  private async applyPending(): Promise<void> {
    if (this.pending.length === 0) return;

    const batch = this.pending;
    this.pending = [];

    let applied = 0;
    for (const { noteId, mutation } of batch) {
      try {
        if (this.store.applyMutation(noteId, mutation)) {
          applied++;
        } else {
          log(`MutationChannel: note ${noteId} no longer exists, mutation dropped`);
        }
      } catch (err) {
        logError(`MutationChannel: mutation for note ${noteId} threw`, err);
      }
    }
    if (applied === 0) return;

    this.setStatus({ state: 'syncing' });
    try {
      await this.store.save();
      this.setStatus({ state: 'success' });
    } catch (err) {
      logError('MutationChannel: save failed', err);
      this.setStatus({ state: 'error', message: errorMessage(err) });
    }
  }

  private setStatus(status: SyncStatus): void {
    this.currentStatus = status;
    try {
      this.onStatusChange?.(status);
    } catch (err) {
      logError(`MutationChannel: status listener threw on ${status.state}`, err);
    }
  }
}
