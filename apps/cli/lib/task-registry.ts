/**
 * Background task registry: discovery and scoring runs as observable,
 * cancellable tasks. Runners report progress at checkpoints; readers get
 * immutable snapshots. Updates after a task has finished are ignored.
 */

import { randomUUID } from 'node:crypto';
import { errorMessage, isAbortError } from '@jobscout/core';
import type { TaskKind, TaskSnapshot, TaskStatus } from '@jobscout/schemas';

export interface TaskContext {
  id: string;
  signal: AbortSignal;
  reportProgress(current: number, total: number, currentItem?: string | null): void;
}

export type TaskRunner<R> = (ctx: TaskContext) => Promise<R>;

export type TaskOutcome = { message: string } | { error: unknown };

export interface TaskRegistryOptions {
  now?: () => Date;
  createId?: () => string;
  /** Called with a fresh snapshot after every state change. */
  onChange?: (snapshot: TaskSnapshot) => void;
}

interface TaskRecord {
  snapshot: TaskSnapshot;
  controller: AbortController;
}

const TERMINAL: ReadonlySet<TaskStatus> = new Set(['completed', 'failed', 'cancelled']);

export class TaskRegistry {
  private readonly tasks = new Map<string, TaskRecord>();
  private readonly now: () => Date;
  private readonly createId: () => string;
  private readonly onChange?: (snapshot: TaskSnapshot) => void;

  constructor(options: TaskRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? randomUUID;
    this.onChange = options.onChange;
  }

  create(kind: TaskKind): TaskSnapshot {
    const id = this.createId();
    const snapshot: TaskSnapshot = {
      id,
      kind,
      status: 'not-started',
      progress: 0,
      total: 0,
      currentItem: null,
      message: null,
      error: null,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
    };
    this.tasks.set(id, { snapshot, controller: new AbortController() });
    this.emit(snapshot);
    return { ...snapshot };
  }

  /**
   * Run a created task. Resolves with the runner's result; rejects with the
   * runner's error after recording it as `failed` (or `cancelled` for aborts).
   */
  async start<R>(
    id: string,
    runner: TaskRunner<R>,
    options: { summarize?: (result: R) => string } = {},
  ): Promise<R> {
    const record = this.require(id);
    if (record.snapshot.status !== 'not-started') {
      throw new Error(`Task ${id} is already ${record.snapshot.status}`);
    }
    this.update(id, { status: 'running', startedAt: this.now() });

    const ctx: TaskContext = {
      id,
      signal: record.controller.signal,
      reportProgress: (current, total, currentItem) =>
        this.reportProgress(id, current, total, currentItem),
    };

    try {
      const result = await runner(ctx);
      this.reportDone(id, { message: options.summarize?.(result) ?? 'Completed' });
      return result;
    } catch (err) {
      this.reportDone(id, { error: err });
      throw err;
    }
  }

  reportProgress(id: string, current: number, total: number, currentItem?: string | null): void {
    const record = this.tasks.get(id);
    if (!record || TERMINAL.has(record.snapshot.status)) return;
    this.update(id, { progress: current, total, currentItem: currentItem ?? null });
  }

  reportDone(id: string, outcome: TaskOutcome): void {
    const record = this.tasks.get(id);
    if (!record || TERMINAL.has(record.snapshot.status)) return;
    const completedAt = this.now();

    if ('message' in outcome) {
      this.update(id, { status: 'completed', message: outcome.message, currentItem: null, completedAt });
      return;
    }
    const cancelled = isAbortError(outcome.error) || record.controller.signal.aborted;
    this.update(id, {
      status: cancelled ? 'cancelled' : 'failed',
      error: cancelled ? null : errorMessage(outcome.error),
      message: cancelled ? 'Cancelled' : null,
      currentItem: null,
      completedAt,
    });
  }

  /** Request cancellation; the runner stops at its next checkpoint. */
  cancel(id: string): boolean {
    const record = this.tasks.get(id);
    if (!record || TERMINAL.has(record.snapshot.status)) return false;
    if (record.snapshot.status === 'not-started') {
      this.update(id, { status: 'cancelled', message: 'Cancelled', completedAt: this.now() });
    }
    record.controller.abort();
    return true;
  }

  get(id: string): TaskSnapshot | null {
    const record = this.tasks.get(id);
    return record ? { ...record.snapshot } : null;
  }

  list(): TaskSnapshot[] {
    return Array.from(this.tasks.values(), (r) => ({ ...r.snapshot }));
  }

  private require(id: string): TaskRecord {
    const record = this.tasks.get(id);
    if (!record) throw new Error(`Unknown task ${id}`);
    return record;
  }

  private update(id: string, patch: Partial<TaskSnapshot>): void {
    const record = this.require(id);
    record.snapshot = { ...record.snapshot, ...patch };
    this.emit(record.snapshot);
  }

  private emit(snapshot: TaskSnapshot): void {
    this.onChange?.({ ...snapshot });
  }
}
