import { describe, it, expect } from 'vitest';
import type { TaskSnapshot } from '@jobscout/schemas';
import { createAbortError } from '@jobscout/core';
import { TaskRegistry } from '@/lib/task-registry';

function createRegistry() {
  let tick = 0;
  let seq = 0;
  const events: TaskSnapshot[] = [];
  const registry = new TaskRegistry({
    now: () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)),
    createId: () => `task-${++seq}`,
    onChange: (s) => events.push(s),
  });
  return { registry, events };
}

describe('TaskRegistry', () => {
  it('creates tasks in the not-started state', () => {
    const { registry, events } = createRegistry();
    const task = registry.create('discovery');

    expect(task).toMatchObject({
      id: 'task-1',
      kind: 'discovery',
      status: 'not-started',
      progress: 0,
      total: 0,
      startedAt: null,
      completedAt: null,
    });
    expect(events).toHaveLength(1);
  });

  it('runs a task to completion with progress and a summary', async () => {
    const { registry, events } = createRegistry();
    const { id } = registry.create('scoring');

    const result = await registry.start(
      id,
      async (ctx) => {
        ctx.reportProgress(1, 3, 'Data Engineer at Acme');
        expect(registry.get(id)).toMatchObject({
          status: 'running',
          progress: 1,
          total: 3,
          currentItem: 'Data Engineer at Acme',
        });
        ctx.reportProgress(3, 3);
        return 3;
      },
      { summarize: (n) => `${n} scored` },
    );

    expect(result).toBe(3);
    const done = registry.get(id);
    expect(done).toMatchObject({
      status: 'completed',
      progress: 3,
      total: 3,
      currentItem: null,
      message: '3 scored',
      error: null,
    });
    expect(done?.startedAt).toEqual(new Date(Date.UTC(2024, 0, 1, 0, 0, 1)));
    expect(done?.completedAt).toEqual(new Date(Date.UTC(2024, 0, 1, 0, 0, 2)));
    expect(events.map((e) => e.status)).toEqual([
      'not-started',
      'running',
      'running',
      'running',
      'completed',
    ]);
  });

  it('defaults the completion message', async () => {
    const { registry } = createRegistry();
    const { id } = registry.create('discovery');
    await registry.start(id, async () => undefined);
    expect(registry.get(id)?.message).toBe('Completed');
  });

  it('records failures and rethrows', async () => {
    const { registry } = createRegistry();
    const { id } = registry.create('discovery');

    await expect(
      registry.start(id, async (ctx) => {
        ctx.reportProgress(2, 5, 'query');
        throw new Error('database unreachable');
      }),
    ).rejects.toThrow('database unreachable');

    expect(registry.get(id)).toMatchObject({
      status: 'failed',
      progress: 2,
      total: 5,
      error: 'database unreachable',
      message: null,
    });
  });

  it('cancels a running task at its next checkpoint', async () => {
    const { registry } = createRegistry();
    const { id } = registry.create('scoring');

    const run = registry.start(id, async (ctx) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      if (ctx.signal.aborted) throw createAbortError();
      return 'unreachable';
    });
    expect(registry.cancel(id)).toBe(true);

    await expect(run).rejects.toMatchObject({ name: 'AbortError' });
    expect(registry.get(id)).toMatchObject({ status: 'cancelled', message: 'Cancelled', error: null });
  });

  it('cancels a task that has not started', async () => {
    const { registry } = createRegistry();
    const { id } = registry.create('discovery');

    expect(registry.cancel(id)).toBe(true);
    expect(registry.get(id)?.status).toBe('cancelled');
    await expect(registry.start(id, async () => 1)).rejects.toThrow(`Task ${id} is already cancelled`);
  });

  it('ignores updates after a task has finished', async () => {
    const { registry } = createRegistry();
    const { id } = registry.create('scoring');
    await registry.start(id, async () => 'ok');

    registry.reportProgress(id, 9, 9, 'late');
    registry.reportDone(id, { error: new Error('late failure') });

    expect(registry.get(id)).toMatchObject({ status: 'completed', progress: 0, message: 'Completed' });
    expect(registry.cancel(id)).toBe(false);
  });

  it('returns copies that callers cannot mutate', () => {
    const { registry } = createRegistry();
    const { id } = registry.create('discovery');
    const snapshot = registry.get(id);
    if (snapshot) snapshot.status = 'failed';

    expect(registry.get(id)?.status).toBe('not-started');
    expect(registry.get('missing')).toBeNull();
    expect(registry.list().map((t) => t.id)).toEqual([id]);
  });
});
