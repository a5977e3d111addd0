import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { TaskSnapshot } from '@jobscout/schemas';
import { TaskRegistry } from '@/lib/task-registry';
import { MAX_TASK_HISTORY, createTaskHistoryRecorder, readTaskHistory } from '@/lib/task-history';

let dir: string;

function snapshot(id: string): TaskSnapshot {
  return {
    id,
    kind: 'discovery',
    status: 'completed',
    progress: 1,
    total: 1,
    currentItem: null,
    message: 'done',
    error: null,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    startedAt: null,
    completedAt: null,
  };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'jobscout-tasks-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('task history', () => {
  it('is empty when the file does not exist', () => {
    expect(readTaskHistory(join(dir, 'tasks.json'))).toEqual([]);
  });

  it('persists registry snapshots for later processes', async () => {
    const path = join(dir, 'state', 'tasks.json');
    const registry = new TaskRegistry({
      now: () => new Date('2024-03-01T12:00:00Z'),
      createId: () => 'run-1',
      onChange: createTaskHistoryRecorder(path),
    });
    const { id } = registry.create('scoring');
    await registry.start(id, async (ctx) => {
      ctx.reportProgress(2, 2, 'Data Engineer at Acme');
      return 2;
    }, { summarize: (n) => `${n}/2 scored` });

    expect(readTaskHistory(path)).toEqual([
      {
        id: 'run-1',
        kind: 'scoring',
        status: 'completed',
        progress: 2,
        total: 2,
        currentItem: null,
        message: '2/2 scored',
        error: null,
        createdAt: new Date('2024-03-01T12:00:00Z'),
        startedAt: new Date('2024-03-01T12:00:00Z'),
        completedAt: new Date('2024-03-01T12:00:00Z'),
      },
    ]);
  });

  it('keeps the newest entries first and caps the file', () => {
    const path = join(dir, 'tasks.json');
    const record = createTaskHistoryRecorder(path);
    for (let i = 1; i <= MAX_TASK_HISTORY + 5; i++) record(snapshot(`t${i}`));

    const history = readTaskHistory(path);
    expect(history).toHaveLength(MAX_TASK_HISTORY);
    expect(history[0].id).toBe(`t${MAX_TASK_HISTORY + 5}`);
    expect(history[MAX_TASK_HISTORY - 1].id).toBe('t6');
  });

  it('continues from an existing file', () => {
    const path = join(dir, 'tasks.json');
    createTaskHistoryRecorder(path)(snapshot('old'));
    createTaskHistoryRecorder(path)(snapshot('new'));

    expect(readTaskHistory(path).map((t) => t.id)).toEqual(['new', 'old']);
    expect(JSON.parse(readFileSync(path, 'utf8'))[1].createdAt).toBe('2024-01-01T00:00:00.000Z');
  });

  it('ignores a corrupt file', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = join(dir, 'tasks.json');
    writeFileSync(path, 'not json');

    expect(readTaskHistory(path)).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);

    writeFileSync(path, JSON.stringify([{ id: 1 }]));
    expect(readTaskHistory(path)).toEqual([]);
  });
});
