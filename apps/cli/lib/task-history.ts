/**
 * Task snapshots persisted to a small JSON file so `jobscout tasks` can show
 * runs from earlier processes.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { errorMessage } from '@jobscout/core';
import { taskKindEnum, taskStatusEnum, type TaskSnapshot } from '@jobscout/schemas';
import { agentLog } from './agent-logs';

export const MAX_TASK_HISTORY = 50;

const taskSnapshotSchema = z.object({
  id: z.string(),
  kind: taskKindEnum,
  status: taskStatusEnum,
  progress: z.number(),
  total: z.number(),
  currentItem: z.string().nullable(),
  message: z.string().nullable(),
  error: z.string().nullable(),
  createdAt: z.coerce.date(),
  startedAt: z.coerce.date().nullable(),
  completedAt: z.coerce.date().nullable(),
});

const historySchema = z.array(taskSnapshotSchema);

/** Newest first. A missing or unreadable file is an empty history. */
export function readTaskHistory(path: string): TaskSnapshot[] {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    agentLog('Tasks', 'Ignoring corrupt task history', { level: 'warn', detail: errorMessage(err) });
    return [];
  }
  const parsed = historySchema.safeParse(json);
  if (!parsed.success) {
    agentLog('Tasks', 'Ignoring invalid task history', { level: 'warn', detail: parsed.error.message });
    return [];
  }
  return parsed.data;
}

/** Returns an `onChange` listener for TaskRegistry that rewrites the history file. */
export function createTaskHistoryRecorder(path: string): (snapshot: TaskSnapshot) => void {
  let history = readTaskHistory(path);
  return (snapshot) => {
    history = [snapshot, ...history.filter((t) => t.id !== snapshot.id)].slice(0, MAX_TASK_HISTORY);
    try {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(path, JSON.stringify(history, null, 2));
    } catch (err) {
      agentLog('Tasks', 'Could not write task history', { level: 'warn', detail: errorMessage(err) });
    }
  };
}
