import type { TaskKind, TaskStatus } from './enums';

export interface TaskSnapshot {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  progress: number;
  total: number;
  currentItem: string | null;
  message: string | null;
  error: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}
