/**
 * Plain-text rendering for the jobscout command.
 */

import type { Job, JobStats, TaskSnapshot } from '@jobscout/schemas';

function pad(value: string, width: number): string {
  return value.length >= width ? value.slice(0, width) : value + ' '.repeat(width - value.length);
}

export function formatScore(score: number | null): string {
  return score === null ? '--' : String(score);
}

/** One line per job: id, score, status, title @ company, location. */
export function formatJobLine(job: Job): string {
  const where = job.location ? ` (${job.location})` : '';
  return `${pad(`#${job.id}`, 7)}${pad(formatScore(job.matchScore), 5)}${pad(job.status, 14)}${job.title || '(untitled)'} @ ${job.company || '(unknown)'}${where}`;
}

export function formatJobDetail(job: Job): string {
  const lines = [
    `#${job.id} ${job.title || '(untitled)'}`,
    `Company:  ${job.company || '(unknown)'}`,
    `Location: ${job.location || '(not specified)'}`,
    `URL:      ${job.url}`,
    `Posted:   ${job.postedDate ?? 'unknown'}`,
    `Scraped:  ${job.scrapedAt.toISOString()}`,
    `Status:   ${job.status}`,
    `Score:    ${job.matchScore === null ? 'not scored' : `${job.matchScore}/100`}`,
  ];
  if (job.matchReasoning) lines.push('', 'Reasoning:', job.matchReasoning);
  if (job.notes) lines.push('', 'Notes:', job.notes);
  if (job.description) lines.push('', 'Description:', job.description);
  return lines.join('\n');
}

export function formatStats(stats: JobStats, highMatchThreshold: number): string {
  const lines = [
    `Total jobs:     ${stats.total}`,
    `Scored:         ${stats.scored}`,
    `Unscored:       ${stats.unscored}`,
    `Average score:  ${stats.averageScore ?? '--'}`,
    `High matches:   ${stats.highMatchCount} (score >= ${highMatchThreshold})`,
    '',
    'By status:',
    ...Object.entries(stats.byStatus).map(([status, count]) => `  ${pad(status, 14)}${count}`),
  ];
  if (stats.byCompany.length > 0) {
    lines.push('', 'Top companies:');
    for (const { company, count } of stats.byCompany.slice(0, 10)) {
      lines.push(`  ${pad(company || '(unknown)', 30)}${count}`);
    }
  }
  return lines.join('\n');
}

export function formatTask(task: TaskSnapshot): string {
  const progress = task.total > 0 ? `${task.progress}/${task.total}` : `${task.progress}`;
  const outcome = task.error ?? task.message ?? task.currentItem ?? '';
  const started = (task.startedAt ?? task.createdAt).toISOString();
  return `${task.id.slice(0, 8)}  ${pad(task.kind, 10)}${pad(task.status, 12)}${pad(progress, 10)}${started}  ${outcome}`.trimEnd();
}

/** Single-line progress for a running task. */
export function formatProgress(task: TaskSnapshot): string {
  const item = task.currentItem ? ` ${task.currentItem}` : '';
  return `[${task.kind}] ${task.progress}/${task.total}${item}`;
}
