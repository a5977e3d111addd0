/**
 * Danger: wipe all stored job postings, scores, statuses and notes.
 *
 * The pipelines never delete rows; this is the manual reset.
 *
 * Run: npm run db:clear-jobs
 */
import './load-env';

import { closeDb, getDb, jobs } from '@jobscout/db';

async function main() {
  const db = getDb();

  console.log('Deleting jobs…');
  const deleted = await db.delete(jobs).returning({ id: jobs.id });

  console.log(`Done. ${deleted.length} jobs removed.`);
  await closeDb();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
