import * as cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';

/**
 * Runs the digest on a cron expression. A tick that fires while the previous
 * run is still going is skipped.
 */
export function startDigestScheduler(expression: string, runDigest: () => Promise<unknown>): ScheduledTask {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression for digest schedule: "${expression}"`);
  }

  let running = false;

  const task = cron.schedule(expression, async () => {
    if (running) {
      console.warn('[SCHEDULER] Previous digest run still in progress, skipping this tick');
      return;
    }

    running = true;
    try {
      await runDigest();
    } catch (err) {
      console.error('[SCHEDULER] digest run failed:', err);
    } finally {
      running = false;
    }
  });

  console.log(`⏰ Digest scheduled with "${expression}"`);
  return task;
}
