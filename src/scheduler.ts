import cron from 'node-cron';
import { ConfigError } from './errors.js';

export interface ScheduledRun {
  stop(): void;
}

/**
 * Registers the run on a cron expression. A tick that fires while the
 * previous run is still going is skipped.
 */
export function startScheduler(
  expression: string,
  timezone: string,
  job: () => Promise<unknown>,
): ScheduledRun {
  if (!cron.validate(expression)) {
    throw new ConfigError(`Invalid SCHEDULE_CRON expression: "${expression}"`);
  }

  let running = false;

  const task = cron.schedule(
    expression,
    async () => {
      if (running) {
        console.warn('[scheduler] Previous run still in progress. Skipping this tick.');
        return;
      }
      running = true;
      try {
        await job();
      } catch (err) {
        console.error('[scheduler] Run failed:', err);
      } finally {
        running = false;
      }
    },
    { timezone },
  );

  console.log(`[scheduler] Cron registered: "${expression}" (${timezone})`);
  return { stop: () => task.stop() };
}
