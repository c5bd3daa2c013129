import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { JobStatusView, TrackerService } from './tracker.js';

export interface SchedulerOptions {
  intervalMs: number;
  notify: boolean;
  once?: boolean;
}

export async function runCycle(tracker: TrackerService, notify: boolean): Promise<JobStatusView | null> {
  const { jobId } = tracker.trigger({ notify });
  const status = await tracker.waitFor(jobId);

  if (status) {
    logger.info(
      {
        jobId,
        status: status.status,
        processed: status.processedMappings,
        total: status.totalMappings,
        newChapters: status.newChaptersFound,
        errors: status.errors.length,
      },
      'Scheduled tracking cycle finished',
    );
  }

  return status;
}

/**
 * Triggers a tracking job every `intervalMs` until SIGINT or SIGTERM.
 * A running job is always allowed to finish before the loop exits.
 */
export async function runScheduler(tracker: TrackerService, options: SchedulerOptions): Promise<void> {
  const { intervalMs, notify, once = false } = options;

  if (once) {
    logger.info('Running tracking cycle once');
    await runCycle(tracker, notify);
    return;
  }

  let isRunning = true;
  let wake: (() => void) | null = null;

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping scheduler`);
    isRunning = false;
    wake?.();
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  logger.info({ intervalMs, notify }, 'Starting scheduler');

  try {
    while (isRunning) {
      try {
        await runCycle(tracker, notify);
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Error during scheduled tracking');
      }

      if (!isRunning) {
        break;
      }

      await new Promise<void>((resolve) => {
        const timer = setTimeout(resolve, intervalMs);
        wake = () => {
          clearTimeout(timer);
          resolve();
        };
      });
      wake = null;
    }
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }

  logger.info('Scheduler stopped');
}
