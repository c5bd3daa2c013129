#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import {
  browserOptionsFrom,
  extractionSettingsFrom,
  getEnv,
  trackerSettingsFrom,
  validateEnv,
  type EnvConfig,
} from './config/env.js';
import { createRegistry } from './extractors/index.js';
import type { Scanlator } from './extractors/types.js';
import { JobTable } from './pipelines/jobTable.js';
import { runScheduler } from './pipelines/scheduler.js';
import { TrackerService, type JobStatusView } from './pipelines/tracker.js';
import { createBrowserLauncher, launchBrowser } from './services/browser.js';
import { createNotifier } from './services/notifier.js';
import { SupabaseTrackingStore } from './services/supabase.js';
import { delay } from './utils/delay.js';
import { PluginResolutionError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function requireEnv(): EnvConfig {
  if (!validateEnv()) {
    logger.error('Environment validation failed. Check your .env file.');
    process.exit(1);
  }
  return getEnv();
}

function buildTracker(env: EnvConfig): TrackerService {
  return new TrackerService({
    store: new SupabaseTrackingStore(),
    registry: createRegistry(),
    launchBrowser: createBrowserLauncher(browserOptionsFrom(env)),
    notifier: createNotifier(env),
    jobs: new JobTable(env.MAX_JOB_HISTORY),
    settings: trackerSettingsFrom(env),
  });
}

async function withPlugin<T>(env: EnvConfig, pluginId: string, run: (plugin: Scanlator) => Promise<T>): Promise<T> {
  const registration = createRegistry().resolve(pluginId);
  if (!registration) {
    throw new PluginResolutionError(pluginId);
  }

  const browser = await launchBrowser(browserOptionsFrom(env));
  try {
    const page = await browser.newPage();
    try {
      return await run(registration.create({ page, settings: extractionSettingsFrom(env) }));
    } finally {
      await page.close();
    }
  } finally {
    await browser.close();
  }
}

function isFinished(status: JobStatusView | null): boolean {
  return status === null || status.status === 'completed' || status.status === 'failed';
}

const program = new Command();

program
  .name('scanlator-tracker')
  .description('Tracks new chapter releases across scanlation sites')
  .version('1.0.0');

program
  .command('track')
  .description('Run one tracking job and wait for it to finish')
  .option('--work <id>', 'Only track mappings of this work', positiveInt)
  .option('--source <id>', 'Only track mappings of this source', positiveInt)
  .option('--limit <n>', 'Maximum number of mappings to process', positiveInt)
  .option('--no-notify', 'Do not send notifications for new chapters')
  .option('--poll <ms>', 'Status polling interval in milliseconds', positiveInt, 2000)
  .action(async (options: { work?: number; source?: number; limit?: number; notify: boolean; poll: number }) => {
    try {
      const env = requireEnv();
      const tracker = buildTracker(env);

      const { jobId } = tracker.trigger({
        workId: options.work,
        sourceId: options.source,
        limit: options.limit,
        notify: options.notify,
      });

      let status = tracker.getStatus(jobId);
      while (!isFinished(status)) {
        await delay(options.poll);
        status = tracker.getStatus(jobId);
        if (status) {
          logger.info(
            {
              jobId,
              status: status.status,
              processed: status.processedMappings,
              total: status.totalMappings,
              newChapters: status.newChaptersFound,
            },
            'Tracking progress',
          );
        }
      }

      // Lets the notifier finish after the job turned terminal.
      const final = await tracker.waitFor(jobId);
      console.log(JSON.stringify(final, null, 2));
      process.exit(final?.status === 'failed' ? 1 : 0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'track failed');
      process.exit(1);
    }
  });

program
  .command('track:schedule')
  .description('Run tracking jobs on a fixed interval')
  .option('--interval <ms>', 'Delay between tracking jobs in milliseconds', positiveInt, 3600000)
  .option('--no-notify', 'Do not send notifications for new chapters')
  .option('--once', 'Run a single cycle and exit', false)
  .action(async (options: { interval: number; notify: boolean; once: boolean }) => {
    try {
      const env = requireEnv();
      await runScheduler(buildTracker(env), {
        intervalMs: options.interval,
        notify: options.notify,
        once: options.once,
      });
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'track:schedule failed');
      process.exit(1);
    }
  });

program
  .command('search')
  .description('Search a source for a work title')
  .requiredOption('--plugin <id>', 'Plugin identifier')
  .requiredOption('--title <title>', 'Work title to search for')
  .action(async (options: { plugin: string; title: string }) => {
    try {
      const env = requireEnv();
      const results = await withPlugin(env, options.plugin, (plugin) => plugin.search(options.title));
      console.log(JSON.stringify(results, null, 2));
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'search failed');
      process.exit(1);
    }
  });

program
  .command('extract')
  .description('Extract the chapter list of a work page without storing anything')
  .requiredOption('--plugin <id>', 'Plugin identifier')
  .requiredOption('--url <url>', 'URL of the work page')
  .action(async (options: { plugin: string; url: string }) => {
    try {
      const env = requireEnv();
      const chapters = await withPlugin(env, options.plugin, (plugin) => plugin.extractChapters(options.url));
      console.log(JSON.stringify(chapters, null, 2));
      logger.info({ count: chapters.length }, 'extract completed');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'extract failed');
      process.exit(1);
    }
  });

program
  .command('plugins:list')
  .description('List registered source plugins')
  .action(() => {
    const registrations = createRegistry().list();

    console.log('Available plugins:');
    registrations.forEach((r) => {
      console.log(`  - ${r.id} (${r.displayName}) ${r.baseUrl}`);
    });
  });

program
  .command('notify:test')
  .description('Send a sample notification through the configured notifier')
  .action(async () => {
    try {
      const env = requireEnv();
      const notifier = createNotifier(env);

      if (!notifier) {
        logger.error('No notifier configured. Set NOTIFICATION_TYPE and DISCORD_WEBHOOK_URL.');
        process.exit(1);
      }

      await notifier.notifyNewChapters([
        {
          workTitle: 'Test Work',
          chapterNumber: '1',
          chapterTitle: 'Notification test',
          url: 'https://example.com/test-work/chapter-1',
          sourceName: 'Test Source',
          detectedAt: new Date(),
        },
      ]);
      logger.info('notify:test completed successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'notify:test failed');
      process.exit(1);
    }
  });

program
  .command('validate')
  .description('Validate environment configuration')
  .action(() => {
    if (validateEnv()) {
      console.log('Environment configuration is valid');
      process.exit(0);
    } else {
      console.log('Environment configuration is invalid. Check your .env file.');
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Command failed');
  process.exit(1);
});
