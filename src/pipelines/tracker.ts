import type { Logger } from 'pino';
import type { ScanlatorRegistry } from '../extractors/registry.js';
import type { ChapterEntry, ExtractionSettings, ScanlatorRegistration } from '../extractors/types.js';
import type { BrowserLauncher, BrowserSession } from '../services/browser.js';
import type { NewChapterNotice, Notifier } from '../services/notifier.js';
import type { MappingScope, TrackedMapping, TrackingStore } from '../services/store.js';
import { randomDelay } from '../utils/delay.js';
import { PluginResolutionError, errorMessage, errorName } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { JobTable, type JobStatus, type TrackingJob } from './jobTable.js';

export interface TrackerSettings {
  extraction: ExtractionSettings;
  scrapeDelayMinMs: number;
  scrapeDelayMaxMs: number;
}

export interface TrackerDependencies {
  store: TrackingStore;
  registry: ScanlatorRegistry;
  launchBrowser: BrowserLauncher;
  settings: TrackerSettings;
  notifier?: Notifier;
  jobs?: JobTable;
  clock?: () => Date;
}

export interface TriggerOptions extends MappingScope {
  notify?: boolean;
}

export interface TriggerResult {
  jobId: string;
  status: 'pending';
}

export interface JobStatusView {
  jobId: string;
  status: JobStatus;
  startedAt: string | null;
  completedAt: string | null;
  totalMappings: number;
  processedMappings: number;
  newChaptersFound: number;
  errors: string[];
}

export interface JobSummary {
  jobId: string;
  status: JobStatus;
  startedAt: string | null;
  newChaptersFound: number;
}

interface Closable {
  close(): Promise<void>;
}

async function closeQuietly(resource: Closable, what: string, log: Logger): Promise<void> {
  try {
    await resource.close();
  } catch (error) {
    log.warn({ error: errorMessage(error) }, `Failed to close ${what}`);
  }
}

function toStatusView(job: TrackingJob): JobStatusView {
  return {
    jobId: job.id,
    status: job.status,
    startedAt: job.startedAt ? job.startedAt.toISOString() : null,
    completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    totalMappings: job.totalMappings,
    processedMappings: job.processedMappings,
    newChaptersFound: job.newChaptersFound,
    errors: job.errors,
  };
}

/**
 * Runs tracking jobs: each job walks the eligible mappings one at a time,
 * extracts chapters through the mapping's plugin and stores the ones not
 * seen before. A failing mapping is recorded on the job and skipped.
 */
export class TrackerService {
  private readonly store: TrackingStore;
  private readonly registry: ScanlatorRegistry;
  private readonly launchBrowser: BrowserLauncher;
  private readonly settings: TrackerSettings;
  private readonly notifier?: Notifier;
  private readonly jobs: JobTable;
  private readonly now: () => Date;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(deps: TrackerDependencies) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.launchBrowser = deps.launchBrowser;
    this.settings = deps.settings;
    this.notifier = deps.notifier;
    this.jobs = deps.jobs ?? new JobTable();
    this.now = deps.clock ?? (() => new Date());
  }

  /**
   * Queues a job and returns without waiting for it. Poll `getStatus`
   * (or await `waitFor`) to follow progress.
   */
  trigger(options: TriggerOptions = {}): TriggerResult {
    const { notify = true, ...scope } = options;
    const job = this.jobs.create();

    const run = Promise.resolve()
      .then(() => this.execute(job.id, scope, notify))
      .catch((error) => {
        logger.error({ jobId: job.id, error: errorMessage(error) }, 'Tracking job crashed');
      })
      .finally(() => {
        this.inFlight.delete(job.id);
      });
    this.inFlight.set(job.id, run);

    logger.info({ jobId: job.id, scope, notify }, 'Tracking job queued');
    return { jobId: job.id, status: 'pending' };
  }

  getStatus(jobId: string): JobStatusView | null {
    const job = this.jobs.snapshot(jobId);
    return job ? toStatusView(job) : null;
  }

  listJobs(limit = 20): JobSummary[] {
    return this.jobs.list(limit).map((job) => ({
      jobId: job.id,
      status: job.status,
      startedAt: job.startedAt ? job.startedAt.toISOString() : null,
      newChaptersFound: job.newChaptersFound,
    }));
  }

  /** Resolves with the job's status once its background task has settled. */
  async waitFor(jobId: string): Promise<JobStatusView | null> {
    const run = this.inFlight.get(jobId);
    if (run) {
      await run;
    }
    return this.getStatus(jobId);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  private async execute(jobId: string, scope: MappingScope, notify: boolean): Promise<void> {
    const log = logger.child({ jobId });
    this.jobs.transition(jobId, 'running', this.now());

    try {
      await this.processMappings(jobId, scope, log);
    } catch (error) {
      const message = `Job failed: ${errorMessage(error)}`;
      log.error({ error: errorMessage(error) }, 'Tracking job failed');
      this.jobs.update(jobId, (job) => {
        job.errors = [message];
      });
      this.jobs.transition(jobId, 'failed', this.now());
      return;
    }

    const done = this.jobs.transition(jobId, 'completed', this.now());
    log.info(
      {
        processed: done.processedMappings,
        total: done.totalMappings,
        newChapters: done.newChaptersFound,
        errors: done.errors.length,
      },
      'Tracking job completed',
    );

    if (notify && done.notices.length > 0) {
      await this.sendNotifications(done.notices, log);
    }
  }

  private async processMappings(jobId: string, scope: MappingScope, log: Logger): Promise<void> {
    const mappings = await this.store.listEligibleMappings(scope);
    this.jobs.update(jobId, (job) => {
      job.totalMappings = mappings.length;
    });

    if (mappings.length === 0) {
      log.warn({ scope }, 'No eligible mappings found');
      return;
    }

    log.info({ total: mappings.length }, 'Processing mappings');
    const browser = await this.launchBrowser();

    try {
      for (const [index, mapping] of mappings.entries()) {
        log.info({ position: index + 1, total: mappings.length, mappingId: mapping.id }, 'Tracking mapping');
        await this.trackMapping(jobId, mapping, browser, log);

        if (index < mappings.length - 1) {
          await randomDelay(this.settings.scrapeDelayMinMs, this.settings.scrapeDelayMaxMs);
        }
      }
    } finally {
      await closeQuietly(browser, 'browser', log);
    }
  }

  private async trackMapping(
    jobId: string,
    mapping: TrackedMapping,
    browser: BrowserSession,
    jobLog: Logger,
  ): Promise<void> {
    const sourceName = this.registry.displayNameFor(mapping.source.pluginId);
    const log = jobLog.child({ mappingId: mapping.id, work: mapping.work.title, source: sourceName });

    try {
      const registration = this.registry.resolve(mapping.source.pluginId);
      if (!registration) {
        throw new PluginResolutionError(mapping.source.pluginId);
      }

      const chapters = await this.extract(registration, mapping.url, browser, log);
      if (chapters.length === 0) {
        log.warn({ url: mapping.url }, 'No chapters found');
      }

      const newChapters = await this.storeNewChapters(jobId, mapping, sourceName, chapters, log);
      await this.store.touchWorkChecked(mapping.work.id, this.now());

      this.jobs.update(jobId, (job) => {
        job.processedMappings += 1;
      });
      log.info({ chapters: chapters.length, newChapters }, 'Mapping tracked');
    } catch (error) {
      const message = `mapping ${mapping.id} (${mapping.work.title} @ ${sourceName}): ${errorName(error)}: ${errorMessage(error)}`;
      log.error({ error: errorMessage(error) }, 'Mapping failed');
      this.jobs.update(jobId, (job) => {
        job.errors.push(message);
      });
      await this.recordFailure(mapping, error, log);
    }
  }

  private async extract(
    registration: ScanlatorRegistration,
    url: string,
    browser: BrowserSession,
    log: Logger,
  ): Promise<ChapterEntry[]> {
    const page = await browser.newPage();
    try {
      const plugin = registration.create({ page, settings: this.settings.extraction });
      return await plugin.extractChapters(url);
    } finally {
      await closeQuietly(page, 'page', log);
    }
  }

  private async storeNewChapters(
    jobId: string,
    mapping: TrackedMapping,
    sourceName: string,
    chapters: ChapterEntry[],
    log: Logger,
  ): Promise<number> {
    const known = await this.store.listChapterNumbers(mapping.id);
    let inserted = 0;

    for (const chapter of chapters) {
      if (known.has(chapter.number)) {
        continue;
      }
      known.add(chapter.number);

      const detectedAt = this.now();
      const outcome = await this.store.insertChapter({
        mappingId: mapping.id,
        number: chapter.number,
        title: chapter.title || null,
        url: chapter.url,
        publishedAt: chapter.publishedAt,
        detectedAt,
      });

      if (outcome === 'conflict') {
        log.debug({ number: chapter.number }, 'Chapter stored concurrently, skipping');
        continue;
      }

      inserted++;
      const notice: NewChapterNotice = {
        workTitle: mapping.work.title,
        chapterNumber: chapter.number,
        chapterTitle: chapter.title || null,
        url: chapter.url,
        sourceName,
        detectedAt,
      };
      this.jobs.update(jobId, (job) => {
        job.newChaptersFound += 1;
        job.notices.push(notice);
      });
      log.info({ number: chapter.number }, 'New chapter');
    }

    return inserted;
  }

  private async recordFailure(mapping: TrackedMapping, error: unknown, log: Logger): Promise<void> {
    try {
      await this.store.recordScrapingError({
        mappingId: mapping.id,
        errorType: errorName(error),
        message: errorMessage(error),
        occurredAt: this.now(),
      });
    } catch (recordError) {
      log.error({ error: errorMessage(recordError) }, 'Failed to record scraping error');
    }
  }

  private async sendNotifications(notices: NewChapterNotice[], log: Logger): Promise<void> {
    if (!this.notifier) {
      log.warn({ count: notices.length }, 'Notifications requested but no notifier is configured');
      return;
    }

    try {
      await this.notifier.notifyNewChapters(notices);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Notification delivery failed');
    }
  }
}
