import { v4 as uuidv4 } from 'uuid';
import type { NewChapterNotice } from '../services/notifier.js';
import { JobStateError } from '../utils/errors.js';

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface TrackingJob {
  id: string;
  status: JobStatus;
  startedAt: Date | null;
  completedAt: Date | null;
  totalMappings: number;
  processedMappings: number;
  newChaptersFound: number;
  errors: string[];
  notices: NewChapterNotice[];
}

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

function cloneJob(job: TrackingJob): TrackingJob {
  return {
    ...job,
    startedAt: job.startedAt ? new Date(job.startedAt.getTime()) : null,
    completedAt: job.completedAt ? new Date(job.completedAt.getTime()) : null,
    errors: [...job.errors],
    notices: job.notices.map((notice) => ({ ...notice, detectedAt: new Date(notice.detectedAt.getTime()) })),
  };
}

/**
 * In-memory store of tracking jobs, owned by the tracker.
 *
 * Every read-modify-write below runs synchronously, so updates coming from
 * concurrently running jobs never interleave on the event loop. Reads hand
 * out copies; the stored records change only through these methods.
 */
export class JobTable {
  private readonly jobs = new Map<string, TrackingJob>();

  constructor(private readonly maxJobs: number = 100) {}

  create(): TrackingJob {
    const job: TrackingJob = {
      id: uuidv4(),
      status: 'pending',
      startedAt: null,
      completedAt: null,
      totalMappings: 0,
      processedMappings: 0,
      newChaptersFound: 0,
      errors: [],
      notices: [],
    };

    this.jobs.set(job.id, job);
    this.evict();
    return cloneJob(job);
  }

  snapshot(jobId: string): TrackingJob | undefined {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : undefined;
  }

  /**
   * Moves a job along pending → running → completed | failed. Sets
   * `startedAt` on running and `completedAt` on either terminal status.
   */
  transition(jobId: string, next: JobStatus, at: Date = new Date()): TrackingJob {
    const job = this.require(jobId);

    if (!TRANSITIONS[job.status].includes(next)) {
      throw new JobStateError(`Job ${jobId} cannot move from ${job.status} to ${next}`, {
        jobId,
        from: job.status,
        to: next,
      });
    }

    job.status = next;
    if (next === 'running') {
      job.startedAt = at;
    } else if (isTerminal(next)) {
      job.completedAt = at;
    }
    return cloneJob(job);
  }

  /** Applies counter/error changes to a job that has not finished yet. */
  update(jobId: string, mutate: (job: TrackingJob) => void): TrackingJob {
    const job = this.require(jobId);

    if (isTerminal(job.status)) {
      throw new JobStateError(`Job ${jobId} is ${job.status} and can no longer change`, { jobId });
    }

    const draft = cloneJob(job);
    mutate(draft);
    job.totalMappings = draft.totalMappings;
    job.processedMappings = draft.processedMappings;
    job.newChaptersFound = draft.newChaptersFound;
    job.errors = draft.errors;
    job.notices = draft.notices;
    return cloneJob(job);
  }

  /** Jobs ordered by start time, newest first; jobs not yet started come last. */
  list(limit: number): TrackingJob[] {
    return [...this.jobs.values()]
      .sort((a, b) => (b.startedAt?.getTime() ?? 0) - (a.startedAt?.getTime() ?? 0))
      .slice(0, Math.max(0, limit))
      .map(cloneJob);
  }

  get size(): number {
    return this.jobs.size;
  }

  private require(jobId: string): TrackingJob {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobStateError(`Unknown job ${jobId}`, { jobId });
    }
    return job;
  }

  private evict(): void {
    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= this.maxJobs) {
        return;
      }
      if (isTerminal(job.status)) {
        this.jobs.delete(id);
      }
    }
  }
}
