import { describe, expect, it } from 'vitest';
import { JobStateError } from '../../utils/errors.js';
import { JobTable } from '../jobTable.js';

const T1 = new Date('2024-06-15T12:00:00.000Z');
const T2 = new Date('2024-06-15T12:05:00.000Z');

describe('JobTable', () => {
  it('creates pending jobs with zeroed counters', () => {
    const job = new JobTable().create();

    expect(job.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(job).toMatchObject({
      status: 'pending',
      startedAt: null,
      completedAt: null,
      totalMappings: 0,
      processedMappings: 0,
      newChaptersFound: 0,
      errors: [],
    });
  });

  it('stamps start and completion times along the way', () => {
    const table = new JobTable();
    const { id } = table.create();

    expect(table.transition(id, 'running', T1).startedAt).toEqual(T1);
    const done = table.transition(id, 'completed', T2);
    expect(done.status).toBe('completed');
    expect(done.completedAt).toEqual(T2);
  });

  it('never moves a job backwards or out of a terminal state', () => {
    const table = new JobTable();
    const { id } = table.create();

    expect(() => table.transition(id, 'completed')).toThrow(JobStateError);
    table.transition(id, 'running');
    table.transition(id, 'failed');
    expect(() => table.transition(id, 'running')).toThrow(JobStateError);
    expect(() => table.transition(id, 'completed')).toThrow(JobStateError);
    expect(table.snapshot(id)?.status).toBe('failed');
  });

  it('rejects updates to finished jobs', () => {
    const table = new JobTable();
    const { id } = table.create();
    table.transition(id, 'running');
    table.update(id, (job) => {
      job.processedMappings += 1;
    });
    table.transition(id, 'completed');

    expect(() =>
      table.update(id, (job) => {
        job.processedMappings += 1;
      }),
    ).toThrow(JobStateError);
    expect(table.snapshot(id)?.processedMappings).toBe(1);
  });

  it('hands out copies that cannot change the stored job', () => {
    const table = new JobTable();
    const { id } = table.create();

    const copy = table.snapshot(id);
    copy?.errors.push('tampered');

    expect(table.snapshot(id)?.errors).toEqual([]);
  });

  it('rejects unknown ids', () => {
    const table = new JobTable();
    expect(table.snapshot('missing')).toBeUndefined();
    expect(() => table.transition('missing', 'running')).toThrow('Unknown job missing');
  });

  it('lists jobs newest first with unstarted jobs last', () => {
    const table = new JobTable();
    const first = table.create();
    const second = table.create();
    const pending = table.create();
    table.transition(first.id, 'running', T1);
    table.transition(second.id, 'running', T2);

    expect(table.list(10).map((job) => job.id)).toEqual([second.id, first.id, pending.id]);
    expect(table.list(1).map((job) => job.id)).toEqual([second.id]);
  });

  it('evicts the oldest finished jobs beyond the history bound', () => {
    const table = new JobTable(2);
    const oldest = table.create();
    table.transition(oldest.id, 'running');
    table.transition(oldest.id, 'completed');
    const second = table.create();
    const third = table.create();

    expect(table.size).toBe(2);
    expect(table.snapshot(oldest.id)).toBeUndefined();
    expect(table.snapshot(second.id)?.status).toBe('pending');
    expect(table.snapshot(third.id)?.status).toBe('pending');
  });

  it('keeps unfinished jobs even past the bound', () => {
    const table = new JobTable(1);
    table.create();
    table.create();

    expect(table.size).toBe(2);
  });
});
