import { describe, expect, it, vi } from 'vitest';

import { runBatch } from '@/lib/jobs/run-batch';

const jobs = [{ id: 'job-1' }, { id: 'job-2' }, { id: 'job-3' }];

describe('runBatch', () => {
  it('runs every job in order', async () => {
    const order: string[] = [];
    const release = vi.fn(async (_ids: string[]) => {});

    const result = await runBatch({
      jobs,
      isStopping: () => false,
      run: async (job) => {
        order.push(job.id);
      },
      release,
    });

    expect(result).toEqual({ ran: 3, released: 0 });
    expect(order).toEqual(['job-1', 'job-2', 'job-3']);
    expect(release).not.toHaveBeenCalled();
  });

  it('finishes the running job after a stop request and releases the rest', async () => {
    let stopping = false;
    const finished: string[] = [];
    const release = vi.fn(async (_ids: string[]) => {});

    const result = await runBatch({
      jobs,
      isStopping: () => stopping,
      run: async (job) => {
        stopping = true;
        await Promise.resolve();
        finished.push(job.id);
      },
      release,
    });

    expect(result).toEqual({ ran: 1, released: 2 });
    expect(finished).toEqual(['job-1']);
    expect(release).toHaveBeenCalledWith(['job-2', 'job-3']);
  });
});
