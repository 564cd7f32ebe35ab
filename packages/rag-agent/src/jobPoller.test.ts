import { Writable } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { createLogger } from '@compliance-rag/rag-observability';
import { pollJob, type JobStatusResponse } from './jobPoller.js';

const logger = createLogger('JobPoller', {
  destination: new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  }),
});

const sequence = (...responses: Array<JobStatusResponse | Error>) => {
  const fetchStatus = vi.fn(async (_jobId: string): Promise<JobStatusResponse> => {
    const next = responses.shift();
    if (next === undefined) {
      return { status: 'processing' };
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });
  return fetchStatus;
};

describe('pollJob', () => {
  it('returns the result once the job completes', async () => {
    const fetchStatus = sequence(
      { status: 'processing' },
      { status: 'processing' },
      { status: 'completed', result: { phiDetected: 2 } }
    );
    const sleep = vi.fn().mockResolvedValue(undefined);

    const outcome = await pollJob(fetchStatus, 'job-1', { sleep, logger });

    expect(outcome).toEqual({ status: 'completed', jobId: 'job-1', result: { phiDetected: 2 }, attempts: 3 });
    expect(fetchStatus).toHaveBeenCalledWith('job-1');
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('reports a failed job with its error', async () => {
    const fetchStatus = sequence({ status: 'failed', error: 'unsupported file type' });

    const outcome = await pollJob(fetchStatus, 'job-2', { sleep: vi.fn().mockResolvedValue(undefined), logger });

    expect(outcome).toEqual({ status: 'failed', jobId: 'job-2', error: 'unsupported file type', attempts: 1 });
  });

  it('defaults a failure without detail to Unknown error', async () => {
    const fetchStatus = sequence({ status: 'failed' });

    const outcome = await pollJob(fetchStatus, 'job-3', { sleep: vi.fn().mockResolvedValue(undefined), logger });

    expect(outcome.status === 'failed' && outcome.error).toBe('Unknown error');
  });

  it('times out after the attempt budget without a trailing sleep', async () => {
    const fetchStatus = sequence();
    const sleep = vi.fn().mockResolvedValue(undefined);

    const outcome = await pollJob(fetchStatus, 'job-4', { sleep, logger, maxAttempts: 3, intervalMs: 500 });

    expect(outcome).toEqual({
      status: 'timeout',
      jobId: 'job-4',
      message: 'Timeout: Job job-4 still processing after 1.5 seconds.',
      attempts: 3,
    });
    expect(fetchStatus).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('uses two-second intervals and sixty attempts by default', async () => {
    const outcome = await pollJob(sequence(), 'job-5', { sleep: vi.fn().mockResolvedValue(undefined), logger });

    expect(outcome.status === 'timeout' && outcome.message).toBe(
      'Timeout: Job job-5 still processing after 120 seconds.'
    );
  });

  it('retries through a transient status error', async () => {
    const fetchStatus = sequence(new Error('ECONNRESET'), { status: 'completed', result: 'done' });

    const outcome = await pollJob(fetchStatus, 'job-6', { sleep: vi.fn().mockResolvedValue(undefined), logger });

    expect(outcome).toEqual({ status: 'completed', jobId: 'job-6', result: 'done', attempts: 2 });
  });

  it('reports a status error on the final attempt', async () => {
    const fetchStatus = sequence({ status: 'processing' }, new Error('service unavailable'));

    const outcome = await pollJob(fetchStatus, 'job-7', {
      sleep: vi.fn().mockResolvedValue(undefined),
      logger,
      maxAttempts: 2,
    });

    expect(outcome).toEqual({
      status: 'error',
      jobId: 'job-7',
      message: 'Error polling job status: service unavailable',
      attempts: 2,
    });
  });

  it('waits between attempts with the real timer', async () => {
    vi.useFakeTimers();
    try {
      const fetchStatus = sequence({ status: 'processing' }, { status: 'completed' });

      const pending = pollJob(fetchStatus, 'job-8', { logger, intervalMs: 1000 });
      await vi.advanceTimersByTimeAsync(1000);

      await expect(pending).resolves.toEqual({ status: 'completed', jobId: 'job-8', result: undefined, attempts: 2 });
    } finally {
      vi.useRealTimers();
    }
  });
});
