/**
 * Polls a long-running ingestion/analysis job until it settles.
 *
 * Status checks that throw are retried like a still-running job; only a
 * failure on the final attempt is reported.
 */

import { describeError, getErrorMessage } from '@compliance-rag/rag-llm';
import { createLogger, type Logger } from '@compliance-rag/rag-observability';

export const DEFAULT_POLL_INTERVAL_MS = 2000;
export const DEFAULT_MAX_POLL_ATTEMPTS = 60;

export interface JobStatusResponse<TResult = unknown> {
  status: string;
  result?: TResult;
  error?: string;
}

export type JobStatusFetcher<TResult = unknown> = (jobId: string) => Promise<JobStatusResponse<TResult>>;

export type JobPollOutcome<TResult = unknown> =
  | { status: 'completed'; jobId: string; result: TResult | undefined; attempts: number }
  | { status: 'failed'; jobId: string; error: string; attempts: number }
  | { status: 'timeout'; jobId: string; message: string; attempts: number }
  | { status: 'error'; jobId: string; message: string; attempts: number };

export interface PollJobOptions {
  intervalMs?: number;
  maxAttempts?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

let pollerLogger: Logger | undefined;
const getPollerLogger = () => (pollerLogger ??= createLogger('JobPoller'));

export async function pollJob<TResult = unknown>(
  fetchStatus: JobStatusFetcher<TResult>,
  jobId: string,
  options: PollJobOptions = {}
): Promise<JobPollOutcome<TResult>> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_POLL_ATTEMPTS;
  const sleep = options.sleep ?? defaultSleep;
  const logger = options.logger ?? getPollerLogger();

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const isLastAttempt = attempt === maxAttempts;

    try {
      const response = await fetchStatus(jobId);

      if (response.status === 'completed') {
        return { status: 'completed', jobId, result: response.result, attempts: attempt };
      }
      if (response.status === 'failed') {
        return { status: 'failed', jobId, error: response.error ?? 'Unknown error', attempts: attempt };
      }
    } catch (error) {
      if (isLastAttempt) {
        logger.error({ jobId, attempt, err: error, ...describeError(error) }, 'Job status check failed');
        return {
          status: 'error',
          jobId,
          message: `Error polling job status: ${getErrorMessage(error)}`,
          attempts: attempt,
        };
      }
      logger.warn({ jobId, attempt, ...describeError(error) }, 'Job status check failed, retrying');
    }

    if (!isLastAttempt) {
      await sleep(intervalMs);
    }
  }

  const seconds = (maxAttempts * intervalMs) / 1000;
  logger.warn({ jobId, maxAttempts }, 'Job polling timed out');
  return {
    status: 'timeout',
    jobId,
    message: `Timeout: Job ${jobId} still processing after ${seconds} seconds.`,
    attempts: maxAttempts,
  };
}
