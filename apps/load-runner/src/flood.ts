import type { Logger } from 'pino';
import type { CounterSnapshot, Counters } from '@table-swarm/player-sdk';

/** Performs one request and resolves with the HTTP status. */
export type RequestSender = (url: string, timeoutMs: number) => Promise<number>;

export const fetchSender: RequestSender = async (url, timeoutMs) => {
  const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
  await res.arrayBuffer();
  return res.status;
};

export interface FloodOptions {
  url: string;
  workers: number;
  durationMs: number;
  requestTimeoutMs: number;
  retryDelayMs: number;
  counters: Counters;
  logger: Logger;
  signal?: AbortSignal;
  send?: RequestSender;
}

export interface FloodResult {
  workers: number;
  elapsedMs: number;
  stoppedBy: 'deadline' | 'signal';
  counters: CounterSnapshot;
}

/**
 * Run `workers` request loops against one URL until the duration elapses
 * or `signal` aborts, then wait for every worker to finish its last request.
 */
export async function runFlood(options: FloodOptions): Promise<FloodResult> {
  const { url, workers, durationMs, counters, logger, signal } = options;
  const send = options.send ?? fetchSender;
  const stop = new AbortController();
  let stoppedBy: FloodResult['stoppedBy'] = 'deadline';

  const onExternalAbort = () => {
    stoppedBy = 'signal';
    stop.abort();
  };
  if (signal?.aborted) {
    onExternalAbort();
  } else {
    signal?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const deadline = setTimeout(() => stop.abort(), durationMs);
  const started = Date.now();
  logger.info({ url, workers, durationMs }, 'Flood started');

  try {
    await Promise.all(
      Array.from({ length: workers }, (_, index) =>
        floodWorker(index, {
          url,
          requestTimeoutMs: options.requestTimeoutMs,
          retryDelayMs: options.retryDelayMs,
          counters,
          logger,
          send,
          stop: stop.signal,
        }),
      ),
    );
  } finally {
    clearTimeout(deadline);
    signal?.removeEventListener('abort', onExternalAbort);
  }

  const elapsedMs = Date.now() - started;
  logger.info({ elapsedMs, stoppedBy }, 'Flood finished, all workers drained');
  return { workers, elapsedMs, stoppedBy, counters: counters.snapshot() };
}

interface WorkerContext {
  url: string;
  requestTimeoutMs: number;
  retryDelayMs: number;
  counters: Counters;
  logger: Logger;
  send: RequestSender;
  stop: AbortSignal;
}

async function floodWorker(index: number, ctx: WorkerContext): Promise<void> {
  const { counters } = ctx;
  while (!ctx.stop.aborted) {
    counters.increment('requestsSent');
    let status: number;
    try {
      status = await ctx.send(ctx.url, ctx.requestTimeoutMs);
    } catch (err) {
      counters.increment('requestsFailed');
      ctx.logger.debug({ err, worker: index }, 'Request failed');
      await pause(ctx.retryDelayMs, ctx.stop);
      continue;
    }

    if (status === 200) {
      counters.increment('requestsSucceeded');
    } else {
      counters.increment('requestsFailed');
      ctx.logger.debug({ status, worker: index }, 'Non-200 response');
    }
  }
}

/** Sleep for `ms`, waking early if `signal` aborts. */
export function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
