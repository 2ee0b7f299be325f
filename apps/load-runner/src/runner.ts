import type { Logger } from 'pino';
import { MemoryCounters, type Counters, type TransportFactory } from '@table-swarm/player-sdk';
import type { RunConfig } from './config.js';
import { playerSessionFactory, runSessions } from './fleet.js';
import { runFlood, type RequestSender } from './flood.js';
import { probeHttp, probeTcp } from './probe.js';
import { formatFleetSummary, formatFloodSummary } from './report.js';

export interface RunDeps {
  logger: Logger;
  signal?: AbortSignal;
  counters?: Counters;
  openTransport?: TransportFactory;
  send?: RequestSender;
}

/**
 * Probe the target, run the configured scenario to completion and return
 * the summary to print. Rejects with `StartupError` only when the target
 * cannot be reached before anything starts.
 */
export async function runScenario(config: RunConfig, deps: RunDeps): Promise<string> {
  const { logger, signal } = deps;
  const counters = deps.counters ?? new MemoryCounters();

  if (config.scenario === 'flood') {
    const status = await probeHttp(config.url, config.requestTimeoutMs, deps.send);
    logger.info({ url: config.url, status }, 'Target reachable');

    const result = await runFlood({
      url: config.url,
      workers: config.workers,
      durationMs: config.durationMs,
      requestTimeoutMs: config.requestTimeoutMs,
      retryDelayMs: config.retryDelayMs,
      counters,
      logger,
      signal,
      send: deps.send,
    });
    return formatFloodSummary(result);
  }

  if (!deps.openTransport) {
    await probeTcp(config.address, config.connectTimeoutMs);
    logger.info({ address: config.address }, 'Game server reachable');
  }

  logger.info(
    {
      scenario: config.scenario,
      address: config.address,
      sessions: config.sessions,
      concurrency: config.concurrency,
      policy: config.policy,
    },
    'Starting player sessions',
  );
  if (logger.isLevelEnabled('debug') && config.sessions > 1) {
    logger.warn('Debug logging with more than one session interleaves per-player lines');
  }

  const result = await runSessions({
    sessions: config.sessions,
    concurrency: config.concurrency,
    firstId: config.firstId,
    progressEvery: config.progressEvery,
    counters,
    logger,
    signal,
    createSession: playerSessionFactory(config, {
      counters,
      logger,
      scenario: config.scenario,
      openTransport: deps.openTransport,
    }),
  });
  return formatFleetSummary(result);
}
