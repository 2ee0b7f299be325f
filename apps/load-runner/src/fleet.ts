import type { Logger } from 'pino';
import {
  AllInThenFoldPolicy,
  AlwaysFoldPolicy,
  PlayerSession,
  deriveCredentials,
  type BettingPolicy,
  type CounterSnapshot,
  type Counters,
  type SessionOutcome,
  type SessionScenario,
  type TerminationReason,
  type TransportFactory,
} from '@table-swarm/player-sdk';
import { BoundedPool } from './pool.js';
import type { PolicyName, RunConfig } from './config.js';

export interface SessionRunner {
  run(): Promise<SessionOutcome>;
}

export type SessionFactory = (id: number) => SessionRunner;

export type OutcomeKey = TerminationReason | 'crashed';

export interface FleetOptions {
  sessions: number;
  concurrency: number;
  firstId?: number;
  /** Log progress every N launches; 0 disables. */
  progressEvery?: number;
  createSession: SessionFactory;
  counters: Counters;
  logger: Logger;
  signal?: AbortSignal;
}

export interface FleetResult {
  requested: number;
  launched: number;
  completed: number;
  aborted: boolean;
  elapsedMs: number;
  peakConcurrency: number;
  outcomes: Partial<Record<OutcomeKey, number>>;
  counters: CounterSnapshot;
}

/**
 * Launch `sessions` player sessions, never more than `concurrency` at once,
 * and wait for every one of them to finish.
 *
 * Launching blocks while the pool is full. An abort stops further launches;
 * sessions already running are still awaited.
 */
export async function runSessions(options: FleetOptions): Promise<FleetResult> {
  const { sessions, concurrency, createSession, counters, logger, signal } = options;
  const firstId = options.firstId ?? 0;
  const progressEvery = options.progressEvery ?? 0;
  const pool = new BoundedPool(concurrency);
  const outcomes: Partial<Record<OutcomeKey, number>> = {};
  const started = Date.now();
  let launched = 0;
  let completed = 0;

  const record = (key: OutcomeKey) => {
    outcomes[key] = (outcomes[key] ?? 0) + 1;
    completed++;
  };

  for (let i = 0; i < sessions; i++) {
    if (signal?.aborted) break;
    await pool.acquire();
    if (signal?.aborted) {
      pool.release();
      break;
    }

    const id = firstId + i;
    let session: SessionRunner;
    try {
      session = createSession(id);
    } catch (err) {
      pool.release();
      throw err;
    }
    launched++;

    void session
      .run()
      .then(
        (outcome) => record(outcome.reason),
        (err: unknown) => {
          logger.error({ err, id }, 'Session crashed');
          record('crashed');
        },
      )
      .finally(() => pool.release());

    if (progressEvery > 0 && launched % progressEvery === 0) {
      logger.info({ launched, active: pool.active }, 'Launched sessions');
    }
  }

  if (signal?.aborted) {
    logger.warn({ launched, requested: sessions }, 'Run interrupted, waiting for active sessions');
  }
  await pool.drain();

  return {
    requested: sessions,
    launched,
    completed,
    aborted: signal?.aborted ?? false,
    elapsedMs: Date.now() - started,
    peakConcurrency: pool.peak,
    outcomes,
    counters: counters.snapshot(),
  };
}

export function createPolicy(name: PolicyName): BettingPolicy {
  switch (name) {
    case 'all-in':
      return new AllInThenFoldPolicy();
    case 'fold':
      return new AlwaysFoldPolicy();
  }
}

/**
 * Build the factory for real sessions from the run configuration.
 */
export function playerSessionFactory(
  config: RunConfig,
  deps: { counters: Counters; logger: Logger; scenario: SessionScenario; openTransport?: TransportFactory },
): SessionFactory {
  const policy = createPolicy(config.policy);
  const timeouts = {
    connectTimeoutMs: config.connectTimeoutMs,
    ioTimeoutMs: config.ioTimeoutMs,
    activityTimeoutMs: config.activityTimeoutMs,
  };
  const prefixes = { usernamePrefix: config.usernamePrefix, passwordPrefix: config.passwordPrefix };

  return (id) =>
    new PlayerSession(id, {
      address: config.address,
      credentials: deriveCredentials(id, prefixes),
      timeouts,
      counters: deps.counters,
      logger: deps.logger,
      scenario: deps.scenario,
      policy,
      openTransport: deps.openTransport,
    });
}
