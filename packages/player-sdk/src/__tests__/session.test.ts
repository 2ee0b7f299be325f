import { describe, it, expect, beforeEach } from 'vitest';
import { pino } from 'pino';
import { PlayerSession } from '../session.js';
import { MemoryCounters } from '../counters.js';
import { deriveCredentials } from '../credentials.js';
import { AlwaysFoldPolicy } from '../policy.js';
import { TransportError, TransportErrorCode } from '../errors.js';
import type { PlayerSessionOptions, SessionScenario } from '../types.js';
import type { BettingPolicy } from '../policy.js';
import { ScriptedTransport, createClock, type ManualClock, type ScriptStep } from './scripted-transport.js';

const logger = pino({ level: 'silent' });

const REGISTERED = '{"type":"event_player_leaderboard_entry_start"}';
const GAME_OVER = '{"type":"event_game_over","game_id":"g1","event":{"winner":"p3"}}';

function betTurn(playerId: string, chips: number): string {
  return JSON.stringify({
    type: 'action_player_bet',
    game_id: 'g1',
    stage: 'preflop',
    state: { player: { player_id: playerId, chips } },
    minimum_bet: 10,
  });
}

interface Harness {
  session: PlayerSession;
  transport: ScriptedTransport;
  counters: MemoryCounters;
  clock: ManualClock;
}

function makeSession(
  steps: ScriptStep[],
  opts: {
    failSend?: (line: string, index: number) => boolean;
    scenario?: SessionScenario;
    policy?: BettingPolicy;
    ioTimeoutMs?: number;
    activityTimeoutMs?: number;
  } = {},
): Harness {
  const clock = createClock();
  const transport = new ScriptedTransport(steps, clock, opts.failSend);
  const counters = new MemoryCounters();
  const options: PlayerSessionOptions = {
    address: '127.0.0.1:8083',
    credentials: deriveCredentials(7, { usernamePrefix: 'p', passwordPrefix: 'pw' }),
    timeouts: {
      connectTimeoutMs: 1000,
      ioTimeoutMs: opts.ioTimeoutMs ?? 5000,
      activityTimeoutMs: opts.activityTimeoutMs ?? 60000,
    },
    counters,
    logger,
    scenario: opts.scenario,
    policy: opts.policy,
    openTransport: async () => transport,
    now: clock.now,
  };
  return { session: new PlayerSession(7, options), transport, counters, clock };
}

// ══════════════════════════════════════════════════════════════
// Registration
// ══════════════════════════════════════════════════════════════

describe('PlayerSession registration', () => {
  it('advances past registration on entry_start and counts the success', async () => {
    const { session, transport, counters } = makeSession([REGISTERED, GAME_OVER]);
    const outcome = await session.run();

    expect(transport.sent[0]).toBe('{"username":"p7","password":"pw7"}');
    expect(transport.sent[1]).toBe('{"action":"join"}');
    expect(counters.get('registrationsSucceeded')).toBe(1);
    expect(counters.get('registrationsFailed')).toBe(0);
    expect(counters.get('gamesJoined')).toBe(1);
    expect(outcome.reason).toBe('terminal_event');
  });

  it('terminates on a rejected registration without joining', async () => {
    const { session, transport, counters } = makeSession(['{"code":409,"message":"exists"}']);
    const outcome = await session.run();

    expect(outcome.reason).toBe('registration_rejected');
    expect(outcome.finalStage).toBe('registering');
    expect(transport.sent).toEqual(['{"username":"p7","password":"pw7"}']);
    expect(counters.get('registrationsFailed')).toBe(1);
    expect(counters.get('registrationsSucceeded')).toBe(0);
    expect(counters.get('gamesJoined')).toBe(0);
  });

  it('treats any other event as an unexpected response', async () => {
    const { session, counters } = makeSession(['{"type":"event_round_start"}']);
    const outcome = await session.run();
    expect(outcome.reason).toBe('registration_unexpected');
    expect(counters.get('registrationsFailed')).toBe(1);
  });

  it('treats an empty message as an unexpected response', async () => {
    const { session, counters } = makeSession(['{}']);
    expect((await session.run()).reason).toBe('registration_unexpected');
    expect(counters.get('registrationsFailed')).toBe(1);
  });

  it('counts a registration read timeout as a failure', async () => {
    const { session, counters } = makeSession([]);
    const outcome = await session.run();
    expect(outcome.reason).toBe('registration_io');
    expect(counters.get('registrationsFailed')).toBe(1);
  });

  it('counts a failed registration send as a failure', async () => {
    const { session, transport, counters } = makeSession([REGISTERED], { failSend: () => true });
    const outcome = await session.run();
    expect(outcome.reason).toBe('registration_io');
    expect(transport.sent).toEqual([]);
    expect(counters.get('registrationsFailed')).toBe(1);
  });

  it('counts an undecodable registration reply as a failure', async () => {
    const { session, counters } = makeSession(['not json']);
    expect((await session.run()).reason).toBe('decode_failed');
    expect(counters.get('registrationsFailed')).toBe(1);
  });

  it('counts a connect failure as a failed registration', async () => {
    const counters = new MemoryCounters();
    const session = new PlayerSession(3, {
      address: '127.0.0.1:1',
      credentials: deriveCredentials(3, { usernamePrefix: 'p', passwordPrefix: 'pw' }),
      timeouts: { connectTimeoutMs: 10, ioTimeoutMs: 10, activityTimeoutMs: 10 },
      counters,
      logger,
      openTransport: async () => {
        throw new TransportError(TransportErrorCode.CONNECT_FAILED, 'Connect to 127.0.0.1:1 failed: ECONNREFUSED');
      },
    });
    const outcome = await session.run();

    expect(outcome).toEqual({
      id: 3,
      username: 'p3',
      finalStage: 'connecting',
      reason: 'connect_failed',
      hasGoneAllIn: false,
      allIns: 0,
      folds: 0,
      messagesReceived: 0,
    });
    expect(counters.get('registrationsFailed')).toBe(1);
    expect(counters.get('sessionsCompleted')).toBe(1);
    expect(session.state).toBe('terminated');
  });

  it('stops after registering in the register scenario', async () => {
    const { session, transport, counters } = makeSession([REGISTERED, betTurn('p7', 100)], {
      scenario: 'register',
    });
    const outcome = await session.run();

    expect(outcome.reason).toBe('registered');
    expect(outcome.finalStage).toBe('registering');
    expect(transport.sent).toHaveLength(1);
    expect(transport.closeCount).toBe(1);
    expect(counters.get('registrationsSucceeded')).toBe(1);
    expect(counters.get('gamesJoined')).toBe(0);
  });
});

// ══════════════════════════════════════════════════════════════
// Join
// ══════════════════════════════════════════════════════════════

describe('PlayerSession join', () => {
  it('ends the session when the join cannot be sent', async () => {
    const { session, counters } = makeSession([REGISTERED], {
      failSend: (line) => line === '{"action":"join"}',
    });
    const outcome = await session.run();

    expect(outcome.reason).toBe('join_failed');
    expect(outcome.finalStage).toBe('joining');
    expect(counters.get('registrationsSucceeded')).toBe(1);
    expect(counters.get('gamesJoined')).toBe(0);
  });
});

// ══════════════════════════════════════════════════════════════
// Interaction loop
// ══════════════════════════════════════════════════════════════

describe('PlayerSession interaction', () => {
  let fullGame: Harness;

  beforeEach(() => {
    fullGame = makeSession([
      REGISTERED,
      betTurn('p7', 500),
      betTurn('p9', 800),
      '{"code":400,"message":"bad"}',
      '{"type":"event_pot_won"}',
      '{}',
      GAME_OVER,
    ]);
  });

  it('goes all-in with the whole stack on its first turn', async () => {
    const { session, transport, counters } = fullGame;
    const outcome = await session.run();

    expect(transport.sent).toEqual([
      '{"username":"p7","password":"pw7"}',
      '{"action":"join"}',
      '{"action":"bet","amount":500}',
    ]);
    expect(counters.get('allIns')).toBe(1);
    expect(counters.get('folds')).toBe(0);
    expect(outcome.hasGoneAllIn).toBe(true);
    expect(session.hasGoneAllIn).toBe(true);
  });

  it('survives bare errors and unknown events until the terminal event', async () => {
    const { session, transport } = fullGame;
    const outcome = await session.run();

    expect(outcome.reason).toBe('terminal_event');
    expect(outcome.finalStage).toBe('interacting');
    expect(outcome.messagesReceived).toBe(7);
    expect(transport.closeCount).toBe(1);
    expect(session.state).toBe('terminated');
  });

  it('folds on every turn after the all-in', async () => {
    const { session, transport, counters } = makeSession([
      REGISTERED,
      betTurn('p7', 500),
      betTurn('p7', 1200),
      betTurn('p7', 40),
      '{"type":"event_player_leaderboard_entry_end"}',
    ]);
    const outcome = await session.run();

    expect(transport.sent.slice(2)).toEqual([
      '{"action":"bet","amount":500}',
      '{"action":"bet","amount":-1}',
      '{"action":"bet","amount":-1}',
    ]);
    expect(counters.get('allIns')).toBe(1);
    expect(counters.get('folds')).toBe(2);
    expect(outcome.allIns).toBe(1);
    expect(outcome.folds).toBe(2);
  });

  it('folds without committing the all-in when it has no chips', async () => {
    const { session, transport, counters } = makeSession([REGISTERED, betTurn('p7', 0), GAME_OVER]);
    const outcome = await session.run();

    expect(transport.sent[2]).toBe('{"action":"bet","amount":-1}');
    expect(counters.get('folds')).toBe(1);
    expect(counters.get('allIns')).toBe(0);
    expect(outcome.hasGoneAllIn).toBe(false);
  });

  it('can still shove after a forced fold once chips come back', async () => {
    const { session, transport, counters } = makeSession([
      REGISTERED,
      betTurn('p7', 0),
      betTurn('p7', 300),
      GAME_OVER,
    ]);
    await session.run();

    expect(transport.sent.slice(2)).toEqual(['{"action":"bet","amount":-1}', '{"action":"bet","amount":300}']);
    expect(counters.get('folds')).toBe(1);
    expect(counters.get('allIns')).toBe(1);
  });

  it('ignores betting turns for other players', async () => {
    const { session, transport } = makeSession([REGISTERED, betTurn('p70', 500), betTurn('', 500), GAME_OVER]);
    await session.run();
    expect(transport.sent).toHaveLength(2);
  });

  it('ends without counting when the bet cannot be sent', async () => {
    const { session, counters } = makeSession([REGISTERED, betTurn('p7', 500), GAME_OVER], {
      failSend: (line) => line.startsWith('{"action":"bet"'),
    });
    const outcome = await session.run();

    expect(outcome.reason).toBe('send_failed');
    expect(outcome.hasGoneAllIn).toBe(false);
    expect(counters.get('allIns')).toBe(0);
    expect(counters.get('folds')).toBe(0);
  });

  it('ends on EOF', async () => {
    const { session } = makeSession([
      REGISTERED,
      new TransportError(TransportErrorCode.EOF, 'Connection closed by peer'),
    ]);
    expect((await session.run()).reason).toBe('read_failed');
  });

  it('ends on an undecodable line', async () => {
    const { session } = makeSession([REGISTERED, '{"type":']);
    expect((await session.run()).reason).toBe('decode_failed');
  });

  it('uses the supplied betting policy', async () => {
    const { session, transport, counters } = makeSession([REGISTERED, betTurn('p7', 500), GAME_OVER], {
      policy: new AlwaysFoldPolicy(),
    });
    await session.run();
    expect(transport.sent[2]).toBe('{"action":"bet","amount":-1}');
    expect(counters.get('folds')).toBe(1);
  });
});

// ══════════════════════════════════════════════════════════════
// Timeouts
// ══════════════════════════════════════════════════════════════

describe('PlayerSession timeouts', () => {
  it('reports a read cut short by the activity window as an activity timeout', async () => {
    const { session, transport, counters } = makeSession([REGISTERED], {
      ioTimeoutMs: 5000,
      activityTimeoutMs: 1000,
    });
    const outcome = await session.run();

    expect(outcome.reason).toBe('activity_timeout');
    expect(transport.readTimeouts).toEqual([5000, 1000]);
    expect(counters.get('registrationsFailed')).toBe(0);
    expect(counters.get('registrationsSucceeded')).toBe(1);
    expect(counters.get('sessionsCompleted')).toBe(1);
  });

  it('stops looping once the activity window has elapsed', async () => {
    const { session, transport } = makeSession(
      [REGISTERED, { advanceMs: 400, line: '{"type":"event_pot_won"}' }, { advanceMs: 700, line: betTurn('p7', 50) }],
      { ioTimeoutMs: 5000, activityTimeoutMs: 1000 },
    );
    const outcome = await session.run();

    expect(outcome.reason).toBe('activity_timeout');
    expect(transport.readTimeouts).toEqual([5000, 1000, 600]);
    // The turn that arrived just before the window closed is still answered.
    expect(transport.sent[2]).toBe('{"action":"bet","amount":50}');
  });

  it('reports a plain read timeout when the per-read bound is tighter', async () => {
    const { session, transport, counters } = makeSession([REGISTERED], {
      ioTimeoutMs: 100,
      activityTimeoutMs: 60000,
    });
    const outcome = await session.run();

    expect(outcome.reason).toBe('read_timeout');
    expect(transport.readTimeouts).toEqual([100, 100]);
    expect(counters.get('registrationsFailed')).toBe(0);
  });
});

describe('PlayerSession lifecycle', () => {
  it('refuses to run twice', async () => {
    const { session } = makeSession([REGISTERED, GAME_OVER]);
    await session.run();
    await expect(session.run()).rejects.toThrow('Session 7 already started');
  });

  it('starts in connecting', () => {
    const { session } = makeSession([]);
    expect(session.state).toBe('connecting');
    expect(session.username).toBe('p7');
  });
});
