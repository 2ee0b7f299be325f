import type { Logger } from 'pino';
import {
  classifyResponse,
  decodeResponse,
  DecodeError,
  encodeRequest,
  type BetTurn,
  type RequestEnvelope,
  type ResponseEnvelope,
} from '@table-swarm/wire-protocol';
import type { Counters } from './counters.js';
import { isTransportError, TransportErrorCode } from './errors.js';
import { AllInThenFoldPolicy, type BettingPolicy } from './policy.js';
import { openLineTransport, type Transport, type TransportFactory } from './transport.js';
import {
  SESSION_STATE_ORDER,
  type Credentials,
  type PlayerSessionOptions,
  type SessionOutcome,
  type SessionScenario,
  type SessionState,
  type SessionTimeouts,
  type TerminationReason,
} from './types.js';

/**
 * One simulated player: connect, register, join, then answer betting turns
 * until the server ends the game or the activity window closes.
 *
 * `run()` never rejects for network or protocol trouble; every failure is
 * folded into the returned outcome and the counters.
 */
export class PlayerSession {
  readonly id: number;
  private readonly address: string;
  private readonly credentials: Credentials;
  private readonly timeouts: SessionTimeouts;
  private readonly counters: Counters;
  private readonly log: Logger;
  private readonly scenario: SessionScenario;
  private readonly policy: BettingPolicy;
  private readonly openTransport: TransportFactory;
  private readonly now: () => number;

  private current: SessionState = 'connecting';
  private lastActive: SessionState = 'connecting';
  private started = false;
  private transport: Transport | null = null;
  private allInCommitted = false;
  private allIns = 0;
  private folds = 0;
  private messagesReceived = 0;

  constructor(id: number, options: PlayerSessionOptions) {
    this.id = id;
    this.address = options.address;
    this.credentials = options.credentials;
    this.timeouts = options.timeouts;
    this.counters = options.counters;
    this.log = options.logger.child({ player: options.credentials.username });
    this.scenario = options.scenario ?? 'play';
    this.policy = options.policy ?? new AllInThenFoldPolicy();
    this.openTransport = options.openTransport ?? openLineTransport;
    this.now = options.now ?? Date.now;
  }

  get state(): SessionState {
    return this.current;
  }

  get hasGoneAllIn(): boolean {
    return this.allInCommitted;
  }

  get username(): string {
    return this.credentials.username;
  }

  async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error(`Session ${this.id} already started`);
    }
    this.started = true;

    let reason: TerminationReason;
    try {
      reason = await this.drive();
    } finally {
      this.transport?.close();
      this.transport = null;
      this.lastActive = this.current;
      this.transition('terminated');
      this.counters.increment('sessionsCompleted');
    }

    this.log.debug({ reason, stage: this.lastActive }, 'Session ended');
    return {
      id: this.id,
      username: this.credentials.username,
      finalStage: this.lastActive,
      reason,
      hasGoneAllIn: this.allInCommitted,
      allIns: this.allIns,
      folds: this.folds,
      messagesReceived: this.messagesReceived,
    };
  }

  private async drive(): Promise<TerminationReason> {
    const transport = await this.connect();
    if (!transport) {
      return 'connect_failed';
    }

    this.transition('registering');
    const registration = await this.register(transport);
    if (registration !== 'registered' || this.scenario === 'register') {
      return registration;
    }

    this.transition('joining');
    if (!(await this.join(transport))) {
      return 'join_failed';
    }

    this.transition('interacting');
    return this.interact(transport);
  }

  // ── Connecting ─────────────────────────────────────────────

  private async connect(): Promise<Transport | null> {
    try {
      this.transport = await this.openTransport(this.address, {
        connectTimeoutMs: this.timeouts.connectTimeoutMs,
      });
      return this.transport;
    } catch (err) {
      this.log.debug({ err }, 'Error dialing TCP server');
      this.counters.increment('registrationsFailed');
      return null;
    }
  }

  // ── Registering ────────────────────────────────────────────

  private async register(transport: Transport): Promise<TerminationReason> {
    let envelope: ResponseEnvelope;
    try {
      await this.send(transport, {
        kind: 'register',
        username: this.credentials.username,
        password: this.credentials.password,
      });
      envelope = decodeResponse(await this.receive(transport, this.timeouts.ioTimeoutMs));
    } catch (err) {
      this.log.debug({ err }, 'Registration exchange failed');
      this.counters.increment('registrationsFailed');
      return err instanceof DecodeError ? 'decode_failed' : 'registration_io';
    }

    if (classifyResponse(envelope).kind === 'registered') {
      this.counters.increment('registrationsSucceeded');
      this.log.debug('Successfully registered');
      return 'registered';
    }
    this.counters.increment('registrationsFailed');
    if (envelope.code !== 0) {
      this.log.debug({ code: envelope.code, message: envelope.message }, 'Registration failed');
      return 'registration_rejected';
    }
    this.log.debug({ type: envelope.type }, 'Registration resulted in unexpected response');
    return 'registration_unexpected';
  }

  // ── Joining ────────────────────────────────────────────────

  private async join(transport: Transport): Promise<boolean> {
    try {
      await this.send(transport, { kind: 'action', action: { type: 'join' } });
    } catch (err) {
      this.log.debug({ err }, 'Error sending join action');
      return false;
    }
    // The server answers with game events later; nothing to wait for here.
    this.counters.increment('gamesJoined');
    this.log.debug('Sent join action, waiting for game events');
    return true;
  }

  // ── Interacting ────────────────────────────────────────────

  private async interact(transport: Transport): Promise<TerminationReason> {
    const deadline = this.now() + this.timeouts.activityTimeoutMs;

    for (;;) {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        this.log.debug('Game activity timeout, ending session');
        return 'activity_timeout';
      }

      const boundedByActivity = remaining <= this.timeouts.ioTimeoutMs;
      let line: string;
      try {
        line = await this.receive(transport, Math.min(this.timeouts.ioTimeoutMs, remaining));
      } catch (err) {
        if (isTransportError(err, TransportErrorCode.READ_TIMEOUT)) {
          this.log.debug({ boundedByActivity }, 'Read timed out, ending session');
          return boundedByActivity ? 'activity_timeout' : 'read_timeout';
        }
        this.log.debug({ err }, 'Exiting game loop due to read error');
        return 'read_failed';
      }

      let envelope: ResponseEnvelope;
      try {
        envelope = decodeResponse(line);
      } catch (err) {
        this.log.debug({ err }, 'Exiting game loop due to undecodable message');
        return 'decode_failed';
      }

      const message = classifyResponse(envelope);
      switch (message.kind) {
        case 'betTurn':
          if (message.playerId !== this.credentials.username) break;
          if (!(await this.takeTurn(transport, message))) {
            return 'send_failed';
          }
          break;
        case 'terminal':
          this.log.debug({ type: message.type, gameId: message.gameId }, 'Received terminal event');
          if (message.event !== null) {
            this.log.debug({ event: message.event }, 'Terminal event data');
          }
          return 'terminal_event';
        case 'bareError':
          this.log.debug({ code: message.code, message: message.message }, 'Received error from server');
          break;
        case 'unclassified':
          this.log.debug({ envelope }, 'Received message with empty type and no error code');
          break;
        case 'registered':
        case 'event':
          break;
      }
    }
  }

  private async takeTurn(transport: Transport, turn: BetTurn): Promise<boolean> {
    this.log.debug({ stage: turn.stage, chips: turn.chips, minimumBet: turn.minimumBet }, 'Our turn to bet');
    const decision = this.policy.decide(turn, this.allInCommitted);

    try {
      await this.send(transport, { kind: 'action', action: decision.action });
    } catch (err) {
      this.log.debug({ err, outcome: decision.outcome }, 'Error sending bet action');
      return false;
    }

    if (decision.outcome === 'allIn') {
      this.allInCommitted = true;
      this.allIns++;
      this.counters.increment('allIns');
    } else {
      this.folds++;
      this.counters.increment('folds');
    }
    return true;
  }

  // ── I/O ────────────────────────────────────────────────────

  private async send(transport: Transport, request: RequestEnvelope): Promise<void> {
    const line = encodeRequest(request);
    this.log.debug({ line }, 'Sending');
    await transport.sendLine(line, this.timeouts.ioTimeoutMs);
  }

  private async receive(transport: Transport, timeoutMs: number): Promise<string> {
    const line = await transport.readLine(timeoutMs);
    this.messagesReceived++;
    this.log.debug({ line: line.trim() }, 'Received');
    return line;
  }

  private transition(next: SessionState): void {
    const from = SESSION_STATE_ORDER.indexOf(this.current);
    const to = SESSION_STATE_ORDER.indexOf(next);
    if (to <= from) {
      throw new Error(`Illegal session transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }
}
