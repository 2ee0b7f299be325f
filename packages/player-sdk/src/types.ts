import type { Logger } from 'pino';
import type { Counters } from './counters.js';
import type { BettingPolicy } from './policy.js';
import type { TransportFactory } from './transport.js';

export type SessionState = 'connecting' | 'registering' | 'joining' | 'interacting' | 'terminated';

export const SESSION_STATE_ORDER: readonly SessionState[] = [
  'connecting',
  'registering',
  'joining',
  'interacting',
  'terminated',
];

/** register: stop right after a successful registration. */
export type SessionScenario = 'play' | 'register';

export type TerminationReason =
  | 'connect_failed'
  | 'registration_rejected'
  | 'registration_unexpected'
  | 'registration_io'
  | 'registered'
  | 'join_failed'
  | 'terminal_event'
  | 'activity_timeout'
  | 'read_timeout'
  | 'read_failed'
  | 'decode_failed'
  | 'send_failed';

export interface Credentials {
  readonly username: string;
  readonly password: string;
}

export interface CredentialPrefixes {
  usernamePrefix: string;
  passwordPrefix: string;
}

export interface SessionTimeouts {
  connectTimeoutMs: number;
  /** Bound on a single read or write. */
  ioTimeoutMs: number;
  /** Bound on the whole interaction phase, measured from its start. */
  activityTimeoutMs: number;
}

export interface PlayerSessionOptions {
  address: string;
  credentials: Credentials;
  timeouts: SessionTimeouts;
  counters: Counters;
  logger: Logger;
  scenario?: SessionScenario;
  policy?: BettingPolicy;
  openTransport?: TransportFactory;
  now?: () => number;
}

export interface SessionOutcome {
  id: number;
  username: string;
  /** Last state the session was in before it terminated. */
  finalStage: SessionState;
  reason: TerminationReason;
  hasGoneAllIn: boolean;
  allIns: number;
  folds: number;
  messagesReceived: number;
}
