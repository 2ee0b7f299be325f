export type {
  SessionState,
  SessionScenario,
  TerminationReason,
  Credentials,
  CredentialPrefixes,
  SessionTimeouts,
  PlayerSessionOptions,
  SessionOutcome,
} from './types.js';
export { SESSION_STATE_ORDER } from './types.js';
export { PlayerSession } from './session.js';
export { deriveCredentials } from './credentials.js';
export type { Counters, CounterName, CounterSnapshot } from './counters.js';
export { MemoryCounters, COUNTER_NAMES } from './counters.js';
export type { BettingPolicy, BetDecision, BetOutcome } from './policy.js';
export { AllInThenFoldPolicy, AlwaysFoldPolicy } from './policy.js';
export type { Transport, TransportFactory, TransportOpenOptions, HostPort } from './transport.js';
export { LineTransport, openLineTransport, parseAddress } from './transport.js';
export { TransportError, TransportErrorCode, isTransportError } from './errors.js';
