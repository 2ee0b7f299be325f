// ── Event names ─────────────────────────────────────────────

export const EventType = {
  LEADERBOARD_ENTRY_START: 'event_player_leaderboard_entry_start',
  LEADERBOARD_ENTRY_END: 'event_player_leaderboard_entry_end',
  GAME_OVER: 'event_game_over',
  POT_WON: 'event_pot_won',
  PLAYER_BET: 'action_player_bet',
} as const;

export type EventTypeName = (typeof EventType)[keyof typeof EventType];

/** Wire amount the server reads as a fold. Any negative amount works. */
export const FOLD_AMOUNT = -1;

// ── Outbound ────────────────────────────────────────────────

export type PlayerAction =
  | { type: 'join' }
  | { type: 'bet'; amount: number }
  | { type: 'fold' };

export type RequestEnvelope =
  | { kind: 'register'; username: string; password: string }
  | { kind: 'action'; action: PlayerAction };

// ── Inbound ─────────────────────────────────────────────────

export interface PlayerSnapshot {
  playerId: string;
  chips: number;
}

/**
 * Decoded server line. Fields missing on the wire hold their zero value,
 * so `type === ''` means the server sent no event name at all.
 */
export interface ResponseEnvelope {
  type: string;
  event: unknown;
  code: number;
  message: string;
  gameId: string;
  stage: string;
  state: { player: PlayerSnapshot };
  minimumBet: number;
}

export interface BetTurn {
  gameId: string;
  stage: string;
  playerId: string;
  chips: number;
  minimumBet: number;
}

export type ServerMessage =
  | { kind: 'registered' }
  | ({ kind: 'betTurn' } & BetTurn)
  | { kind: 'terminal'; type: string; gameId: string; event: unknown }
  | { kind: 'bareError'; code: number; message: string }
  | { kind: 'unclassified' }
  | { kind: 'event'; type: string };

// ── Errors ──────────────────────────────────────────────────

export class DecodeError extends Error {
  constructor(
    public readonly line: string,
    message: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class EncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodeError';
  }
}
