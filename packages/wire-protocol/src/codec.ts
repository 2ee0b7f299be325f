import { z } from 'zod';
import { BetAmountSchema, RegistrationSchema, ResponseEnvelopeSchema } from './schemas.js';
import {
  DecodeError,
  EncodeError,
  EventType,
  FOLD_AMOUNT,
  type PlayerAction,
  type RequestEnvelope,
  type ResponseEnvelope,
  type ServerMessage,
} from './types.js';

/**
 * Serialize an outbound request to a single JSON line. The newline
 * terminator is the transport's job.
 */
export function encodeRequest(request: RequestEnvelope): string {
  switch (request.kind) {
    case 'register': {
      const parsed = RegistrationSchema.safeParse({
        username: request.username,
        password: request.password,
      });
      if (!parsed.success) {
        throw new EncodeError(`Invalid registration: ${formatIssues(parsed.error)}`);
      }
      return JSON.stringify({ username: parsed.data.username, password: parsed.data.password });
    }
    case 'action':
      return encodeAction(request.action);
  }
}

function encodeAction(action: PlayerAction): string {
  switch (action.type) {
    case 'join':
      return JSON.stringify({ action: 'join' });
    case 'bet': {
      const parsed = BetAmountSchema.safeParse(action.amount);
      if (!parsed.success) {
        throw new EncodeError(`Invalid bet amount ${action.amount}: ${formatIssues(parsed.error)}`);
      }
      return JSON.stringify({ action: 'bet', amount: parsed.data });
    }
    case 'fold':
      return JSON.stringify({ action: 'bet', amount: FOLD_AMOUNT });
  }
}

export function decodeResponse(line: string): ResponseEnvelope {
  const trimmed = line.trim();
  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch (err) {
    throw new DecodeError(line, `Malformed JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DecodeError(line, 'Expected a JSON object');
  }

  const parsed = ResponseEnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DecodeError(line, `Invalid response: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function isBareError(envelope: ResponseEnvelope): boolean {
  return envelope.type === '' && envelope.code !== 0;
}

export function isUnclassified(envelope: ResponseEnvelope): boolean {
  return envelope.type === '' && envelope.code === 0;
}

export function classifyResponse(envelope: ResponseEnvelope): ServerMessage {
  if (envelope.type === '') {
    return envelope.code !== 0
      ? { kind: 'bareError', code: envelope.code, message: envelope.message }
      : { kind: 'unclassified' };
  }

  switch (envelope.type) {
    case EventType.LEADERBOARD_ENTRY_START:
      return { kind: 'registered' };
    case EventType.PLAYER_BET:
      return {
        kind: 'betTurn',
        gameId: envelope.gameId,
        stage: envelope.stage,
        playerId: envelope.state.player.playerId,
        chips: envelope.state.player.chips,
        minimumBet: envelope.minimumBet,
      };
    case EventType.GAME_OVER:
    case EventType.LEADERBOARD_ENTRY_END:
      return { kind: 'terminal', type: envelope.type, gameId: envelope.gameId, event: envelope.event };
    default:
      return { kind: 'event', type: envelope.type };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
