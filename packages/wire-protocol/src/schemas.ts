/**
 * Zod schemas for the line protocol.
 *
 * Inbound fields accept both a missing key and an explicit `null` and fall
 * back to the zero value of their type. Unknown keys are stripped.
 */

import { z } from 'zod';

const zeroString = z.string().nullish().transform((v) => v ?? '');
const zeroInt = z.number().int().nullish().transform((v) => v ?? 0);

const PlayerSnapshotSchema = z
  .object({
    player_id: zeroString,
    chips: zeroInt,
  })
  .nullish()
  .transform((p) => ({ playerId: p?.player_id ?? '', chips: p?.chips ?? 0 }));

const BetStateSchema = z
  .object({
    player: PlayerSnapshotSchema,
  })
  .nullish()
  .transform((s) => ({ player: s?.player ?? { playerId: '', chips: 0 } }));

export const ResponseEnvelopeSchema = z
  .object({
    type: zeroString,
    event: z.unknown(),
    code: zeroInt,
    message: zeroString,
    game_id: zeroString,
    stage: zeroString,
    state: BetStateSchema,
    minimum_bet: zeroInt,
  })
  .transform((r) => ({
    type: r.type,
    event: r.event ?? null,
    code: r.code,
    message: r.message,
    gameId: r.game_id,
    stage: r.stage,
    state: r.state,
    minimumBet: r.minimum_bet,
  }));

// ── Outbound ────────────────────────────────────────────────

export const RegistrationSchema = z.object({
  username: z.string().min(1).max(128),
  password: z.string().min(1).max(128),
});

export const BetAmountSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);
