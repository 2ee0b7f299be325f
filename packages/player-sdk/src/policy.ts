import type { BetTurn, PlayerAction } from '@table-swarm/wire-protocol';

export type BetOutcome = 'allIn' | 'fold' | 'forcedFold';

export interface BetDecision {
  action: PlayerAction;
  outcome: BetOutcome;
}

export interface BettingPolicy {
  /** Decide what to send for one of our betting turns. */
  decide(turn: BetTurn, hasGoneAllIn: boolean): BetDecision;
}

/**
 * Shoves the whole stack once, then folds every later turn.
 *
 * A player with no chips before its first shove folds with outcome
 * `forcedFold`; the session does not mark that as the one-time all-in, so the
 * shove is still available on a later turn if chips come back.
 */
export class AllInThenFoldPolicy implements BettingPolicy {
  decide(turn: BetTurn, hasGoneAllIn: boolean): BetDecision {
    if (hasGoneAllIn) {
      return { action: { type: 'fold' }, outcome: 'fold' };
    }
    if (turn.chips > 0) {
      return { action: { type: 'bet', amount: turn.chips }, outcome: 'allIn' };
    }
    return { action: { type: 'fold' }, outcome: 'forcedFold' };
  }
}

/** Folds every turn. */
export class AlwaysFoldPolicy implements BettingPolicy {
  decide(): BetDecision {
    return { action: { type: 'fold' }, outcome: 'fold' };
  }
}
