// ─────────────────────────────────────────────
//  WinDeterminer
//  Ordered tie-break cascade used whenever a game ends
//  without a single forfeiting side.
// ─────────────────────────────────────────────

import type { WorldState } from '@/engine/state/WorldState';
import type { Team } from '@/engine/data/types/Team';
import { SECOND_MOVER } from '@/engine/data/types/Team';
import { StateQuery } from '@/engine/state/WorldState';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';

export type WinRule =
  | 'home_base_destroyed'   // exactly one home base is gone
  | 'home_base_health'      // higher remaining home-base health
  | 'economic_value'        // balance + archetype cost of everything alive
  | 'second_mover';         // exact tie

export interface WinDecision {
  winner: Team;
  rule: WinRule;
}

type Rule = (state: WorldState) => Team | null;

/** Higher score wins; null on a tie. */
function compare(score: (team: Team) => number): Team | null {
  const blue = score('BLUE');
  const red = score('RED');
  if (blue === red) return null;
  return blue > red ? 'BLUE' : 'RED';
}

const CASCADE: readonly (readonly [WinRule, Rule])[] = [
  ['home_base_destroyed', state => {
    const blueStanding = StateQuery.homeBase(state, 'BLUE') !== undefined;
    const redStanding = StateQuery.homeBase(state, 'RED') !== undefined;
    if (blueStanding === redStanding) return null;
    return blueStanding ? 'BLUE' : 'RED';
  }],
  ['home_base_health', state => compare(team => StateQuery.homeBase(state, team)?.health ?? 0)],
  ['economic_value', state => compare(team => EconomyLedger.economicValue(state, team))],
];

/**
 * Walk the cascade and return the first decisive rule.
 * Falls through to the second mover on an exact tie.
 */
export function determineWinner(state: WorldState): WinDecision {
  for (const [rule, decide] of CASCADE) {
    const winner = decide(state);
    if (winner !== null) return { winner, rule };
  }
  return { winner: SECOND_MOVER, rule: 'second_mover' };
}

/** Namespace export for cleaner API */
export const WinDeterminer = { determineWinner };
