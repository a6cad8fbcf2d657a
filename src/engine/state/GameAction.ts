// ─────────────────────────────────────────────
//  Game Action — Command pattern for world mutations
//  `validate` is the predicate half of every gateway capability;
//  `execute` returns the next immutable state.
// ─────────────────────────────────────────────

import type { WorldState } from './WorldState';
import type { Team } from '@/engine/data/types/Team';

export interface GameAction {
  readonly type: string;
  /** Team on whose behalf the action runs */
  readonly team: Team;
  validate(state: WorldState): boolean;
  execute(state: WorldState): WorldState;
}
