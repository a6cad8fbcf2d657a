// ─────────────────────────────────────────────
//  Turn / Phase FSM
// ─────────────────────────────────────────────

import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export type TurnPhase =
  | 'SETUP'
  | 'UPKEEP'
  | 'ACT_FIRST'
  | 'ACT_SECOND'
  | 'TERMINATION_CHECK'
  | 'SNAPSHOT'
  | 'GAME_OVER';

type TransitionMap = Record<TurnPhase, readonly TurnPhase[]>;

const TRANSITIONS: TransitionMap = {
  // SETUP → GAME_OVER when an agent fails to initialise
  SETUP:             ['UPKEEP', 'GAME_OVER'],
  UPKEEP:            ['ACT_FIRST'],
  ACT_FIRST:         ['ACT_SECOND'],
  ACT_SECOND:        ['TERMINATION_CHECK'],
  TERMINATION_CHECK: ['SNAPSHOT', 'GAME_OVER'],
  SNAPSHOT:          ['UPKEEP'],
  GAME_OVER:         [],
};

export class TurnManager {
  private _phase: TurnPhase = 'SETUP';

  get phase(): TurnPhase { return this._phase; }

  /** Attempt a phase transition. Invalid transitions are logged and ignored. */
  transition(next: TurnPhase): boolean {
    const allowed = TRANSITIONS[this._phase];
    if (!allowed.includes(next)) {
      Logger.log(
        `[TurnManager] Invalid transition: ${this._phase} → ${next}. Allowed: [${allowed.join(', ')}]`,
        'critical',
      );
      return false;
    }
    this._phase = next;
    EventBus.emit('phaseChanged', { phase: next });
    return true;
  }

  get isOver(): boolean {
    return this._phase === 'GAME_OVER';
  }

  reset(): void {
    this._phase = 'SETUP';
  }
}
