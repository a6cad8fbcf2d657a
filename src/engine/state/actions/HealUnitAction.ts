import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { MathUtils } from '@/engine/utils/MathUtils';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

/**
 * Restore health to an allied unit within the healer's attack range.
 * Health never rises above archetype max through healing, and a unit
 * already above max (after a health exploration) keeps its health.
 */
export class HealUnitAction implements GameAction {
  readonly type = 'HEAL_UNIT';

  constructor(
    readonly team: Team,
    private readonly healerId: number,
    private readonly targetId: number,
  ) {}

  validate(state: WorldState): boolean {
    const healer = state.units[this.team][this.healerId];
    const target = state.units[this.team][this.targetId];
    if (!healer || !target) return false;
    return Archetypes.unit(healer.type).healAmount > 0
      && healer.actionsRemaining > 0
      && MathUtils.chebyshev(healer, target) <= healer.attackRange;
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      const healer = draft.units[this.team][this.healerId];
      const target = draft.units[this.team][this.targetId];
      if (!healer || !target) return;

      healer.actionsRemaining -= 1;
      const before = target.health;
      const max = Archetypes.unit(target.type).health;
      const amount = Archetypes.unit(healer.type).healAmount;
      target.health = MathUtils.clamp(before + amount, before, Math.max(before, max));

      EventBus.emit('unitHealed', { id: target.id, team: this.team, amount: target.health - before, health: target.health });
      Logger.log(`${this.team} healer #${healer.id} restores ${target.health - before} to #${target.id}`, 'action');
    });
  }
}
