import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import { StateQuery } from '../WorldState';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

export type ExploreBonus = 'gold' | 'health' | 'attack' | 'defense';

const BONUSES: ReadonlySet<string> = new Set<ExploreBonus>(['gold', 'health', 'attack', 'defense']);

/**
 * An explorer standing on an exploration building (of either team) is
 * consumed to grant one bonus. Unit bonuses need an allied target other
 * than the explorer itself.
 */
export class ExploreAction implements GameAction {
  readonly type = 'EXPLORE';

  constructor(
    readonly team: Team,
    private readonly explorerId: number,
    private readonly buildingId: number,
    private readonly bonus: ExploreBonus,
    private readonly targetId: number | null = null,
  ) {}

  validate(state: WorldState): boolean {
    if (!BONUSES.has(this.bonus)) return false;

    const explorer = state.units[this.team][this.explorerId];
    const building = StateQuery.building(state, this.buildingId);
    if (!explorer || explorer.type !== 'EXPLORER') return false;
    if (!building || building.type !== 'EXPLORER_BUILDING') return false;
    if (explorer.x !== building.x || explorer.y !== building.y) return false;

    if (this.bonus === 'gold') return true;
    return this.targetId !== null
      && this.targetId !== this.explorerId
      && state.units[this.team][this.targetId] !== undefined;
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      EntityRegistry.remove(draft, this.explorerId, 'explored');
      const config = draft.config;

      if (this.bonus === 'gold') {
        EconomyLedger.credit(draft, this.team, Math.floor(draft.balance[this.team] * config.exploreGoldFraction));
      } else {
        const target = this.targetId === null ? undefined : draft.units[this.team][this.targetId];
        if (!target) return;
        switch (this.bonus) {
          case 'health':
            target.health = Math.ceil(Archetypes.unit(target.type).health * config.exploreHealthMultiplier);
            break;
          case 'attack':
            target.damage += config.exploreDamageBonus;
            break;
          case 'defense':
            target.defense += config.exploreDefenseBonus;
            break;
        }
      }

      EventBus.emit('explored', { team: this.team, bonus: this.bonus, targetId: this.targetId });
      Logger.log(`${this.team} explorer #${this.explorerId} explores for ${this.bonus}`, 'action');
    });
  }
}
