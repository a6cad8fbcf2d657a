import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { EntityKind, WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { Logger } from '@/engine/utils/Logger';

export class SellAction implements GameAction {
  readonly type = 'SELL';

  constructor(
    readonly team: Team,
    private readonly kind: EntityKind,
    private readonly id: number,
  ) {}

  validate(state: WorldState): boolean {
    return EntityRegistry.resolve(state, this.id)?.kind === this.kind
      && EntityRegistry.canSell(state, this.team, this.id);
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      if (EntityRegistry.sell(draft, this.team, this.id)) {
        Logger.log(`${this.team} sells ${this.kind} #${this.id}`, 'economy');
      }
    });
  }
}
