import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { EntityKind, WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import { StateQuery } from '../WorldState';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { Logger } from '@/engine/utils/Logger';

/** Disband an owned unit or destroy an owned building, without refund. Home bases are exempt. */
export class RemoveAction implements GameAction {
  readonly type = 'REMOVE';

  constructor(
    readonly team: Team,
    private readonly kind: EntityKind,
    private readonly id: number,
  ) {}

  validate(state: WorldState): boolean {
    if (StateQuery.isHomeBase(state, this.id)) return false;
    const ref = EntityRegistry.resolve(state, this.id);
    return ref !== undefined && ref.kind === this.kind && ref.team === this.team;
  }

  execute(state: WorldState): WorldState {
    const cause = this.kind === 'unit' ? 'disbanded' : 'destroyed';
    return produce(state, draft => {
      if (EntityRegistry.remove(draft, this.id, cause)) {
        Logger.log(`${this.team} ${cause} ${this.kind} #${this.id}`, 'action');
      }
    });
  }
}
