import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import { WorldMap } from '@/engine/systems/map/WorldMap';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

/** An engineer standing on water turns the tile into a bridge and is consumed. */
export class BuildBridgeAction implements GameAction {
  readonly type = 'BUILD_BRIDGE';

  constructor(
    readonly team: Team,
    private readonly engineerId: number,
  ) {}

  validate(state: WorldState): boolean {
    const engineer = state.units[this.team][this.engineerId];
    return engineer !== undefined
      && engineer.type === 'ENGINEER'
      && WorldMap.isTile(state.map, engineer.x, engineer.y, 'water');
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      const engineer = draft.units[this.team][this.engineerId];
      if (!engineer) return;
      const { x, y } = engineer;
      const row = draft.map.terrain[y];
      if (!row) return;

      row[x] = 'bridge';
      EntityRegistry.remove(draft, this.engineerId, 'bridge');
      EventBus.emit('bridgeBuilt', { team: this.team, x, y });
      Logger.log(`${this.team} engineer #${this.engineerId} builds a bridge at (${x}, ${y})`, 'action');
    });
  }
}
