import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import type { DirectionKey, Pos } from '@/engine/data/types/Map';
import { DIRECTIONS, isDirectionKey } from '@/engine/data/types/Map';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { WorldMap } from '@/engine/systems/map/WorldMap';
import { Occupancy } from '@/engine/systems/map/Occupancy';
import { EventBus } from '@/engine/utils/EventBus';

/** Cell reached by one step in the given direction. */
export function stepFrom(from: Pos, direction: DirectionKey): Pos {
  const { dx, dy } = DIRECTIONS[direction];
  return { x: from.x + dx, y: from.y + dy };
}

/**
 * Move one step (or STAY). The destination tile's cost is spent from the
 * unit's movement; STAY pays the cost of the current tile.
 */
export class MoveUnitAction implements GameAction {
  readonly type = 'MOVE_UNIT';

  constructor(
    readonly team: Team,
    private readonly unitId: number,
    private readonly direction: DirectionKey,
  ) {}

  validate(state: WorldState): boolean {
    const unit = state.units[this.team][this.unitId];
    if (!unit || !isDirectionKey(this.direction)) return false;

    const dest = stepFrom(unit, this.direction);
    const terrain = WorldMap.terrainAt(state.map, dest.x, dest.y);
    if (terrain === undefined) return false;
    if (!Archetypes.unit(unit.type).walkableTiles.includes(terrain)) return false;
    if (this.direction !== 'STAY' && !Occupancy.isUnitFree(state, dest.x, dest.y)) return false;
    return unit.movementRemaining >= Archetypes.terrain(terrain).moveCost;
  }

  execute(state: WorldState): WorldState {
    return produce(state, draft => {
      const unit = draft.units[this.team][this.unitId];
      if (!unit) return;
      const from = { x: unit.x, y: unit.y };
      const dest = stepFrom(from, this.direction);
      unit.movementRemaining -= WorldMap.moveCost(draft.map, dest.x, dest.y) ?? 0;
      if (this.direction === 'STAY') return;

      Occupancy.markUnit(draft, from.x, from.y, false);
      unit.x = dest.x;
      unit.y = dest.y;
      Occupancy.markUnit(draft, dest.x, dest.y, true);
      EventBus.emit('unitMoved', {
        id: unit.id, team: this.team, fromX: from.x, fromY: from.y, toX: dest.x, toY: dest.y,
      });
    });
  }
}
