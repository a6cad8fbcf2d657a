import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import type { UnitTypeKey } from '@/engine/data/types/Unit';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { Occupancy } from '@/engine/systems/map/Occupancy';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';
import { Logger } from '@/engine/utils/Logger';

/** Spawn a unit on the tile of an owned, spawn-capable building. Does not spend the building's action. */
export class SpawnUnitAction implements GameAction {
  readonly type = 'SPAWN_UNIT';

  constructor(
    readonly team: Team,
    private readonly unitType: UnitTypeKey,
    private readonly buildingId: number,
  ) {}

  validate(state: WorldState): boolean {
    const archetype = Archetypes.findUnit(this.unitType);
    const building = state.buildings[this.team][this.buildingId];
    if (!archetype || !building) return false;

    if (!Archetypes.building(building.type).spawnable) return false;
    if (archetype.spawnableFrom !== null && !archetype.spawnableFrom.includes(building.type)) return false;
    if (!Occupancy.canPlaceUnit(state, archetype, building.x, building.y)) return false;
    return EconomyLedger.canAfford(state, this.team, archetype.cost);
  }

  execute(state: WorldState): WorldState {
    const archetype = Archetypes.unit(this.unitType);
    return produce(state, draft => {
      const building = draft.buildings[this.team][this.buildingId];
      if (!building) return;
      const id = EntityRegistry.placeUnit(draft, this.team, archetype, building.x, building.y);
      if (id === undefined) return;
      EconomyLedger.debit(draft, this.team, archetype.cost);
      Logger.log(`${this.team} spawns ${archetype.key} #${id} at (${building.x}, ${building.y})`, 'action');
    });
  }
}
