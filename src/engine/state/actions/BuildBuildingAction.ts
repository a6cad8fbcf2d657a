import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import type { BuildingTypeKey } from '@/engine/data/types/Building';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { Occupancy } from '@/engine/systems/map/Occupancy';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';
import { Logger } from '@/engine/utils/Logger';

export class BuildBuildingAction implements GameAction {
  readonly type = 'BUILD_BUILDING';

  constructor(
    readonly team: Team,
    private readonly buildingType: BuildingTypeKey,
    private readonly x: number,
    private readonly y: number,
  ) {}

  validate(state: WorldState): boolean {
    const archetype = Archetypes.findBuilding(this.buildingType);
    if (!archetype || archetype.key === 'MAIN_CASTLE') return false;
    if (!Occupancy.canPlaceBuilding(state, archetype, this.x, this.y)) return false;
    return EconomyLedger.canAfford(state, this.team, archetype.cost);
  }

  execute(state: WorldState): WorldState {
    const archetype = Archetypes.building(this.buildingType);
    return produce(state, draft => {
      const id = EntityRegistry.placeBuilding(draft, this.team, archetype, this.x, this.y);
      if (id === undefined) return;
      EconomyLedger.debit(draft, this.team, archetype.cost);
      Logger.log(`${this.team} builds ${archetype.key} #${id} at (${this.x}, ${this.y})`, 'action');
    });
  }
}
