// ─────────────────────────────────────────────
//  EntityRegistry
//  Owns the per-team id → unit / building maps. Every insert
//  and removal updates the occupancy grids in the same recipe.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { EntityKind, WorldState } from '@/engine/state/WorldState';
import type { Team } from '@/engine/data/types/Team';
import type { UnitArchetype } from '@/engine/data/types/Unit';
import type { BuildingArchetype } from '@/engine/data/types/Building';
import type { RemovalCause } from '@/engine/utils/EventBus';
import { createUnit } from '@/engine/data/types/Unit';
import { createBuilding } from '@/engine/data/types/Building';
import { StateQuery } from '@/engine/state/WorldState';
import { Occupancy } from '@/engine/systems/map/Occupancy';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { EventBus } from '@/engine/utils/EventBus';
import { IllegalArgumentError } from '@/engine/utils/errors';

export interface EntityRef {
  kind: EntityKind;
  team: Team;
}

function allocateId(draft: Draft<WorldState>): number {
  const id = draft.nextId;
  draft.nextId += 1;
  return id;
}

export const EntityRegistry = {
  /** Resolve an id to its kind and owner. Ids are shared by units and buildings. */
  resolve(state: WorldState, id: number): EntityRef | undefined {
    const unitTeam = StateQuery.teamOfUnit(state, id);
    if (unitTeam !== undefined) return { kind: 'unit', team: unitTeam };
    const buildingTeam = StateQuery.teamOfBuilding(state, id);
    if (buildingTeam !== undefined) return { kind: 'building', team: buildingTeam };
    return undefined;
  },

  /** Insert a unit when the cell accepts it. Returns the new id. */
  placeUnit(
    draft: Draft<WorldState>,
    team: Team,
    archetype: UnitArchetype,
    x: number,
    y: number,
  ): number | undefined {
    if (!Occupancy.canPlaceUnit(draft, archetype, x, y)) return undefined;
    const id = allocateId(draft);
    draft.units[team][id] = createUnit(id, team, archetype, x, y);
    Occupancy.markUnit(draft, x, y, true);
    EventBus.emit('unitPlaced', { id, team, type: archetype.key, x, y });
    return id;
  },

  placeBuilding(
    draft: Draft<WorldState>,
    team: Team,
    archetype: BuildingArchetype,
    x: number,
    y: number,
  ): number | undefined {
    if (!Occupancy.canPlaceBuilding(draft, archetype, x, y)) return undefined;
    const id = allocateId(draft);
    draft.buildings[team][id] = createBuilding(id, team, archetype, x, y);
    Occupancy.markBuilding(draft, x, y, true);
    EventBus.emit('buildingPlaced', { id, team, type: archetype.key, x, y });
    return id;
  },

  /**
   * Subtract health; at zero or below the entity is removed.
   * Returns whether it died. Unknown ids are ignored.
   */
  damage(draft: Draft<WorldState>, id: number, amount: number): boolean {
    if (amount < 0) throw new IllegalArgumentError(`Damage must be non-negative (got ${amount})`);
    const ref = EntityRegistry.resolve(draft, id);
    if (!ref) return false;

    const entity = ref.kind === 'unit' ? draft.units[ref.team][id] : draft.buildings[ref.team][id];
    if (!entity) return false;
    entity.health -= amount;
    EventBus.emit('entityDamaged', { id, team: ref.team, kind: ref.kind, amount, health: entity.health });

    if (entity.health > 0) return false;
    EntityRegistry.remove(draft, id, 'combat');
    return true;
  },

  /** Remove without payment and free the cell. */
  remove(draft: Draft<WorldState>, id: number, cause: RemovalCause): boolean {
    const ref = EntityRegistry.resolve(draft, id);
    if (!ref) return false;

    if (ref.kind === 'unit') {
      const unit = draft.units[ref.team][id];
      if (!unit) return false;
      Occupancy.markUnit(draft, unit.x, unit.y, false);
      delete draft.units[ref.team][id];
    } else {
      const building = draft.buildings[ref.team][id];
      if (!building) return false;
      Occupancy.markBuilding(draft, building.x, building.y, false);
      delete draft.buildings[ref.team][id];
    }
    EventBus.emit('entityDestroyed', { id, team: ref.team, kind: ref.kind, cause });
    return true;
  },

  /**
   * A team may sell its own entity when health is at least the configured
   * fraction of archetype max. Home bases are never sellable.
   */
  canSell(state: WorldState, team: Team, id: number): boolean {
    if (StateQuery.isHomeBase(state, id)) return false;
    const ref = EntityRegistry.resolve(state, id);
    if (!ref || ref.team !== team) return false;

    const threshold = state.config.sellHealthFraction;
    if (ref.kind === 'unit') {
      const unit = state.units[team][id];
      return unit !== undefined && unit.health >= threshold * Archetypes.unit(unit.type).health;
    }
    const building = state.buildings[team][id];
    return building !== undefined && building.health >= threshold * Archetypes.building(building.type).health;
  },

  /** Refund the discounted archetype cost and remove. */
  sell(draft: Draft<WorldState>, team: Team, id: number): boolean {
    if (!EntityRegistry.canSell(draft, team, id)) return false;

    const unit = draft.units[team][id];
    const building = draft.buildings[team][id];
    const refund = unit
      ? Archetypes.unit(unit.type).cost * draft.config.unitSellDiscount
      : building
        ? Archetypes.building(building.type).cost * draft.config.buildingSellDiscount
        : 0;

    EconomyLedger.credit(draft, team, refund);
    return EntityRegistry.remove(draft, id, 'sold');
  },
};
