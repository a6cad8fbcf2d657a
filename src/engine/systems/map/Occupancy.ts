// ─────────────────────────────────────────────
//  Occupancy
//  Two per-cell grids, unit-free and building-free, kept in
//  lock-step with EntityRegistry. A cell can hold one unit
//  and, independently, one building.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { WorldState } from '@/engine/state/WorldState';
import type { UnitArchetype } from '@/engine/data/types/Unit';
import type { BuildingArchetype } from '@/engine/data/types/Building';
import { TEAMS } from '@/engine/data/types/Team';
import { WorldMap } from './WorldMap';

function setCell(grid: boolean[][], x: number, y: number, free: boolean): void {
  const row = grid[y];
  if (row) row[x] = free;
}

export const Occupancy = {
  createGrid(width: number, height: number): boolean[][] {
    return Array.from({ length: height }, () => new Array<boolean>(width).fill(true));
  },

  isUnitFree(state: WorldState, x: number, y: number): boolean {
    return WorldMap.inBounds(state.map, x, y) && state.unitFree[y]?.[x] === true;
  },

  isBuildingFree(state: WorldState, x: number, y: number): boolean {
    return WorldMap.inBounds(state.map, x, y) && state.buildingFree[y]?.[x] === true;
  },

  canPlaceUnit(state: WorldState, archetype: UnitArchetype, x: number, y: number): boolean {
    const terrain = WorldMap.terrainAt(state.map, x, y);
    return terrain !== undefined
      && Occupancy.isUnitFree(state, x, y)
      && archetype.walkableTiles.includes(terrain);
  },

  canPlaceBuilding(state: WorldState, archetype: BuildingArchetype, x: number, y: number): boolean {
    const terrain = WorldMap.terrainAt(state.map, x, y);
    return terrain !== undefined
      && Occupancy.isBuildingFree(state, x, y)
      && archetype.placeableTiles.includes(terrain);
  },

  markUnit(draft: Draft<WorldState>, x: number, y: number, occupied: boolean): void {
    setCell(draft.unitFree, x, y, !occupied);
  },

  markBuilding(draft: Draft<WorldState>, x: number, y: number, occupied: boolean): void {
    setCell(draft.buildingFree, x, y, !occupied);
  },

  /** True when both grids match the registry exactly and no cell is shared. */
  isConsistent(state: WorldState): boolean {
    const units = Occupancy.createGrid(state.map.width, state.map.height);
    const buildings = Occupancy.createGrid(state.map.width, state.map.height);

    for (const team of TEAMS) {
      for (const u of Object.values(state.units[team])) {
        if (units[u.y]?.[u.x] !== true) return false;
        setCell(units, u.x, u.y, false);
      }
      for (const b of Object.values(state.buildings[team])) {
        if (buildings[b.y]?.[b.x] !== true) return false;
        setCell(buildings, b.x, b.y, false);
      }
    }

    for (let y = 0; y < state.map.height; y++) {
      for (let x = 0; x < state.map.width; x++) {
        if (state.unitFree[y]?.[x] !== units[y]?.[x]) return false;
        if (state.buildingFree[y]?.[x] !== buildings[y]?.[x]) return false;
      }
    }
    return true;
  },
};
