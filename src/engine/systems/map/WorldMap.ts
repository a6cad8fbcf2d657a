// ─────────────────────────────────────────────
//  WorldMap
//  Terrain grid queries. Terrain is static apart from
//  bridge conversion (see BuildBridgeAction).
// ─────────────────────────────────────────────

import type { MapData, Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { TerrainKey } from '@/engine/data/types/Terrain';
import { TEAMS } from '@/engine/data/types/Team';
import { isTerrainKey } from '@/engine/data/types/Terrain';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { IllegalArgumentError } from '@/engine/utils/errors';

export interface WorldMapInput {
  /** Row-major: terrain[y][x] */
  terrain: readonly (readonly string[])[];
  homeBases: Record<Team, Pos>;
}

/**
 * Validate and copy a map definition. Unrecognised cells become `error`.
 * Throws when the grid is empty or ragged, or a home base lies off the map.
 */
export function createWorldMap(input: WorldMapInput): MapData {
  const height = input.terrain.length;
  const width = input.terrain[0]?.length ?? 0;
  if (height === 0 || width === 0) {
    throw new IllegalArgumentError('Map must have at least one row and one column');
  }

  const terrain: TerrainKey[][] = input.terrain.map((row, y) => {
    if (row.length !== width) {
      throw new IllegalArgumentError(`Map row ${y} has ${row.length} cells, expected ${width}`);
    }
    return row.map(cell => (isTerrainKey(cell) ? cell : 'error'));
  });

  const map: MapData = {
    width,
    height,
    terrain,
    homeBases: {
      BLUE: { x: input.homeBases.BLUE.x, y: input.homeBases.BLUE.y },
      RED: { x: input.homeBases.RED.x, y: input.homeBases.RED.y },
    },
  };

  for (const team of TEAMS) {
    const base = map.homeBases[team];
    if (!WorldMap.inBounds(map, base.x, base.y)) {
      throw new IllegalArgumentError(`Home base for ${team} at (${base.x}, ${base.y}) is out of bounds`);
    }
  }
  return map;
}

export const WorldMap = {
  inBounds(map: MapData, x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y)
      && x >= 0 && y >= 0 && x < map.width && y < map.height;
  },

  terrainAt(map: MapData, x: number, y: number): TerrainKey | undefined {
    if (!WorldMap.inBounds(map, x, y)) return undefined;
    return map.terrain[y]?.[x];
  },

  isTile(map: MapData, x: number, y: number, kind: TerrainKey): boolean {
    return WorldMap.terrainAt(map, x, y) === kind;
  },

  /** Movement points needed to enter (or stay on) a cell; undefined off the map. */
  moveCost(map: MapData, x: number, y: number): number | undefined {
    const terrain = WorldMap.terrainAt(map, x, y);
    return terrain === undefined ? undefined : Archetypes.terrain(terrain).moveCost;
  },
};
