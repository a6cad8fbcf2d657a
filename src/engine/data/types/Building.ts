// ─────────────────────────────────────────────
//  Building Types
// ─────────────────────────────────────────────

import type { TerrainKey } from './Terrain';
import type { Team } from './Team';

export const BUILDING_TYPE_KEYS = [
  'MAIN_CASTLE',
  'PORT',
  'EXPLORER_BUILDING',
  'FARM_1',
  'FARM_2',
  'FARM_3',
] as const;

export type BuildingTypeKey = typeof BUILDING_TYPE_KEYS[number];

const BUILDING_TYPE_KEY_SET: ReadonlySet<string> = new Set(BUILDING_TYPE_KEYS);

/** Static template loaded from JSON — never mutated */
export interface BuildingArchetype {
  key: BuildingTypeKey;
  health: number;
  /** Negative cost marks a building that can never be bought */
  cost: number;
  attackRange: number;
  damageRange: number;
  cooldown: number;
  damage: number;
  defense: number;
  actionsPerTurn: number;
  /** Whether units can be spawned from this building */
  spawnable: boolean;
  /** Credits farm income at every upkeep */
  farm: boolean;
  placeableTiles: readonly TerrainKey[];
}

/** Runtime instance of a building */
export interface BuildingInstance {
  readonly id: number;
  readonly team: Team;
  readonly type: BuildingTypeKey;
  readonly x: number;
  readonly y: number;
  health: number;
  damage: number;
  defense: number;
  attackRange: number;
  damageRange: number;
  actionsRemaining: number;
  level: number;
}

export function isBuildingTypeKey(value: unknown): value is BuildingTypeKey {
  return typeof value === 'string' && BUILDING_TYPE_KEY_SET.has(value);
}

/** Build a fresh instance. New buildings cannot act until the next upkeep. */
export function createBuilding(
  id: number,
  team: Team,
  archetype: BuildingArchetype,
  x: number,
  y: number,
): BuildingInstance {
  return {
    id,
    team,
    type: archetype.key,
    x,
    y,
    health: archetype.health,
    damage: archetype.damage,
    defense: archetype.defense,
    attackRange: archetype.attackRange,
    damageRange: archetype.damageRange,
    actionsRemaining: 0,
    level: 1,
  };
}
