// ─────────────────────────────────────────────
//  Unit Types
// ─────────────────────────────────────────────

import type { TerrainKey } from './Terrain';
import type { Team } from './Team';
import type { BuildingTypeKey } from './Building';

export const UNIT_TYPE_KEYS = [
  'KNIGHT', 'WARRIOR', 'SWORDSMAN', 'DEFENDER', 'CATAPULT',
  'SAILOR', 'RAIDER', 'CAPTAIN', 'GALLEY',
  'EXPLORER', 'ENGINEER',
  'LAND_HEALER_1', 'LAND_HEALER_2', 'LAND_HEALER_3',
  'WATER_HEALER_1', 'WATER_HEALER_2', 'WATER_HEALER_3',
] as const;

export type UnitTypeKey = typeof UNIT_TYPE_KEYS[number];

const UNIT_TYPE_KEY_SET: ReadonlySet<string> = new Set(UNIT_TYPE_KEYS);

/** Static template loaded from JSON — never mutated */
export interface UnitArchetype {
  key: UnitTypeKey;
  health: number;
  cost: number;
  attackRange: number;
  cooldown: number;
  damage: number;
  defense: number;
  actionsPerTurn: number;
  /** Movement points restored at every upkeep */
  moveRange: number;
  damageRange: number;
  /** Non-zero for healers */
  healAmount: number;
  /** Building kinds this unit may spawn from; null = any spawn-capable building */
  spawnableFrom: readonly BuildingTypeKey[] | null;
  walkableTiles: readonly TerrainKey[];
}

/** Runtime instance of a unit — state that can change */
export interface UnitInstance {
  readonly id: number;
  readonly team: Team;
  readonly type: UnitTypeKey;
  x: number;
  y: number;
  health: number;
  damage: number;
  defense: number;
  attackRange: number;
  damageRange: number;
  actionsRemaining: number;
  movementRemaining: number;
  level: number;
}

export function isUnitTypeKey(value: unknown): value is UnitTypeKey {
  return typeof value === 'string' && UNIT_TYPE_KEY_SET.has(value);
}

/** Build a fresh instance. A unit cannot act or move on the turn it appears. */
export function createUnit(
  id: number,
  team: Team,
  archetype: UnitArchetype,
  x: number,
  y: number,
): UnitInstance {
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
    movementRemaining: 0,
    level: 1,
  };
}
