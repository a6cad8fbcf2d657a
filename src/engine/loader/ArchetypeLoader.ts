// ─────────────────────────────────────────────
//  ArchetypeLoader
//  Loads terrain, unit and building tables from src/assets/data/*.json
//  once at module load and exposes them through the `Archetypes` registry.
//  Every record is narrowed with type guards; a malformed table aborts startup.
// ─────────────────────────────────────────────

import type { TerrainData, TerrainKey } from '@/engine/data/types/Terrain';
import type { UnitArchetype, UnitTypeKey } from '@/engine/data/types/Unit';
import type { BuildingArchetype, BuildingTypeKey } from '@/engine/data/types/Building';
import { isTerrainKey } from '@/engine/data/types/Terrain';
import { isUnitTypeKey } from '@/engine/data/types/Unit';
import { isBuildingTypeKey } from '@/engine/data/types/Building';
import { IllegalArgumentError, GameError } from '@/engine/utils/errors';

import terrainsJson from '@/assets/data/terrains.json';
import unitsJson from '@/assets/data/units.json';
import buildingsJson from '@/assets/data/buildings.json';

// ── Raw JSON shapes ──────────────────────────

interface RawTerrain {
  key: string;
  name: string;
  moveCost: number;
}

interface RawUnit {
  key: string;
  health: number;
  cost: number;
  attackRange: number;
  cooldown: number;
  damage: number;
  defense: number;
  actionsPerTurn: number;
  moveRange: number;
  damageRange: number;
  healAmount: number;
  spawnableFrom: readonly string[] | null;
  walkableTiles: readonly string[] | null;
}

interface RawBuilding {
  key: string;
  health: number;
  cost: number;
  attackRange: number;
  damageRange: number;
  cooldown: number;
  damage: number;
  defense: number;
  actionsPerTurn: number;
  spawnable: boolean;
  farm: boolean;
  placeableTiles: readonly string[] | null;
}

const DEFAULT_WALKABLE: readonly TerrainKey[] = Object.freeze<TerrainKey[]>(['grass', 'sand', 'bridge']);
const DEFAULT_PLACEABLE: readonly TerrainKey[] = Object.freeze<TerrainKey[]>(['grass', 'sand']);

// ── Parsing ──────────────────────────────────

function terrainList(owner: string, raw: readonly string[] | null, fallback: readonly TerrainKey[]): readonly TerrainKey[] {
  if (raw === null) return fallback;
  return Object.freeze(raw.map(tile => {
    if (!isTerrainKey(tile)) throw new IllegalArgumentError(`${owner}: unknown terrain "${tile}"`);
    return tile;
  }));
}

export function parseTerrains(raw: readonly RawTerrain[]): Record<TerrainKey, TerrainData> {
  const table: Partial<Record<TerrainKey, TerrainData>> = {};
  for (const entry of raw) {
    if (!isTerrainKey(entry.key)) throw new IllegalArgumentError(`Unknown terrain key "${entry.key}"`);
    table[entry.key] = Object.freeze({ key: entry.key, name: entry.name, moveCost: entry.moveCost });
  }
  return {
    error: requireEntry(table, 'error', 'terrain'),
    mountain: requireEntry(table, 'mountain', 'terrain'),
    grass: requireEntry(table, 'grass', 'terrain'),
    sand: requireEntry(table, 'sand', 'terrain'),
    water: requireEntry(table, 'water', 'terrain'),
    bridge: requireEntry(table, 'bridge', 'terrain'),
  };
}

export function parseUnits(raw: readonly RawUnit[]): ReadonlyMap<UnitTypeKey, UnitArchetype> {
  const table = new Map<UnitTypeKey, UnitArchetype>();
  for (const entry of raw) {
    const key = entry.key;
    if (!isUnitTypeKey(key)) throw new IllegalArgumentError(`Unknown unit type "${key}"`);
    const spawnableFrom = entry.spawnableFrom === null
      ? null
      : Object.freeze(entry.spawnableFrom.map(b => {
        if (!isBuildingTypeKey(b)) throw new IllegalArgumentError(`${key}: unknown spawn building "${b}"`);
        return b;
      }));
    table.set(key, Object.freeze({
      key,
      health: entry.health,
      cost: entry.cost,
      attackRange: entry.attackRange,
      cooldown: entry.cooldown,
      damage: entry.damage,
      defense: entry.defense,
      actionsPerTurn: entry.actionsPerTurn,
      moveRange: entry.moveRange,
      damageRange: entry.damageRange,
      healAmount: entry.healAmount,
      spawnableFrom,
      walkableTiles: terrainList(key, entry.walkableTiles, DEFAULT_WALKABLE),
    }));
  }
  return table;
}

export function parseBuildings(raw: readonly RawBuilding[]): ReadonlyMap<BuildingTypeKey, BuildingArchetype> {
  const table = new Map<BuildingTypeKey, BuildingArchetype>();
  for (const entry of raw) {
    const key = entry.key;
    if (!isBuildingTypeKey(key)) throw new IllegalArgumentError(`Unknown building type "${key}"`);
    table.set(key, Object.freeze({
      key,
      health: entry.health,
      cost: entry.cost,
      attackRange: entry.attackRange,
      damageRange: entry.damageRange,
      cooldown: entry.cooldown,
      damage: entry.damage,
      defense: entry.defense,
      actionsPerTurn: entry.actionsPerTurn,
      spawnable: entry.spawnable,
      farm: entry.farm,
      placeableTiles: terrainList(key, entry.placeableTiles, DEFAULT_PLACEABLE),
    }));
  }
  return table;
}

function requireEntry<K extends string, V>(table: Partial<Record<K, V>>, key: K, kind: string): V {
  const entry = table[key];
  if (entry === undefined) throw new GameError(`Missing ${kind} entry "${key}"`);
  return entry;
}

const TERRAINS = parseTerrains(terrainsJson);
const UNITS = parseUnits(unitsJson);
const BUILDINGS = parseBuildings(buildingsJson);

// ── Registry ─────────────────────────────────

export const Archetypes = {
  terrain(key: TerrainKey): TerrainData {
    return TERRAINS[key];
  },

  /** Lookup for untrusted input; undefined when the key is not a known unit type. */
  findUnit(key: unknown): UnitArchetype | undefined {
    return isUnitTypeKey(key) ? UNITS.get(key) : undefined;
  },

  findBuilding(key: unknown): BuildingArchetype | undefined {
    return isBuildingTypeKey(key) ? BUILDINGS.get(key) : undefined;
  },

  unit(key: UnitTypeKey): UnitArchetype {
    const archetype = UNITS.get(key);
    if (!archetype) throw new GameError(`No archetype loaded for unit type ${key}`);
    return archetype;
  },

  building(key: BuildingTypeKey): BuildingArchetype {
    const archetype = BUILDINGS.get(key);
    if (!archetype) throw new GameError(`No archetype loaded for building type ${key}`);
    return archetype;
  },

  allUnits(): UnitArchetype[] {
    return [...UNITS.values()];
  },

  allBuildings(): BuildingArchetype[] {
    return [...BUILDINGS.values()];
  },
};
