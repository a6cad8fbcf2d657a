// ─────────────────────────────────────────────
//  Test Helpers
//  Build headless worlds and scripted agents.
//  Use store.dispatch(action) or a gateway to drive game logic.
// ─────────────────────────────────────────────

import type { MapData, Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { UnitTypeKey } from '@/engine/data/types/Unit';
import type { BuildingTypeKey } from '@/engine/data/types/Building';
import type { GameConfig } from '@/config';
import type { Agent, AgentFactory } from '@/engine/agent/Agent';
import type { GatewayHandle } from '@/engine/coordinator/ActionGateway';
import { resolveGameConfig } from '@/config';
import { createWorldMap } from '@/engine/systems/map/WorldMap';
import { WorldStore } from '@/engine/state/WorldStore';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';

// ── Map factory ──────────────────────────────

const TILE_CODES: Record<string, string> = {
  G: 'grass',
  S: 'sand',
  M: 'mountain',
  W: 'water',
  B: 'bridge',
};

/**
 * Build a map from rows of tile codes (G grass, S sand, M mountain,
 * W water, B bridge). Row 0 is y = 0.
 */
export function makeMap(
  rows: string[],
  homeBases: Record<Team, Pos> = { BLUE: { x: 0, y: 0 }, RED: { x: rows[0] ? rows[0].length - 1 : 0, y: rows.length - 1 } },
): MapData {
  return createWorldMap({
    terrain: rows.map(row => [...row].map(code => TILE_CODES[code] ?? code)),
    homeBases,
  });
}

/** 5x5 grass; BLUE castle (id 0) at (0,0), RED castle (id 1) at (4,4). */
export function grassMap(): MapData {
  return makeMap(['GGGGG', 'GGGGG', 'GGGGG', 'GGGGG', 'GGGGG']);
}

// ── Store builder ────────────────────────────

export function buildStore(map: MapData = grassMap(), overrides: Partial<GameConfig> = {}): WorldStore {
  return new WorldStore(map, resolveGameConfig(overrides));
}

/** Place a unit directly and give it a full turn's actions and movement. Returns its id. */
export function putUnit(store: WorldStore, team: Team, type: UnitTypeKey, x: number, y: number): number {
  const archetype = Archetypes.unit(type);
  const id = store.getState().nextId;
  store.apply(draft => {
    if (EntityRegistry.placeUnit(draft, team, archetype, x, y) === undefined) return;
    const unit = draft.units[team][id];
    if (unit) {
      unit.actionsRemaining = archetype.actionsPerTurn;
      unit.movementRemaining = archetype.moveRange;
    }
  });
  if (!store.getState().units[team][id]) throw new Error(`Cannot place ${type} at (${x}, ${y})`);
  return id;
}

/** Place a building directly and give it a full turn's actions. Returns its id. */
export function putBuilding(store: WorldStore, team: Team, type: BuildingTypeKey, x: number, y: number): number {
  const archetype = Archetypes.building(type);
  const id = store.getState().nextId;
  store.apply(draft => {
    if (EntityRegistry.placeBuilding(draft, team, archetype, x, y) === undefined) return;
    const building = draft.buildings[team][id];
    if (building) building.actionsRemaining = archetype.actionsPerTurn;
  });
  if (!store.getState().buildings[team][id]) throw new Error(`Cannot place ${type} at (${x}, ${y})`);
  return id;
}

/** Unwrap a value the test expects to exist. */
export function must<T>(value: T | null | undefined, what = 'value'): T {
  if (value === null || value === undefined) throw new Error(`Expected ${what} to exist`);
  return value;
}

// ── Agents ───────────────────────────────────

export const idleAgent: AgentFactory = () => ({ playTurn: () => undefined });

/** Agent whose turn is a plain function of the gateway. */
export function scriptedAgent(play: (rc: GatewayHandle) => void | Promise<void>): AgentFactory {
  return (): Agent => ({ playTurn: play });
}
