// ─────────────────────────────────────────────
//  World State — Immutable snapshot of the whole game
//  Replaced (never mutated) by WorldStore after each action.
// ─────────────────────────────────────────────

import type { GameConfig } from '@/config';
import type { MapData } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { BuildingInstance } from '@/engine/data/types/Building';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';
import { TEAMS } from '@/engine/data/types/Team';

export type EntityKind = 'unit' | 'building';

/** Units of one team keyed by id */
export type UnitMap = Record<number, UnitInstance>;
/** Buildings of one team keyed by id */
export type BuildingMap = Record<number, BuildingInstance>;

export interface WorldState {
  readonly config: GameConfig;
  readonly map: MapData;

  /** [y][x]: true when no unit stands on the cell */
  readonly unitFree: boolean[][];
  /** [y][x]: true when no building stands on the cell */
  readonly buildingFree: boolean[][];

  readonly units: Record<Team, UnitMap>;
  readonly buildings: Record<Team, BuildingMap>;

  readonly balance: Record<Team, number>;
  /** Seconds of agent time left per team */
  readonly timeRemaining: Record<Team, number>;

  /** Main castle ids, fixed at game start */
  readonly homeBaseIds: Record<Team, number>;

  readonly turn: number;
  readonly phase: TurnPhase;

  /** Next id to hand out; ids are shared by units and buildings */
  readonly nextId: number;
}

/** Utility helpers for querying WorldState */
export const StateQuery = {
  teamOfUnit(state: WorldState, id: number): Team | undefined {
    return TEAMS.find(team => id in state.units[team]);
  },

  teamOfBuilding(state: WorldState, id: number): Team | undefined {
    return TEAMS.find(team => id in state.buildings[team]);
  },

  unit(state: WorldState, id: number): UnitInstance | undefined {
    const team = StateQuery.teamOfUnit(state, id);
    return team === undefined ? undefined : state.units[team][id];
  },

  building(state: WorldState, id: number): BuildingInstance | undefined {
    const team = StateQuery.teamOfBuilding(state, id);
    return team === undefined ? undefined : state.buildings[team][id];
  },

  /** Units of a team in ascending id (creation) order */
  unitsOf(state: WorldState, team: Team): UnitInstance[] {
    return Object.values(state.units[team]).sort((a, b) => a.id - b.id);
  },

  buildingsOf(state: WorldState, team: Team): BuildingInstance[] {
    return Object.values(state.buildings[team]).sort((a, b) => a.id - b.id);
  },

  homeBase(state: WorldState, team: Team): BuildingInstance | undefined {
    return state.buildings[team][state.homeBaseIds[team]];
  },

  isHomeBase(state: WorldState, id: number): boolean {
    return TEAMS.some(team => state.homeBaseIds[team] === id);
  },

  isActive(state: WorldState): boolean {
    return state.phase !== 'GAME_OVER';
  },
};
