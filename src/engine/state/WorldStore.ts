// ─────────────────────────────────────────────
//  World Store — single source of truth
//  Holds the WorldState and provides the dispatch API.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { WorldState } from './WorldState';
import type { GameAction } from './GameAction';
import type { GameConfig } from '@/config';
import type { MapData } from '@/engine/data/types/Map';
import { TEAMS } from '@/engine/data/types/Team';
import { StateQuery } from './WorldState';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { Occupancy } from '@/engine/systems/map/Occupancy';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { Logger } from '@/engine/utils/Logger';
import { IllegalArgumentError } from '@/engine/utils/errors';

type StoreListener = (state: WorldState) => void;

/**
 * Build the turn-0 state: empty registries, starting balances and time
 * pools, and one main castle per team on its home-base cell.
 */
export function createWorldState(map: MapData, config: Readonly<GameConfig>): WorldState {
  const base: WorldState = {
    config: { ...config },
    map,
    unitFree: Occupancy.createGrid(map.width, map.height),
    buildingFree: Occupancy.createGrid(map.width, map.height),
    units: { BLUE: {}, RED: {} },
    buildings: { BLUE: {}, RED: {} },
    balance: { BLUE: config.startingBalance, RED: config.startingBalance },
    timeRemaining: { BLUE: config.initialTimePool, RED: config.initialTimePool },
    homeBaseIds: { BLUE: -1, RED: -1 },
    turn: 0,
    phase: 'SETUP',
    nextId: 0,
  };

  const castle = Archetypes.building('MAIN_CASTLE');
  return produce(base, draft => {
    for (const team of TEAMS) {
      const { x, y } = map.homeBases[team];
      const id = EntityRegistry.placeBuilding(draft, team, castle, x, y);
      if (id === undefined) {
        throw new IllegalArgumentError(`Home base for ${team} cannot be placed at (${x}, ${y})`);
      }
      draft.homeBaseIds[team] = id;
    }
  });
}

export class WorldStore {
  private state: WorldState;
  private listeners: StoreListener[] = [];

  constructor(map: MapData, config: Readonly<GameConfig>) {
    this.state = createWorldState(map, config);
  }

  getState(): WorldState {
    return this.state;
  }

  /** Predicate half: the game is still running and the action validates. */
  canDispatch(action: GameAction): boolean {
    return StateQuery.isActive(this.state) && action.validate(this.state);
  }

  /** Validate then execute. Returns false (state untouched) when the action is not permitted. */
  dispatch(action: GameAction): boolean {
    if (!this.canDispatch(action)) {
      Logger.log(`${action.team} ${action.type} rejected`, 'debug');
      return false;
    }
    this.state = action.execute(this.state);
    this.notify();
    return true;
  }

  /** Direct state mutation for system-level operations (upkeep, phase transitions, time pools) */
  apply(recipe: (draft: Draft<WorldState>) => void): void {
    this.state = produce(this.state, recipe);
    this.notify();
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.state);
  }
}
