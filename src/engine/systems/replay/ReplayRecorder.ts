// ─────────────────────────────────────────────
//  ReplayRecorder
//  Append-only per-turn snapshots plus a single winner
//  annotation, exported as one JSON document.
// ─────────────────────────────────────────────

import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { freeze } from 'immer';
import type { WorldState } from '@/engine/state/WorldState';
import type { MapData } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { TerrainKey } from '@/engine/data/types/Terrain';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { BuildingInstance } from '@/engine/data/types/Building';
import { StateQuery } from '@/engine/state/WorldState';
import { GameError } from '@/engine/utils/errors';
import { Logger } from '@/engine/utils/Logger';

// ── Snapshot Types ──

export interface WorldSnapshot {
  turn: number;
  balance: Record<Team, number>;
  timeRemaining: Record<Team, number>;
  homeBaseIds: Record<Team, number>;
  units: Record<Team, UnitInstance[]>;
  buildings: Record<Team, BuildingInstance[]>;
}

export interface TurnRecord {
  turn: number;
  state: WorldSnapshot;
}

export interface ReplayDocument {
  id: string;
  map: { width: number; height: number; tiles: TerrainKey[][] };
  /** null only for a draw (both agents failed to initialise) */
  winner: Team | null;
  turns: TurnRecord[];
}

/** Serializable copy of the parts of WorldState a viewer needs. */
export function createSnapshot(state: WorldState): WorldSnapshot {
  return {
    turn: state.turn,
    balance: { ...state.balance },
    timeRemaining: { ...state.timeRemaining },
    homeBaseIds: { ...state.homeBaseIds },
    units: {
      BLUE: StateQuery.unitsOf(state, 'BLUE').map(u => ({ ...u })),
      RED: StateQuery.unitsOf(state, 'RED').map(u => ({ ...u })),
    },
    buildings: {
      BLUE: StateQuery.buildingsOf(state, 'BLUE').map(b => ({ ...b })),
      RED: StateQuery.buildingsOf(state, 'RED').map(b => ({ ...b })),
    },
  };
}

export class ReplayRecorder {
  private readonly records: TurnRecord[] = [];
  private readonly map: ReplayDocument['map'];
  private winner: Team | null = null;
  private annotated = false;

  /** Captures the starting map; later bridge conversions show up only through play. */
  constructor(map: MapData, readonly id: string = randomUUID()) {
    this.map = freeze({
      width: map.width,
      height: map.height,
      tiles: map.terrain.map(row => [...row]),
    }, true);
  }

  get turns(): readonly TurnRecord[] {
    return this.records;
  }

  get isAnnotated(): boolean {
    return this.annotated;
  }

  /** Append a frozen snapshot. Ignored once the winner is set. */
  record(state: WorldState): void {
    if (this.annotated) {
      Logger.log(`Replay ${this.id} is closed; snapshot for turn ${state.turn} dropped`, 'debug');
      return;
    }
    this.records.push(freeze({ turn: state.turn, state: createSnapshot(state) }, true));
  }

  /** Set the winner. May be applied exactly once. */
  annotateWinner(winner: Team | null): void {
    if (this.annotated) throw new GameError(`Replay ${this.id} already has a winner`);
    this.winner = winner;
    this.annotated = true;
  }

  toDocument(): ReplayDocument {
    return {
      id: this.id,
      map: structuredClone(this.map),
      winner: this.winner,
      turns: structuredClone(this.records),
    };
  }

  /** Write the document as JSON, creating parent directories as needed. */
  async export(path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(this.toDocument()), 'utf8');
    Logger.log(`Replay ${this.id} written to ${path} (${this.records.length} turns)`, 'system');
  }
}
