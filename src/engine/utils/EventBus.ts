// ─────────────────────────────────────────────
//  Typed Event Bus
//  Every world mutation is announced here. Payloads carry
//  plain values only, never live state objects.
// ─────────────────────────────────────────────

import type { Team } from '@/engine/data/types/Team';
import type { UnitTypeKey } from '@/engine/data/types/Unit';
import type { BuildingTypeKey } from '@/engine/data/types/Building';
import type { EntityKind } from '@/engine/state/WorldState';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';
import type { ExploreBonus } from '@/engine/state/actions/ExploreAction';
import type { WinRule } from '@/engine/systems/stage/WinDeterminer';
import type { GameOverReason } from '@/engine/systems/turn/TurnScheduler';
import type { LogClass } from './Logger';

export type RemovalCause = 'combat' | 'sold' | 'disbanded' | 'destroyed' | 'explored' | 'bridge';

/** Centralised map of all game events and their payload types */
export interface GameEventMap {
  // Turn flow
  turnStarted:     { turn: number };
  phaseChanged:    { phase: TurnPhase };
  agentForfeited:  { team: Team; turn: number; status: 'threw' | 'timeout' };
  gameOver:        { winner: Team | null; reason: GameOverReason; rule: WinRule | null; turn: number };

  // Entity lifecycle
  unitPlaced:      { id: number; team: Team; type: UnitTypeKey; x: number; y: number };
  buildingPlaced:  { id: number; team: Team; type: BuildingTypeKey; x: number; y: number };
  unitMoved:       { id: number; team: Team; fromX: number; fromY: number; toX: number; toY: number };
  entityDamaged:   { id: number; team: Team; kind: EntityKind; amount: number; health: number };
  entityDestroyed: { id: number; team: Team; kind: EntityKind; cause: RemovalCause };
  unitHealed:      { id: number; team: Team; amount: number; health: number };

  // Map / economy
  bridgeBuilt:     { team: Team; x: number; y: number };
  explored:        { team: Team; bonus: ExploreBonus; targetId: number | null };
  balanceChanged:  { team: Team; delta: number; balance: number };

  // Log
  logMessage:      { text: string; cls: LogClass };
}

type Listener<T> = (payload: T) => void;

class TypedEventBus {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  private listeners: Map<string, Listener<any>[]> = new Map();

  on<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const arr = this.listeners.get(event) ?? [];
    arr.push(listener);
    this.listeners.set(event, arr);
  }

  off<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const arr = this.listeners.get(event);
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof GameEventMap>(event: K, payload: GameEventMap[K]): void {
    const arr = this.listeners.get(event);
    if (!arr) return;
    // Iterate a copy so listeners can remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners (between games and in test setup) */
  clear(): void {
    this.listeners.clear();
  }
}

/** Singleton event bus — import this directly in any system */
export const EventBus = new TypedEventBus();
