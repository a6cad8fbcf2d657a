// ─────────────────────────────────────────────
//  Game constants
//  Archetype and terrain tables live in src/assets/data/*.json.
// ─────────────────────────────────────────────

import { IllegalArgumentError } from '@/engine/utils/errors';

export interface GameConfig {
  startingBalance: number;
  /** Credited to each team at every upkeep */
  passiveIncomePerTurn: number;
  /** Credited per farm building at every upkeep */
  farmIncomePerTurn: number;
  /** Seconds of agent wall-clock time each team starts with */
  initialTimePool: number;
  /** Seconds added to each pool at every upkeep */
  timeIncrementPerTurn: number;
  /** Minimum health fraction of archetype max required to sell */
  sellHealthFraction: number;
  buildingSellDiscount: number;
  unitSellDiscount: number;
  exploreGoldFraction: number;
  exploreHealthMultiplier: number;
  exploreDamageBonus: number;
  exploreDefenseBonus: number;
  /** Forced stop: the cascade decides once this many turns have been played */
  turnLimit: number;
  /** Seconds a worker-hosted agent may take to load and build itself */
  agentInitTimeout: number;
}

export const GAME_CONSTANTS: Readonly<GameConfig> = Object.freeze({
  startingBalance: 10,
  passiveIncomePerTurn: 1,
  farmIncomePerTurn: 1,
  initialTimePool: 10,
  timeIncrementPerTurn: 0.01,
  sellHealthFraction: 0.75,
  buildingSellDiscount: 0.5,
  unitSellDiscount: 0.5,
  exploreGoldFraction: 0.5,
  exploreHealthMultiplier: 1.5,
  exploreDamageBonus: 2,
  exploreDefenseBonus: 2,
  turnLimit: 1000,
  agentInitTimeout: 10,
});

const CONFIG_KEYS: readonly (keyof GameConfig)[] = [
  'startingBalance', 'passiveIncomePerTurn', 'farmIncomePerTurn',
  'initialTimePool', 'timeIncrementPerTurn',
  'sellHealthFraction', 'buildingSellDiscount', 'unitSellDiscount',
  'exploreGoldFraction', 'exploreHealthMultiplier', 'exploreDamageBonus', 'exploreDefenseBonus',
  'turnLimit', 'agentInitTimeout',
];

/** Merge overrides onto the defaults. Non-finite or negative values are rejected. */
export function resolveGameConfig(overrides: Partial<GameConfig> = {}): Readonly<GameConfig> {
  const merged: GameConfig = { ...GAME_CONSTANTS };
  for (const key of CONFIG_KEYS) {
    const value = overrides[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new IllegalArgumentError(`Config "${key}" must be a finite, non-negative number (got ${String(value)})`);
    }
    merged[key] = value;
  }
  if (!Number.isInteger(merged.turnLimit) || merged.turnLimit < 1) {
    throw new IllegalArgumentError(`Config "turnLimit" must be a positive integer (got ${merged.turnLimit})`);
  }
  return Object.freeze(merged);
}
