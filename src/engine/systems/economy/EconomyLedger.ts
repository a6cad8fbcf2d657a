// ─────────────────────────────────────────────
//  EconomyLedger
//  Per-team balance bookkeeping: income at upkeep, costs and
//  refunds during the act phases, and economic value for the
//  win cascade.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { WorldState } from '@/engine/state/WorldState';
import type { Team } from '@/engine/data/types/Team';
import { TEAMS } from '@/engine/data/types/Team';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { EventBus } from '@/engine/utils/EventBus';

export const EconomyLedger = {
  balance(state: WorldState, team: Team): number {
    return state.balance[team];
  },

  canAfford(state: WorldState, team: Team, cost: number): boolean {
    return state.balance[team] >= cost;
  },

  credit(draft: Draft<WorldState>, team: Team, amount: number): void {
    if (amount === 0) return;
    draft.balance[team] += amount;
    EventBus.emit('balanceChanged', { team, delta: amount, balance: draft.balance[team] });
  },

  debit(draft: Draft<WorldState>, team: Team, amount: number): void {
    EconomyLedger.credit(draft, team, -amount);
  },

  farmCount(state: WorldState, team: Team): number {
    return Object.values(state.buildings[team])
      .filter(b => Archetypes.building(b.type).farm)
      .length;
  },

  /** Passive income plus farm income, credited to both teams at upkeep. */
  collectIncome(draft: Draft<WorldState>): void {
    for (const team of TEAMS) {
      const income = draft.config.passiveIncomePerTurn
        + draft.config.farmIncomePerTurn * EconomyLedger.farmCount(draft, team);
      EconomyLedger.credit(draft, team, income);
    }
  },

  /** Balance plus the archetype cost of every living unit and building. */
  economicValue(state: WorldState, team: Team): number {
    let value = state.balance[team];
    for (const u of Object.values(state.units[team])) value += Archetypes.unit(u.type).cost;
    for (const b of Object.values(state.buildings[team])) value += Archetypes.building(b.type).cost;
    return value;
  },
};
