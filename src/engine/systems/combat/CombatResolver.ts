// ─────────────────────────────────────────────
//  Combat Resolver
//  Point-centred area attacks on the Chebyshev metric.
//  Every enemy within the attacker's damage radius of the
//  target point takes the attacker's damage; surviving units
//  then retaliate with their defense. Buildings never retaliate.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import type { WorldState } from '@/engine/state/WorldState';
import { opposingTeam } from '@/engine/data/types/Team';
import { StateQuery } from '@/engine/state/WorldState';
import { WorldMap } from '@/engine/systems/map/WorldMap';
import { EntityRegistry } from '@/engine/systems/registry/EntityRegistry';
import { MathUtils } from '@/engine/utils/MathUtils';
import { Logger } from '@/engine/utils/Logger';

export interface AttackReport {
  /** Ids hit, units first, each group in ascending id order */
  hit: number[];
  destroyed: number[];
  /** Total defense dealt back to the attacker */
  retaliation: number;
  attackerDestroyed: boolean;
}

interface Striker extends Pos {
  actionsRemaining: number;
  attackRange: number;
}

/** Ids of enemy units (and optionally buildings) within `radius` of the point. */
function collect(
  state: WorldState,
  enemy: Team,
  point: Pos,
  radius: number,
  includeBuildings: boolean,
): { units: number[]; buildings: number[] } {
  const units = StateQuery.unitsOf(state, enemy)
    .filter(u => MathUtils.chebyshev(u, point) <= radius)
    .map(u => u.id);
  const buildings = includeBuildings
    ? StateQuery.buildingsOf(state, enemy)
      .filter(b => MathUtils.chebyshev(b, point) <= radius)
      .map(b => b.id)
    : [];
  return { units, buildings };
}

export const CombatResolver = {
  /** Actions left, point on the map and within attack range. */
  canStrike(state: WorldState, attacker: Striker, x: number, y: number): boolean {
    return attacker.actionsRemaining > 0
      && WorldMap.inBounds(state.map, x, y)
      && MathUtils.chebyshev(attacker, { x, y }) <= attacker.attackRange;
  },

  /**
   * Unit attack on a point. Returns undefined (nothing changed) when the
   * unit cannot strike there. An empty point still spends the action.
   */
  unitAttack(draft: Draft<WorldState>, team: Team, attackerId: number, x: number, y: number): AttackReport | undefined {
    const attacker = draft.units[team][attackerId];
    if (!attacker || !CombatResolver.canStrike(draft, attacker, x, y)) return undefined;

    const enemy = opposingTeam(team);
    const targets = collect(draft, enemy, { x, y }, attacker.damageRange, true);
    attacker.actionsRemaining -= 1;

    const damage = attacker.damage;
    const destroyed: number[] = [];
    const survivors: number[] = [];
    for (const id of targets.units) {
      if (EntityRegistry.damage(draft, id, damage)) destroyed.push(id);
      else survivors.push(id);
    }
    for (const id of targets.buildings) {
      if (EntityRegistry.damage(draft, id, damage)) destroyed.push(id);
    }

    let retaliation = 0;
    let attackerDestroyed = false;
    for (const id of survivors) {
      const defender = draft.units[enemy][id];
      if (!defender) continue;
      retaliation += defender.defense;
      if (EntityRegistry.damage(draft, attackerId, defender.defense)) {
        attackerDestroyed = true;
        break;
      }
    }

    const hit = [...targets.units, ...targets.buildings];
    Logger.log(
      `${team} unit #${attackerId} strikes (${x}, ${y}): ${hit.length} hit, ${destroyed.length} destroyed` +
        (attackerDestroyed ? `, attacker lost to retaliation` : ''),
      'combat',
    );
    return { hit, destroyed, retaliation, attackerDestroyed };
  },

  /** Building attack on a point. Hits units only and takes no retaliation. */
  buildingAttack(draft: Draft<WorldState>, team: Team, buildingId: number, x: number, y: number): AttackReport | undefined {
    const building = draft.buildings[team][buildingId];
    if (!building || !CombatResolver.canStrike(draft, building, x, y)) return undefined;

    const targets = collect(draft, opposingTeam(team), { x, y }, building.damageRange, false);
    building.actionsRemaining -= 1;

    const destroyed = targets.units.filter(id => EntityRegistry.damage(draft, id, building.damage));
    Logger.log(
      `${team} building #${buildingId} strikes (${x}, ${y}): ${targets.units.length} hit, ${destroyed.length} destroyed`,
      'combat',
    );
    return { hit: targets.units, destroyed, retaliation: 0, attackerDestroyed: false };
  },
};
