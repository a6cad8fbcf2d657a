import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Pos } from '@/engine/data/types/Map';
import type { Team } from '@/engine/data/types/Team';
import { opposingTeam } from '@/engine/data/types/Team';
import { CombatResolver } from '@/engine/systems/combat/CombatResolver';

export type AttackTarget =
  | { kind: 'location'; x: number; y: number }
  | { kind: 'unit'; id: number }
  | { kind: 'building'; id: number };

/** Point an attack lands on; id targets must be live enemies. */
export function resolveTargetPoint(state: WorldState, team: Team, target: AttackTarget): Pos | undefined {
  const enemy = opposingTeam(team);
  switch (target.kind) {
    case 'location':
      return { x: target.x, y: target.y };
    case 'unit': {
      const unit = state.units[enemy][target.id];
      return unit ? { x: unit.x, y: unit.y } : undefined;
    }
    case 'building': {
      const building = state.buildings[enemy][target.id];
      return building ? { x: building.x, y: building.y } : undefined;
    }
    default:
      return undefined;
  }
}

export class UnitAttackAction implements GameAction {
  readonly type = 'UNIT_ATTACK';

  constructor(
    readonly team: Team,
    private readonly attackerId: number,
    private readonly target: AttackTarget,
  ) {}

  validate(state: WorldState): boolean {
    const attacker = state.units[this.team][this.attackerId];
    const point = resolveTargetPoint(state, this.team, this.target);
    return attacker !== undefined && point !== undefined
      && CombatResolver.canStrike(state, attacker, point.x, point.y);
  }

  execute(state: WorldState): WorldState {
    const point = resolveTargetPoint(state, this.team, this.target);
    if (!point) return state;
    return produce(state, draft => {
      CombatResolver.unitAttack(draft, this.team, this.attackerId, point.x, point.y);
    });
  }
}
