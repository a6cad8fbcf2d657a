import { produce } from 'immer';
import type { GameAction } from '../GameAction';
import type { WorldState } from '../WorldState';
import type { Team } from '@/engine/data/types/Team';
import type { AttackTarget } from './UnitAttackAction';
import { resolveTargetPoint } from './UnitAttackAction';
import { CombatResolver } from '@/engine/systems/combat/CombatResolver';

/** Buildings can target units or points, never other buildings. */
export type BuildingAttackTarget = Exclude<AttackTarget, { kind: 'building' }>;

export class BuildingAttackAction implements GameAction {
  readonly type = 'BUILDING_ATTACK';

  constructor(
    readonly team: Team,
    private readonly buildingId: number,
    private readonly target: BuildingAttackTarget,
  ) {}

  validate(state: WorldState): boolean {
    const building = state.buildings[this.team][this.buildingId];
    const point = resolveTargetPoint(state, this.team, this.target);
    return building !== undefined && point !== undefined
      && CombatResolver.canStrike(state, building, point.x, point.y);
  }

  execute(state: WorldState): WorldState {
    const point = resolveTargetPoint(state, this.team, this.target);
    if (!point) return state;
    return produce(state, draft => {
      CombatResolver.buildingAttack(draft, this.team, this.buildingId, point.x, point.y);
    });
  }
}
