import type { AgentFactory } from '@/engine/agent/Agent';

/** Spawn one knight, then hit the enemy castle every turn. */
const knightRush: AgentFactory = () => ({
  playTurn(rc) {
    const [knight] = rc.getUnitIds(rc.getAllyTeam());
    if (knight === undefined) {
      rc.spawnUnit('KNIGHT', 0);
      return;
    }
    const [castle] = rc.getBuildingIds(rc.getEnemyTeam());
    if (castle !== undefined) rc.unitAttackBuilding(knight, castle);
  },
});

export default knightRush;
