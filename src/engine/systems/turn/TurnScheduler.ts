// ─────────────────────────────────────────────
//  TurnScheduler
//  UPKEEP → ACT_FIRST → ACT_SECOND → TERMINATION_CHECK
//    → SNAPSHOT (loop) | GAME_OVER
//  Agents run strictly one after another, each bounded by its
//  team's remaining time pool.
// ─────────────────────────────────────────────

import type { WorldStore } from '@/engine/state/WorldStore';
import type { Team } from '@/engine/data/types/Team';
import type { Agent } from '@/engine/agent/Agent';
import type { AgentRunner } from '@/engine/agent/AgentRunner';
import type { ReplayDocument, ReplayRecorder } from '@/engine/systems/replay/ReplayRecorder';
import type { WinRule } from '@/engine/systems/stage/WinDeterminer';
import type { TurnPhase } from './TurnManager';
import { FIRST_MOVER, SECOND_MOVER, TEAMS, opposingTeam } from '@/engine/data/types/Team';
import { InProcessAgentRunner } from '@/engine/agent/AgentRunner';
import { ActionGateway } from '@/engine/coordinator/ActionGateway';
import { StateQuery } from '@/engine/state/WorldState';
import { EconomyLedger } from '@/engine/systems/economy/EconomyLedger';
import { WinDeterminer } from '@/engine/systems/stage/WinDeterminer';
import { Archetypes } from '@/engine/loader/ArchetypeLoader';
import { TurnManager } from './TurnManager';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { describeError } from '@/engine/utils/errors';

export type GameOverReason =
  | 'home_base_destroyed'
  | 'forfeit'          // exactly one agent threw or ran out of time
  | 'double_forfeit'
  | 'turn_limit'
  | 'init_failure';

export interface GameResult {
  /** null only when both agents failed to initialise */
  winner: Team | null;
  reason: GameOverReason;
  /** Cascade rule that decided the game; null when a forfeit or init failure decided it */
  rule: WinRule | null;
  /** Last turn played */
  turns: number;
  replay: ReplayDocument;
}

interface GameOverDecision {
  winner: Team | null;
  reason: GameOverReason;
  rule: WinRule | null;
}

export class TurnScheduler {
  readonly turnManager = new TurnManager();
  private readonly gateways: Record<Team, ActionGateway>;
  private result: GameResult | null = null;

  constructor(
    private readonly store: WorldStore,
    private readonly recorder: ReplayRecorder,
    private readonly runner: AgentRunner = new InProcessAgentRunner(),
  ) {
    this.gateways = {
      BLUE: new ActionGateway(store, 'BLUE'),
      RED: new ActionGateway(store, 'RED'),
    };
  }

  get outcome(): GameResult | null {
    return this.result;
  }

  gatewayFor(team: Team): ActionGateway {
    return this.gateways[team];
  }

  /** Play turns until the game ends. */
  async run(agents: Record<Team, Agent>): Promise<GameResult> {
    for (;;) {
      const result = await this.playTurn(agents);
      if (result) return result;
    }
  }

  /** Play one full turn. Returns the result when this turn ended the game, null otherwise. */
  async playTurn(agents: Record<Team, Agent>): Promise<GameResult | null> {
    if (this.result) return this.result;

    this.enter('UPKEEP');
    this.upkeep();

    const ok: Record<Team, boolean> = { BLUE: true, RED: true };
    this.enter('ACT_FIRST');
    ok[FIRST_MOVER] = await this.act(FIRST_MOVER, agents[FIRST_MOVER]);
    this.enter('ACT_SECOND');
    ok[SECOND_MOVER] = await this.act(SECOND_MOVER, agents[SECOND_MOVER]);

    this.enter('TERMINATION_CHECK');
    const decision = this.checkTermination(ok);
    if (decision) return this.finish(decision);

    this.enter('SNAPSHOT');
    this.recorder.record(this.store.getState());
    return null;
  }

  /** End the game before any turn is played (agent initialisation failure). */
  concludeWithoutPlay(winner: Team | null): GameResult {
    return this.finish({ winner, reason: 'init_failure', rule: null });
  }

  // ── Phases ──────────────────────────────────

  private enter(phase: TurnPhase): void {
    if (this.turnManager.transition(phase)) {
      this.store.apply(draft => { draft.phase = phase; });
    }
  }

  /** Turn counter, action/movement resets, income and time increment. */
  private upkeep(): void {
    this.store.apply(draft => {
      draft.turn += 1;
      for (const team of TEAMS) {
        for (const unit of Object.values(draft.units[team])) {
          const archetype = Archetypes.unit(unit.type);
          unit.actionsRemaining = archetype.actionsPerTurn;
          unit.movementRemaining = archetype.moveRange;
        }
        for (const building of Object.values(draft.buildings[team])) {
          building.actionsRemaining = Archetypes.building(building.type).actionsPerTurn;
        }
        draft.timeRemaining[team] += draft.config.timeIncrementPerTurn;
      }
      EconomyLedger.collectIncome(draft);
    });

    const turn = this.store.getState().turn;
    EventBus.emit('turnStarted', { turn });
    Logger.log(`─── Turn ${turn} ───`, 'system');
  }

  /** Run one agent. Returns false when the team forfeits this turn. */
  private async act(team: Team, agent: Agent): Promise<boolean> {
    const state = this.store.getState();
    const budget = state.timeRemaining[team];
    const gateway = this.gateways[team];

    const result = await this.runner.run(() => agent.playTurn(gateway), budget);
    if (result.status === 'completed' && result.elapsedSeconds < budget) {
      this.store.apply(draft => { draft.timeRemaining[team] -= result.elapsedSeconds; });
      return true;
    }

    const status = result.status === 'threw' ? 'threw' : 'timeout';
    this.store.apply(draft => { draft.timeRemaining[team] = 0; });
    Logger.log(
      `${team} forfeits on turn ${state.turn}: ` +
        (status === 'threw' ? describeError(result.error) : 'time pool exhausted'),
      'critical',
    );
    EventBus.emit('agentForfeited', { team, turn: state.turn, status });
    return false;
  }

  private checkTermination(ok: Record<Team, boolean>): GameOverDecision | null {
    const state = this.store.getState();
    const failed = TEAMS.filter(team => !ok[team]);
    const [firstFailed] = failed;

    if (failed.length > 1) {
      return { ...WinDeterminer.determineWinner(state), reason: 'double_forfeit' };
    }
    if (firstFailed !== undefined) {
      return { winner: opposingTeam(firstFailed), reason: 'forfeit', rule: null };
    }
    if (TEAMS.some(team => StateQuery.homeBase(state, team) === undefined)) {
      return { ...WinDeterminer.determineWinner(state), reason: 'home_base_destroyed' };
    }
    if (state.turn >= state.config.turnLimit) {
      return { ...WinDeterminer.determineWinner(state), reason: 'turn_limit' };
    }
    return null;
  }

  private finish(decision: GameOverDecision): GameResult {
    this.enter('GAME_OVER');
    const state = this.store.getState();
    this.recorder.record(state);
    this.recorder.annotateWinner(decision.winner);

    EventBus.emit('gameOver', { ...decision, turn: state.turn });
    Logger.log(
      `Game over on turn ${state.turn}: ${decision.winner ?? 'draw'} (${decision.reason}` +
        (decision.rule ? `, ${decision.rule}` : '') + ')',
      'system',
    );

    this.result = {
      winner: decision.winner,
      reason: decision.reason,
      rule: decision.rule,
      turns: state.turn,
      replay: this.recorder.toDocument(),
    };
    return this.result;
  }
}
