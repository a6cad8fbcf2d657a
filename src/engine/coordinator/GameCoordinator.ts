// ─────────────────────────────────────────────
//  GameCoordinator
//  Wires map, store, agents, scheduler and replay recorder
//  for one game. Agents get a private copy of the map; module
//  agents are hosted in worker threads and released at the end.
// ─────────────────────────────────────────────

import type { GameConfig } from '@/config';
import type { Team } from '@/engine/data/types/Team';
import type { Agent, AgentSource } from '@/engine/agent/Agent';
import type { AgentRunner } from '@/engine/agent/AgentRunner';
import type { GameResult } from '@/engine/systems/turn/TurnScheduler';
import type { WorldMapInput } from '@/engine/systems/map/WorldMap';
import type { MapData } from '@/engine/data/types/Map';
import { resolveGameConfig } from '@/config';
import { isAgentModule } from '@/engine/agent/Agent';
import { WorkerAgent } from '@/engine/agent/WorkerAgent';
import { createWorldMap } from '@/engine/systems/map/WorldMap';
import { WorldStore } from '@/engine/state/WorldStore';
import { ReplayRecorder } from '@/engine/systems/replay/ReplayRecorder';
import { TurnScheduler } from '@/engine/systems/turn/TurnScheduler';
import { Logger } from '@/engine/utils/Logger';
import { describeError } from '@/engine/utils/errors';

export interface GameOptions {
  map: WorldMapInput;
  agents: Record<Team, AgentSource>;
  config?: Partial<GameConfig>;
  runner?: AgentRunner;
  /** Replay document id; a random UUID by default */
  replayId?: string;
}

export class GameCoordinator {
  readonly map: MapData;
  readonly store: WorldStore;
  readonly recorder: ReplayRecorder;
  readonly scheduler: TurnScheduler;
  private readonly workers: WorkerAgent[] = [];

  /** Throws IllegalArgumentError for an invalid map or config. */
  constructor(private readonly options: GameOptions) {
    const config = resolveGameConfig(options.config);
    this.map = createWorldMap(options.map);
    this.store = new WorldStore(this.map, config);
    this.recorder = new ReplayRecorder(this.map, options.replayId);
    this.scheduler = new TurnScheduler(this.store, this.recorder, options.runner);
  }

  /** Initialise both agents, then play to completion. */
  async run(): Promise<GameResult> {
    if (this.scheduler.outcome) return this.scheduler.outcome;

    try {
      const [blue, red] = await Promise.all([this.initAgent('BLUE'), this.initAgent('RED')]);
      if (!blue || !red) {
        const winner = blue ? 'BLUE' : red ? 'RED' : null;
        return this.scheduler.concludeWithoutPlay(winner);
      }

      Logger.log(`Game ${this.recorder.id} started on a ${this.map.width}x${this.map.height} map`, 'system');
      return await this.scheduler.run({ BLUE: blue, RED: red });
    } finally {
      await Promise.all(this.workers.map(worker => worker.release()));
    }
  }

  private async initAgent(team: Team): Promise<Agent | null> {
    const source = this.options.agents[team];
    try {
      if (!isAgentModule(source)) return source(structuredClone(this.map));
      const worker = new WorkerAgent(source, structuredClone(this.map));
      this.workers.push(worker);
      await worker.ready(this.store.getState().config.agentInitTimeout);
      return worker;
    } catch (error) {
      Logger.log(`${team} agent failed to initialise: ${describeError(error)}`, 'critical');
      return null;
    }
  }
}
