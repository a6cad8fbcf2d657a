// ─────────────────────────────────────────────
//  Integration: Game Flow
//  Whole games through GameCoordinator, with in-process agents
//  and with agents hosted in worker threads.
// ─────────────────────────────────────────────

import { describe, it, expect, vi } from 'vitest';
import { performance } from 'node:perf_hooks';
import type { WorldMapInput } from '@/engine/systems/map/WorldMap';
import type { AgentFactory } from '@/engine/agent/Agent';
import type { GatewayHandle } from '@/engine/coordinator/ActionGateway';
import { GameCoordinator } from '@/engine/coordinator/GameCoordinator';
import { EventBus } from '@/engine/utils/EventBus';
import { IllegalArgumentError } from '@/engine/utils/errors';
import { idleAgent, scriptedAgent } from './helpers';

/** Two grass cells, the castles side by side. */
const DUEL_MAP: WorldMapInput = {
  terrain: [['grass', 'grass']],
  homeBases: { BLUE: { x: 0, y: 0 }, RED: { x: 1, y: 0 } },
};

const WORKER_TIMEOUT = 30_000;

function fixture(name: string): URL {
  return new URL(`../fixtures/agents/${name}`, import.meta.url);
}

/** Spawn one knight, then hit the enemy castle every turn. */
const knightRush = scriptedAgent(rc => {
  const [knight] = rc.getUnitIds(rc.getAllyTeam());
  if (knight === undefined) {
    rc.spawnUnit('KNIGHT', 0);
    return;
  }
  const [castle] = rc.getBuildingIds(rc.getEnemyTeam());
  if (castle !== undefined) rc.unitAttackBuilding(knight, castle);
});

const failingFactory: AgentFactory = () => {
  throw new Error('cannot start');
};

describe('Game flow', () => {
  it('a knight wears down the enemy castle', async () => {
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: knightRush, RED: idleAgent }, replayId: 'duel' });
    const result = await game.run();

    expect(result).toMatchObject({ winner: 'BLUE', reason: 'home_base_destroyed', rule: 'home_base_destroyed', turns: 31 });
    expect(result.replay.id).toBe('duel');
    expect(result.replay.winner).toBe('BLUE');
    expect(result.replay.turns).toHaveLength(31);
    expect(result.replay.turns[0]?.state.units.BLUE.map(u => u.type)).toEqual(['KNIGHT']);
    expect(result.replay.turns[1]?.state.buildings.RED[0]?.health).toBe(29);
    expect(result.replay.turns[30]?.state.buildings.RED).toEqual([]);
  });

  it('an agent that never settles forfeits on time', async () => {
    const red = vi.fn();
    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: {
        BLUE: scriptedAgent(() => new Promise<void>(() => undefined)),
        RED: scriptedAgent(red),
      },
      config: { initialTimePool: 0.05 },
    });
    const result = await game.run();

    expect(result).toMatchObject({ winner: 'RED', reason: 'forfeit', rule: null, turns: 1 });
    expect(red).toHaveBeenCalledOnce();
    expect(game.store.getState().timeRemaining.BLUE).toBe(0);
  });

  it('an agent whose turn never returns forfeits within that turn', async () => {
    const red = vi.fn();
    let turnStartedAt = 0;
    let waited = Number.POSITIVE_INFINITY;
    EventBus.on('turnStarted', () => { turnStartedAt = performance.now(); });
    EventBus.on('agentForfeited', () => { waited = (performance.now() - turnStartedAt) / 1000; });
    const forfeits = vi.fn();
    EventBus.on('agentForfeited', forfeits);

    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: { BLUE: { module: fixture('spinForever.ts'), exportName: 'spinForever' }, RED: scriptedAgent(red) },
      config: { initialTimePool: 0.25 },
    });
    const result = await game.run();

    expect(result).toMatchObject({ winner: 'RED', reason: 'forfeit', rule: null, turns: 1 });
    expect(forfeits).toHaveBeenCalledWith({ team: 'BLUE', turn: 1, status: 'timeout' });
    expect(red).toHaveBeenCalledOnce();
    expect(waited).toBeGreaterThanOrEqual(0.25);
    expect(waited).toBeLessThan(1.5);
    expect(result.replay.turns).toHaveLength(1);
    expect(result.replay.turns[0]?.state.timeRemaining.BLUE).toBe(0);
  }, WORKER_TIMEOUT);

  it('plays a worker-hosted agent through the gateway', async () => {
    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: { BLUE: { module: fixture('knightRush.ts') }, RED: idleAgent },
    });
    const result = await game.run();

    expect(result).toMatchObject({ winner: 'BLUE', reason: 'home_base_destroyed', turns: 31 });
    expect(result.replay.turns[0]?.state.units.BLUE.map(u => u.type)).toEqual(['KNIGHT']);
    expect(result.replay.turns[1]?.state.buildings.RED[0]?.health).toBe(29);
  }, WORKER_TIMEOUT);

  it('a worker-hosted agent that throws forfeits', async () => {
    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: { BLUE: idleAgent, RED: { module: fixture('faulty.ts'), exportName: 'throwsOnTurn' } },
    });
    const result = await game.run();
    expect(result).toMatchObject({ winner: 'BLUE', reason: 'forfeit', turns: 1 });
  }, WORKER_TIMEOUT);

  it('a worker-hosted agent that cannot start loses before turn 1', async () => {
    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: { BLUE: { module: fixture('faulty.ts'), exportName: 'failsToStart' }, RED: idleAgent },
    });
    const result = await game.run();
    expect(result).toMatchObject({ winner: 'RED', reason: 'init_failure', turns: 0 });
  }, WORKER_TIMEOUT);

  it('a failed initialisation loses before turn 1', async () => {
    const red = vi.fn();
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: failingFactory, RED: scriptedAgent(red) } });
    const result = await game.run();

    expect(result).toMatchObject({ winner: 'RED', reason: 'init_failure', rule: null, turns: 0 });
    expect(result.replay.turns).toHaveLength(1);
    expect(red).not.toHaveBeenCalled();
  });

  it('two failed initialisations leave no winner', async () => {
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: failingFactory, RED: failingFactory } });
    const result = await game.run();
    expect(result.winner).toBeNull();
    expect(result.replay.winner).toBeNull();
  });

  it('idle agents play to the turn limit', async () => {
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: idleAgent, RED: idleAgent }, config: { turnLimit: 3 } });
    const result = await game.run();
    expect(result).toMatchObject({ winner: 'RED', reason: 'turn_limit', rule: 'second_mover', turns: 3 });
    expect(result.replay.turns.map(r => r.turn)).toEqual([1, 2, 3]);
    expect(game.store.getState().balance).toEqual({ BLUE: 13, RED: 13 });
  });

  it('hands each agent a private copy of the map', async () => {
    const vandal: AgentFactory = map => {
      const row = map.terrain[0];
      if (row) row[1] = 'water';
      return { playTurn: () => undefined };
    };
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: vandal, RED: idleAgent }, config: { turnLimit: 1 } });
    await game.run();
    expect(game.store.getState().map.terrain[0]).toEqual(['grass', 'grass']);
  });

  it('exposes nothing but the gateway methods to agents', async () => {
    let seen: GatewayHandle | undefined;
    const game = new GameCoordinator({
      map: DUEL_MAP,
      agents: { BLUE: scriptedAgent(rc => { seen = rc; }), RED: idleAgent },
      config: { turnLimit: 1 },
    });
    await game.run();
    expect(seen).toBeDefined();
    expect(Object.getOwnPropertyNames(seen)).toEqual([]);
  });

  it('runs only once', async () => {
    const game = new GameCoordinator({ map: DUEL_MAP, agents: { BLUE: idleAgent, RED: idleAgent }, config: { turnLimit: 1 } });
    const first = await game.run();
    expect(await game.run()).toBe(first);
  });

  it('rejects a ragged map', () => {
    expect(() => new GameCoordinator({
      map: { terrain: [['grass', 'grass'], ['grass']], homeBases: DUEL_MAP.homeBases },
      agents: { BLUE: idleAgent, RED: idleAgent },
    })).toThrow(IllegalArgumentError);
  });
});
