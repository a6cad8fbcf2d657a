import { describe, it, expect, afterEach } from 'vitest';
import type { AgentModule } from '@/engine/agent/Agent';
import { WorkerAgent } from '@/engine/agent/WorkerAgent';
import { ActionGateway } from '@/engine/coordinator/ActionGateway';
import { AgentFault } from '@/engine/utils/errors';
import { buildStore, grassMap } from '../integration/helpers';

const WORKER_TIMEOUT = 30_000;

const started: WorkerAgent[] = [];

function start(source: AgentModule): WorkerAgent {
  const agent = new WorkerAgent(source, grassMap());
  started.push(agent);
  return agent;
}

function fixture(name: string): URL {
  return new URL(`../fixtures/agents/${name}`, import.meta.url);
}

afterEach(async () => {
  await Promise.all(started.splice(0).map(agent => agent.release()));
});

describe('WorkerAgent', () => {
  it('plays a turn through the gateway from its own thread', async () => {
    const store = buildStore();
    const agent = start({ module: fixture('knightRush.ts') });
    await agent.ready(10);
    await agent.playTurn(new ActionGateway(store, 'BLUE'));

    const state = store.getState();
    expect(state.units.BLUE[2]).toMatchObject({ type: 'KNIGHT', x: 0, y: 0 });
    expect(state.balance.BLUE).toBe(9);
  }, WORKER_TIMEOUT);

  it('accepts a plain file path', async () => {
    const store = buildStore();
    const agent = start({ module: fixture('knightRush.ts').pathname });
    await agent.ready(10);
    await agent.playTurn(new ActionGateway(store, 'RED'));
    expect(Object.values(store.getState().units.RED).map(u => u.type)).toEqual(['KNIGHT']);
  }, WORKER_TIMEOUT);

  it('rethrows gateway argument errors inside the worker', async () => {
    const store = buildStore();
    const agent = start({ module: fixture('gatewayErrors.ts') });
    await agent.ready(10);
    await agent.playTurn(new ActionGateway(store, 'BLUE'));
    expect(store.getState().units.BLUE[2]?.type).toBe('KNIGHT');
  }, WORKER_TIMEOUT);

  it('fails to start when the factory throws', async () => {
    const agent = start({ module: fixture('faulty.ts'), exportName: 'failsToStart' });
    await expect(agent.ready(10)).rejects.toThrow(AgentFault);
    await expect(start({ module: fixture('faulty.ts'), exportName: 'failsToStart' }).ready(10))
      .rejects.toThrow('Error: cannot start');
  }, WORKER_TIMEOUT);

  it('fails to start without a usable factory', async () => {
    await expect(start({ module: fixture('faulty.ts'), exportName: 'missing' }).ready(10))
      .rejects.toThrow('has no agent factory named "missing"');
    await expect(start({ module: fixture('faulty.ts'), exportName: 'notAnAgent' }).ready(10))
      .rejects.toThrow('Factory "notAnAgent" did not return an agent');
  }, WORKER_TIMEOUT);

  it('fails to start when the deadline passes first', async () => {
    const agent = start({ module: fixture('knightRush.ts') });
    await expect(agent.ready(0)).rejects.toThrow('did not start within 0 s');
  }, WORKER_TIMEOUT);

  it('rejects a turn that throws', async () => {
    const agent = start({ module: fixture('faulty.ts'), exportName: 'throwsOnTurn' });
    await agent.ready(10);
    await expect(agent.playTurn(new ActionGateway(buildStore(), 'BLUE'))).rejects.toThrow('Error: agent bug');
  }, WORKER_TIMEOUT);

  it('leaves a turn that never returns pending until released', async () => {
    const agent = start({ module: fixture('spinForever.ts'), exportName: 'spinForever' });
    await agent.ready(10);

    const turn = agent.playTurn(new ActionGateway(buildStore(), 'BLUE')).then(() => 'settled');
    const pause = new Promise<string>(resolve => setTimeout(() => resolve('pending'), 200));
    expect(await Promise.race([turn, pause])).toBe('pending');

    await agent.release();
  }, WORKER_TIMEOUT);
});
