// ─────────────────────────────────────────────
//  Agent worker entry
//  Loads the agent module, builds the agent from its factory and
//  plays each requested turn against a RemoteGateway.
// ─────────────────────────────────────────────

import { parentPort, workerData } from 'node:worker_threads';
import type { Agent } from './Agent';
import type { AgentWorkerData, TurnRequest, WorkerReport } from './GatewayProtocol';
import { isAgent } from './Agent';
import { toErrorInfo } from './GatewayProtocol';
import { RemoteGateway } from './RemoteGateway';
import { GameError } from '../utils/errors';

const data: AgentWorkerData = workerData;
const gateway = new RemoteGateway(data.calls, data.signal);

function report(message: WorkerReport): void {
  parentPort?.postMessage(message);
}

async function loadAgent(): Promise<Agent> {
  const exports: Record<string, unknown> = await import(data.moduleUrl);
  const factory = exports[data.exportName];
  if (typeof factory !== 'function') {
    throw new GameError(`${data.moduleUrl} has no agent factory named "${data.exportName}"`);
  }
  const agent: unknown = factory(data.map);
  if (!isAgent(agent)) throw new GameError(`Factory "${data.exportName}" did not return an agent`);
  return agent;
}

async function playTurn(agent: Agent, turn: number): Promise<WorkerReport> {
  try {
    await agent.playTurn(gateway);
    return { type: 'settled', turn };
  } catch (error) {
    return { type: 'failed', turn, error: toErrorInfo(error) };
  }
}

loadAgent().then(
  agent => {
    parentPort?.on('message', (request: TurnRequest) => {
      playTurn(agent, request.turn).then(report, (error: unknown) => {
        report({ type: 'failed', turn: request.turn, error: toErrorInfo(error) });
      });
    });
    report({ type: 'settled', turn: 0 });
  },
  (error: unknown) => report({ type: 'failed', turn: 0, error: toErrorInfo(error) }),
);
