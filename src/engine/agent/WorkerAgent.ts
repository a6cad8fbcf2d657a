// ─────────────────────────────────────────────
//  WorkerAgent
//  Hosts an agent module in its own worker thread. The engine's
//  thread stays free while the agent plays, so the runner's
//  deadline fires even for a turn that never yields. A timed-out
//  turn is abandoned, not stopped: the worker keeps running and
//  its gateway calls are still served until the agent is released.
// ─────────────────────────────────────────────

import { MessageChannel, Worker } from 'node:worker_threads';
import type { MessagePort } from 'node:worker_threads';
import { resolve as resolvePath } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Agent, AgentModule } from './Agent';
import type { AgentWorkerData, GatewayCall, GatewayReply, TurnRequest, WorkerReport } from './GatewayProtocol';
import type { MapData } from '@/engine/data/types/Map';
import type { GatewayHandle } from '@/engine/coordinator/ActionGateway';
import { REPLY_READY, toErrorInfo } from './GatewayProtocol';
import { ActionGateway } from '@/engine/coordinator/ActionGateway';
import { AgentFault, GameError, IllegalArgumentError, describeError } from '@/engine/utils/errors';
import { Logger } from '@/engine/utils/Logger';

const WORKER_ENTRY = new URL('./agentWorker.ts', import.meta.url);

/** Workers load TypeScript sources through tsx */
const WORKER_EXEC_ARGV = ['--import', 'tsx'];

const GATEWAY_METHODS: ReadonlySet<string> = new Set(
  Object.getOwnPropertyNames(ActionGateway.prototype).filter(name => name !== 'constructor'),
);

function isGatewayMethod(name: unknown): name is keyof GatewayHandle {
  return typeof name === 'string' && GATEWAY_METHODS.has(name);
}

function moduleUrl(source: AgentModule): string {
  if (source.module instanceof URL) return source.module.href;
  return source.module.startsWith('file:') ? source.module : pathToFileURL(resolvePath(source.module)).href;
}

interface Waiter {
  turn: number;
  resolve: () => void;
  reject: (error: Error) => void;
}

export class WorkerAgent implements Agent {
  readonly #worker: Worker;
  readonly #calls: MessagePort;
  readonly #signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
  readonly #label: string;
  #gateway: GatewayHandle | null = null;
  #waiter: Waiter | null = null;
  #turn = 0;
  #stopped: Error | null = null;
  #released = false;

  /** Starts the worker; the agent is built there from the module's factory and a copy of `map`. */
  constructor(source: AgentModule, map: MapData) {
    const url = moduleUrl(source);
    const exportName = source.exportName ?? 'default';
    this.#label = `${url}#${exportName}`;

    const { port1, port2 } = new MessageChannel();
    this.#calls = port1;
    const workerData: AgentWorkerData = { moduleUrl: url, exportName, map, calls: port2, signal: this.#signal };
    this.#worker = new Worker(WORKER_ENTRY, { workerData, transferList: [port2], execArgv: WORKER_EXEC_ARGV });

    this.#worker.on('message', (report: WorkerReport) => this.#settle(report));
    this.#worker.on('error', error => this.#stop(error));
    this.#worker.on('exit', code => this.#stop(new AgentFault(`Agent worker exited with code ${code}`)));
    this.#calls.on('message', (call: GatewayCall) => this.#serve(call));
  }

  /** Resolves once the agent is built; rejects when the factory fails or the deadline passes. */
  ready(timeoutSeconds: number): Promise<void> {
    const started = this.#expect(0);
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new AgentFault(`${this.#label} did not start within ${timeoutSeconds} s`)),
        timeoutSeconds * 1000,
      );
    });
    return Promise.race([started, deadline]).finally(() => clearTimeout(timer));
  }

  playTurn(rc: GatewayHandle): Promise<void> {
    this.#gateway = rc;
    this.#turn += 1;
    const settled = this.#expect(this.#turn);
    const request: TurnRequest = { type: 'turn', turn: this.#turn };
    this.#worker.postMessage(request);
    return settled;
  }

  /** Stop the worker. Called once the game is over, when nothing it does can matter. */
  async release(): Promise<void> {
    if (this.#released) return;
    this.#released = true;
    this.#calls.close();
    await this.#worker.terminate();
  }

  #expect(turn: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.#stopped) {
        reject(this.#stopped);
        return;
      }
      this.#waiter = { turn, resolve, reject };
    });
  }

  #settle(report: WorkerReport): void {
    const waiter = this.#waiter;
    if (!waiter || waiter.turn !== report.turn) return;
    this.#waiter = null;
    if (report.type === 'settled') {
      waiter.resolve();
    } else {
      waiter.reject(new AgentFault(`${report.error.name}: ${report.error.message}`));
    }
  }

  #stop(error: Error): void {
    if (this.#released || this.#stopped) return;
    this.#stopped = error;
    Logger.log(`Agent worker ${this.#label} stopped: ${describeError(error)}`, 'debug');
    const waiter = this.#waiter;
    this.#waiter = null;
    waiter?.reject(error);
  }

  #serve(call: GatewayCall): void {
    let reply: GatewayReply<unknown>;
    try {
      const gateway = this.#gateway;
      if (!gateway) throw new GameError('The gateway is not available before the first turn');
      if (!isGatewayMethod(call.method)) throw new IllegalArgumentError(`Unknown gateway method "${String(call.method)}"`);
      if (!Array.isArray(call.args)) throw new IllegalArgumentError(`Arguments to ${call.method} must be an array`);
      reply = { ok: true, value: Reflect.apply(gateway[call.method], gateway, call.args) };
    } catch (error) {
      reply = { ok: false, error: toErrorInfo(error) };
    }
    this.#calls.postMessage(reply);
    Atomics.store(this.#signal, 0, REPLY_READY);
    Atomics.notify(this.#signal, 0);
  }
}
