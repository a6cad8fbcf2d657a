// ─────────────────────────────────────────────
//  AgentRunner
//  Runs one agent callback under a wall-clock budget.
//  The callback starts on its own macrotask and is raced
//  against a timer; on timeout the runner stops waiting but
//  cannot stop the callback itself. The timer can only fire
//  while this thread is free: agents that may never yield
//  belong in a WorkerAgent.
// ─────────────────────────────────────────────

import { performance } from 'node:perf_hooks';
import { Logger } from '@/engine/utils/Logger';
import { describeError } from '@/engine/utils/errors';

export type AgentTurnStatus = 'completed' | 'threw' | 'timeout';

export interface AgentTurnResult {
  status: AgentTurnStatus;
  /** Wall-clock seconds from start to settle (or to the deadline) */
  elapsedSeconds: number;
  error?: unknown;
}

export type AgentTask = () => void | Promise<void>;

export interface AgentRunner {
  run(task: AgentTask, budgetSeconds: number): Promise<AgentTurnResult>;
}

export class InProcessAgentRunner implements AgentRunner {
  async run(task: AgentTask, budgetSeconds: number): Promise<AgentTurnResult> {
    if (!(budgetSeconds > 0)) return { status: 'timeout', elapsedSeconds: 0 };

    const started = performance.now();
    const elapsed = (): number => (performance.now() - started) / 1000;

    const execution = new Promise<void>((resolve, reject) => {
      setImmediate(() => {
        try {
          Promise.resolve(task()).then(resolve, reject);
        } catch (error) {
          reject(error);
        }
      });
    });

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), budgetSeconds * 1000);
    });

    try {
      const outcome = await Promise.race([execution.then(() => 'completed' as const), deadline]);
      if (outcome === 'timeout') {
        execution.catch((error: unknown) => {
          Logger.log(`Abandoned agent task failed after its deadline: ${describeError(error)}`, 'debug');
        });
        return { status: 'timeout', elapsedSeconds: elapsed() };
      }
      return { status: 'completed', elapsedSeconds: elapsed() };
    } catch (error) {
      return { status: 'threw', elapsedSeconds: elapsed(), error };
    } finally {
      clearTimeout(timer);
    }
  }
}
