import type { AgentFactory } from '@/engine/agent/Agent';

export const failsToStart: AgentFactory = () => {
  throw new Error('cannot start');
};

export const throwsOnTurn: AgentFactory = () => ({
  playTurn() {
    throw new Error('agent bug');
  },
});

export const notAnAgent = (): unknown => ({ act: () => undefined });
