// ─────────────────────────────────────────────
//  Agent contract
// ─────────────────────────────────────────────

import type { MapData } from '@/engine/data/types/Map';
import type { GatewayHandle } from '@/engine/coordinator/ActionGateway';

/** Player program. Called once per turn with its team's gateway. */
export interface Agent {
  playTurn(rc: GatewayHandle): void | Promise<void>;
}

/** Receives a private deep copy of the starting map. Throwing counts as an initialisation failure. */
export type AgentFactory = (map: MapData) => Agent;

/**
 * Module whose export is an AgentFactory. Such agents run in their own
 * worker thread, so a turn that never yields can still be timed out.
 */
export interface AgentModule {
  /** File path or file: URL */
  module: string | URL;
  /** Defaults to the module's default export */
  exportName?: string;
}

/** A factory runs in the engine's own thread and is trusted to yield. */
export type AgentSource = AgentFactory | AgentModule;

export function isAgentModule(source: AgentSource): source is AgentModule {
  return typeof source !== 'function';
}

export function isAgent(value: unknown): value is Agent {
  return typeof value === 'object' && value !== null && 'playTurn' in value && typeof value.playTurn === 'function';
}
