// ─────────────────────────────────────────────
//  Gateway protocol
//  Messages between the engine and an agent worker.
//  Turn control travels over the worker's own channel; gateway
//  calls travel over a dedicated port and block the worker on a
//  shared signal until the engine has replied.
// ─────────────────────────────────────────────

import type { MessagePort } from 'node:worker_threads';
import type { MapData } from '@/engine/data/types/Map';

export interface AgentWorkerData {
  moduleUrl: string;
  exportName: string;
  map: MapData;
  calls: MessagePort;
  /** Slot 0 is set to REPLY_READY once a reply has been posted */
  signal: Int32Array;
}

export const REPLY_PENDING = 0;
export const REPLY_READY = 1;

/** Engine → worker */
export interface TurnRequest {
  type: 'turn';
  turn: number;
}

/** Worker → engine. Turn 0 is initialisation. */
export type WorkerReport =
  | { type: 'settled'; turn: number }
  | { type: 'failed'; turn: number; error: RemoteErrorInfo };

export interface GatewayCall {
  method: string;
  args: unknown[];
}

export interface RemoteErrorInfo {
  name: string;
  message: string;
}

export type GatewayReply<T> =
  | { ok: true; value: T }
  | { ok: false; error: RemoteErrorInfo };

export function toErrorInfo(error: unknown): RemoteErrorInfo {
  if (error instanceof Error) return { name: error.name, message: error.message };
  return { name: 'Error', message: String(error) };
}
