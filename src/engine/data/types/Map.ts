// ─────────────────────────────────────────────
//  Map / Direction Types
// ─────────────────────────────────────────────

import type { TerrainKey } from './Terrain';
import type { Team } from './Team';

export interface Pos {
  x: number;
  y: number;
}

// ── Directions ────────────────────────────────────────────────────

export const DIRECTION_KEYS = [
  'UP', 'DOWN', 'LEFT', 'RIGHT',
  'UP_LEFT', 'UP_RIGHT', 'DOWN_LEFT', 'DOWN_RIGHT',
  'STAY',
] as const;

export type DirectionKey = typeof DIRECTION_KEYS[number];

const DIRECTION_KEY_SET: ReadonlySet<string> = new Set(DIRECTION_KEYS);

export interface Direction {
  dx: number;
  dy: number;
}

export const DIRECTIONS: Readonly<Record<DirectionKey, Readonly<Direction>>> = {
  UP:         { dx:  0, dy:  1 },
  DOWN:       { dx:  0, dy: -1 },
  LEFT:       { dx: -1, dy:  0 },
  RIGHT:      { dx:  1, dy:  0 },
  UP_LEFT:    { dx: -1, dy:  1 },
  UP_RIGHT:   { dx:  1, dy:  1 },
  DOWN_LEFT:  { dx: -1, dy: -1 },
  DOWN_RIGHT: { dx:  1, dy: -1 },
  STAY:       { dx:  0, dy:  0 },
};

export function isDirectionKey(value: unknown): value is DirectionKey {
  return typeof value === 'string' && DIRECTION_KEY_SET.has(value);
}

// ── MapData ───────────────────────────────────────────────────────

export interface MapData {
  width: number;
  height: number;
  /** Row-major: terrain[y][x] */
  terrain: TerrainKey[][];
  /** Home-base (main castle) coordinates per team */
  homeBases: Record<Team, Pos>;
}
