// ─────────────────────────────────────────────
//  Terrain Types
// ─────────────────────────────────────────────

export const TERRAIN_KEYS = ['error', 'mountain', 'grass', 'sand', 'water', 'bridge'] as const;

/** `error` marks a cell the map source could not classify. */
export type TerrainKey = typeof TERRAIN_KEYS[number];

const TERRAIN_KEY_SET: ReadonlySet<string> = new Set(TERRAIN_KEYS);

export interface TerrainData {
  key: TerrainKey;
  name: string;
  /** Movement points spent to enter (or stay on) this tile */
  moveCost: number;
}

export function isTerrainKey(value: unknown): value is TerrainKey {
  return typeof value === 'string' && TERRAIN_KEY_SET.has(value);
}
