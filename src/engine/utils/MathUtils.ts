import type { Pos } from '@/engine/data/types/Map';
import { IllegalArgumentError } from './errors';

export const MathUtils = {
  /** Chebyshev (king-move) distance */
  chebyshev(a: Pos, b: Pos): number {
    return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
  },

  /** Whether `b` lies within a square of the given radius centred on `a`. */
  withinRadius(a: Pos, b: Pos, radius: number): boolean {
    if (radius < 0) throw new IllegalArgumentError(`Radius must be non-negative (got ${radius})`);
    return MathUtils.chebyshev(a, b) <= radius;
  },

  /** Clamp a value between min and max */
  clamp(v: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, v));
  },
};
