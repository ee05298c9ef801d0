import type { Point } from '../types/map';

export function distance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

export function clamp(n: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, n));
}

export function roundPoint(p: Point): Point {
  return { x: Math.round(p.x), y: Math.round(p.y) };
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function pointKey(p: Point): string {
  return `${p.x},${p.y}`;
}

export function formatPoint(p: Point): string {
  const r = roundPoint(p);
  return `(${r.x}, ${r.y})`;
}

/**
 * Index of the point closest to `p`, or null for an empty list.
 * Ties keep the earliest index.
 */
export function nearestIndex(points: readonly Point[], p: Point): number | null {
  let best: number | null = null;
  let minDist = Infinity;
  for (let i = 0; i < points.length; i++) {
    const d = distance(points[i], p);
    if (d < minDist) {
      minDist = d;
      best = i;
    }
  }
  return best;
}
