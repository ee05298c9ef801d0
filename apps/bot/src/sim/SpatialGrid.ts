import type { Point } from '@waymark/shared';

export interface GridEntry {
  id: number;
  position: Point;
}

// Simple uniform grid to avoid scanning every entity per query
export class SpatialGrid<T extends GridEntry> {
  private readonly buckets = new Map<string, T[]>();

  constructor(readonly cellSize: number) {}

  private cell(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private key(cx: number, cy: number): string {
    return `${cx}:${cy}`;
  }

  rebuild(entries: Iterable<T>): void {
    this.buckets.clear();
    for (const entry of entries) {
      const k = this.key(this.cell(entry.position.x), this.cell(entry.position.y));
      const list = this.buckets.get(k);
      if (list) {
        list.push(entry);
      } else {
        this.buckets.set(k, [entry]);
      }
    }
  }

  /** Entries within `radius` of `center` (inclusive), ordered by id. */
  query(center: Point, radius: number): T[] {
    const result: T[] = [];
    const r2 = radius * radius;
    for (let cx = this.cell(center.x - radius); cx <= this.cell(center.x + radius); cx++) {
      for (let cy = this.cell(center.y - radius); cy <= this.cell(center.y + radius); cy++) {
        const list = this.buckets.get(this.key(cx, cy));
        if (!list) continue;
        for (const entry of list) {
          const dx = entry.position.x - center.x;
          const dy = entry.position.y - center.y;
          if (dx * dx + dy * dy <= r2) result.push(entry);
        }
      }
    }
    return result.sort((a, b) => a.id - b.id);
  }
}
