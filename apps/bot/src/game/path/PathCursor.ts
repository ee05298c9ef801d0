import type { Point, PortError } from '@waymark/shared';

export type CursorResult = { ok: true } | { ok: false; error: PortError };

/**
 * Position within a flattened waypoint path, as seen by the controller.
 * `reset` is optional: cursors without it simply halt when exhausted.
 */
export interface WaypointCursor {
	readonly waypoints: readonly Point[];
	advance(): Point | null;
	currentIndex(): number | null;
	currentPoint(): Point | null;
	setIndex(index: number): CursorResult;
	isExhausted(): boolean;
	reset?(): void;
}

export class PathCursor implements WaypointCursor {
	readonly waypoints: readonly Point[];
	private index: number | null = null;

	constructor(flatPath: readonly Point[]) {
		this.waypoints = [...flatPath];
	}

	get length(): number {
		return this.waypoints.length;
	}

	advance(): Point | null {
		const next = this.index === null ? 0 : this.index + 1;
		if (next >= this.waypoints.length) return null;
		this.index = next;
		return this.waypoints[next];
	}

	currentIndex(): number | null {
		return this.index;
	}

	currentPoint(): Point | null {
		return this.index === null ? null : this.waypoints[this.index];
	}

	setIndex(index: number): CursorResult {
		if (!Number.isInteger(index) || index < 0 || index >= this.waypoints.length) {
			return {
				ok: false,
				error: { code: 'REJECTED', message: `Index ${index} outside 0..${this.waypoints.length - 1}` },
			};
		}
		this.index = index;
		return { ok: true };
	}

	// True once the final waypoint has been handed out
	isExhausted(): boolean {
		return this.waypoints.length === 0 || this.index === this.waypoints.length - 1;
	}

	reset(): void {
		this.index = null;
	}
}
