import type { Point } from '@waymark/shared';
import { RALLY_DEBOUNCE_MS, distance, pointKey } from '@waymark/shared';

export type TriggerCheck = 'confirmed' | 'out-of-range' | 'armed' | 'waiting' | 'fired';

interface TriggerState {
	firstSeenAt: number | null;
	confirmed: boolean;
}

/**
 * Fires a one-time action per point once the player has been near it for
 * `debounceMs`. Confirmed points stay confirmed until `reset()`.
 */
export class ProximityTrigger {
	private readonly states = new Map<string, TriggerState>();

	constructor(
		private readonly action: (point: Point) => void,
		readonly debounceMs: number = RALLY_DEBOUNCE_MS
	) {}

	check(point: Point, now: number, playerPos: Point, radius: number): TriggerCheck {
		const key = pointKey(point);
		let state = this.states.get(key);
		if (state?.confirmed) return 'confirmed';
		if (distance(playerPos, point) >= radius) return 'out-of-range';

		if (!state || state.firstSeenAt === null) {
			state = { firstSeenAt: now, confirmed: false };
			this.states.set(key, state);
			return 'armed';
		}

		if (now - state.firstSeenAt < this.debounceMs) return 'waiting';

		state.confirmed = true;
		this.action(point);
		return 'fired';
	}

	isConfirmed(point: Point): boolean {
		return this.states.get(pointKey(point))?.confirmed ?? false;
	}

	reset(): void {
		this.states.clear();
	}
}
