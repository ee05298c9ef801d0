import type { Point } from '@waymark/shared';
import { distance } from '@waymark/shared';

export interface StepResult {
	position: Point;
	reached: boolean;
}

/**
 * Move `from` toward `goal` at `speed` units per second. Snaps onto the goal
 * when this step would overshoot it or when already inside `stopRadius`.
 */
export function stepToward(from: Point, goal: Point, speed: number, deltaTime: number, stopRadius = 0): StepResult {
	const remaining = distance(from, goal);
	const travel = Math.max(0, speed * deltaTime);

	if (remaining <= stopRadius || remaining <= travel) {
		return { position: { x: goal.x, y: goal.y }, reached: true };
	}

	const ratio = travel / remaining;
	return {
		position: { x: from.x + (goal.x - from.x) * ratio, y: from.y + (goal.y - from.y) * ratio },
		reached: false,
	};
}
