import type { MovementPort } from '@waymark/shared';
import type { WaypointCursor } from './PathCursor';

/**
 * Plain waypoint walk without combat: hand the next point to the movement
 * driver whenever it goes idle.
 */
export function followPath(cursor: WaypointCursor, movement: MovementPort): void {
	if (movement.isFollowing()) return;

	const previous = cursor.currentIndex();
	const next = cursor.advance();
	if (!next) return;

	movement.arrived = false;
	const result = movement.moveTo(next);
	if (result.ok) return;

	console.warn(`⚠️ Follow move failed (${result.error.code}): ${result.error.message}`);
	// Step back so the same point is handed out again next time
	if (previous === null) {
		cursor.reset?.();
	} else {
		cursor.setIndex(previous);
	}
}

export function isFollowPathFinished(cursor: WaypointCursor, movement: MovementPort): boolean {
	return cursor.isExhausted() && !movement.isFollowing();
}
