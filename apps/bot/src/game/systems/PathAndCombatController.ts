import type { ActionPort, EntityId, HostileContact, MovementPort, Point, SensingPort } from '@waymark/shared';
import {
	ARRIVAL_TOLERANCE,
	COMBAT_REACH_RATIO,
	DEFAULT_AGGRO_RANGE,
	EARLY_ADVANCE_RATIO,
	SCAN_INTERVAL_MS,
	SCAN_MOVE_RATIO,
	STATS_INTERVAL_MS,
	clamp,
	distance,
	formatPoint,
	nearestIndex,
	roundPoint,
	samePoint,
} from '@waymark/shared';
import type { WaypointCursor } from '../path/PathCursor';
import { ThrottledScanner } from './ThrottledScanner';

export type ControllerMode = 'path' | 'combat';

export interface DebugOverride {
	forcedIndex: number | null;
	held: boolean; // auto-advance suspended until releaseHold()
}

export interface ControllerPorts {
	movement: MovementPort;
	sensing: SensingPort;
	actions: ActionPort;
}

export interface ControllerOptions {
	aggroRange?: number;
	arrivalTolerance?: number;
	earlyAdvanceDist?: number;
	combatReachDist?: number;
	scanIntervalMs?: number;
	scanMoveThreshold?: number;
	statsIntervalMs?: number;
	logActions?: boolean;
}

export interface ControllerStats {
	enemyFetches: number;
	scanFailures: number;
	changeTargetCalls: number;
	moveCalls: number;
}

const NO_WAYPOINTS = 'No waypoints available.';

/**
 * Walks a flattened waypoint path and breaks off to engage hostiles that
 * come into aggro range. `tick` is the only per-frame entry point; every
 * other public method is the debug/UI control surface.
 */
export class PathAndCombatController {
	readonly aggroRange: number;
	readonly arrivalTolerance: number;
	readonly earlyAdvanceDist: number;
	readonly combatReachDist: number;
	readonly statsIntervalMs: number;
	readonly logActions: boolean;

	private readonly movement: MovementPort;
	private readonly sensing: SensingPort;
	private readonly actions: ActionPort;
	private readonly scanner: ThrottledScanner;

	private modeValue: ControllerMode = 'path';
	private status = 'Waiting to begin...';

	// ── Path state ────────────────────────────────────────────────────
	private currentPathPoint: Point | null = null;
	private resyncPending = false; // re-issue the move to the cursor's point once movement is idle
	private readonly override: DebugOverride = { forcedIndex: null, held: false };
	private lastPlayerPos: Point | null = null;

	// ── Combat state ──────────────────────────────────────────────────
	private currentTarget: HostileContact | null = null;
	private lastTargetId: EntityId | null = null;
	private lastMoveTarget: Point | null = null;
	private lastEnemyCheckAt: number | null = null;

	// ── Command statistics ────────────────────────────────────────────
	private changeTargetCalls = 0;
	private moveCalls = 0;
	private statsWindowStart: number | null = null;

	constructor(
		private readonly cursor: WaypointCursor,
		ports: ControllerPorts,
		options: ControllerOptions = {}
	) {
		this.movement = ports.movement;
		this.sensing = ports.sensing;
		this.actions = ports.actions;

		this.aggroRange = options.aggroRange ?? DEFAULT_AGGRO_RANGE;
		this.arrivalTolerance = options.arrivalTolerance ?? ARRIVAL_TOLERANCE;
		this.earlyAdvanceDist = options.earlyAdvanceDist ?? this.arrivalTolerance * EARLY_ADVANCE_RATIO;
		this.combatReachDist = options.combatReachDist ?? this.arrivalTolerance * COMBAT_REACH_RATIO;
		this.statsIntervalMs = options.statsIntervalMs ?? STATS_INTERVAL_MS;
		this.logActions = options.logActions ?? false;

		this.scanner = new ThrottledScanner(this.sensing, {
			aggroRange: this.aggroRange,
			scanIntervalMs: options.scanIntervalMs ?? SCAN_INTERVAL_MS,
			moveThreshold: options.scanMoveThreshold ?? this.aggroRange * SCAN_MOVE_RATIO,
		});
	}

	get mode(): ControllerMode {
		return this.modeValue;
	}

	get statusMessage(): string {
		return this.status;
	}

	get isHolding(): boolean {
		return this.override.held;
	}

	get debugOverride(): Readonly<DebugOverride> {
		return { ...this.override };
	}

	get target(): HostileContact | null {
		return this.currentTarget;
	}

	get lastEnemyCheck(): number | null {
		return this.lastEnemyCheckAt;
	}

	// --------------------------------------------------------------------------
	// ⚙️ TICK
	// --------------------------------------------------------------------------

	tick(now: number, playerPos: Point): string {
		this.lastPlayerPos = playerPos;
		this.maybeLogStats(now);

		if (this.cursor.waypoints.length === 0) {
			this.status = NO_WAYPOINTS;
			return this.status;
		}

		if (this.modeValue === 'path') {
			const scan = this.scanner.scan(now, playerPos);
			if (scan.target) {
				this.enterCombat(scan.target, now);
			} else {
				this.advanceToNextPoint(playerPos);
			}
		} else {
			this.updateCombat(now, playerPos);
		}

		return this.status;
	}

	/** Final waypoint handed out and reached. */
	isPathComplete(): boolean {
		// Nothing to walk means nothing left to walk
		if (this.cursor.waypoints.length === 0) return true;
		return this.cursor.isExhausted() && this.movement.arrived;
	}

	getStats(): ControllerStats {
		return {
			enemyFetches: this.scanner.fetches,
			scanFailures: this.scanner.failures,
			changeTargetCalls: this.changeTargetCalls,
			moveCalls: this.moveCalls,
		};
	}

	/** Forget combat, overrides and cached scans; the cursor is left to its owner. */
	reset(): void {
		this.modeValue = 'path';
		this.currentPathPoint = null;
		this.resyncPending = false;
		this.override.forcedIndex = null;
		this.override.held = false;
		this.clearCombat();
		this.lastEnemyCheckAt = null;
		this.scanner.reset();
		this.changeTargetCalls = 0;
		this.moveCalls = 0;
		this.statsWindowStart = null;
		this.status = 'Waiting to begin...';
	}

	// --------------------------------------------------------------------------
	// 🛠️ DEBUG CONTROL SURFACE
	// --------------------------------------------------------------------------

	getWaypoints(): readonly Point[] {
		return this.cursor.waypoints;
	}

	getCurrentIndex(): number | null {
		const wps = this.cursor.waypoints;
		if (wps.length === 0) return null;
		if (this.override.forcedIndex !== null) return clamp(this.override.forcedIndex, 0, wps.length - 1);

		const idx = this.cursor.currentIndex();
		if (idx !== null) return idx;

		const point = this.currentPathPoint;
		if (point) {
			const found = wps.findIndex((wp) => samePoint(wp, point));
			if (found >= 0) return found;
		}
		return this.lastPlayerPos ? nearestIndex(wps, this.lastPlayerPos) : null;
	}

	// Falls back to the waypoint nearest the player before the first move
	getCurrentWaypoint(): Point | null {
		if (this.currentPathPoint) return this.currentPathPoint;
		const wps = this.cursor.waypoints;
		if (!this.lastPlayerPos) return null;
		const idx = nearestIndex(wps, this.lastPlayerPos);
		return idx === null ? null : wps[idx];
	}

	enableHold(): void {
		this.override.held = true;
	}

	releaseHold(): void {
		this.override.held = false;
		this.override.forcedIndex = null;
	}

	forceMoveToIndex(index: number, sticky = true): boolean {
		const wps = this.cursor.waypoints;
		if (wps.length === 0) {
			this.status = NO_WAYPOINTS;
			return false;
		}

		const idx = this.clampIndex(index);
		this.override.forcedIndex = idx;
		if (sticky) this.enableHold();

		this.movement.stop();
		this.resyncPending = false;
		const label = `[DEBUG] Forced move -> ${this.describeWaypoint(idx)}${this.override.held ? ' [HOLD]' : ''}`;
		const moved = this.commandWaypoint(idx, label);

		// Consumed unless it still has to be replayed once path mode resumes
		if (moved && this.modeValue === 'path') this.override.forcedIndex = null;
		this.logAction(this.status, 'warn');
		return moved;
	}

	/** Reposition the cursor without a move; the next idle tick resumes toward it. */
	setActiveIndex(index: number): boolean {
		const wps = this.cursor.waypoints;
		if (wps.length === 0) {
			this.status = NO_WAYPOINTS;
			return false;
		}

		const idx = this.clampIndex(index);
		this.cursor.setIndex(idx);
		this.releaseHold();
		this.currentPathPoint = wps[idx];
		this.movement.stop();
		this.movement.arrived = false;
		this.resyncPending = true;
		this.status = `[DEBUG] Set active index to ${idx + 1}/${wps.length}`;
		this.logAction(this.status);
		return true;
	}

	seekRelative(delta: number, sticky = true): boolean {
		const wps = this.cursor.waypoints;
		if (wps.length === 0) {
			this.status = 'No waypoints to seek.';
			return false;
		}
		const current = this.getCurrentIndex() ?? 0;
		const step = Number.isFinite(delta) ? Math.trunc(delta) : 0;
		return this.forceMoveToIndex(current + step, sticky);
	}

	// Debug input may be anything; a non-finite index falls back to the first waypoint
	private clampIndex(index: number): number {
		if (!Number.isFinite(index)) return 0;
		return clamp(Math.trunc(index), 0, this.cursor.waypoints.length - 1);
	}

	// --------------------------------------------------------------------------
	// 🧭 PATH MODE
	// --------------------------------------------------------------------------

	private advanceToNextPoint(pos: Point): void {
		const wps = this.cursor.waypoints;

		if (this.override.forcedIndex !== null) {
			const idx = clamp(this.override.forcedIndex, 0, wps.length - 1);
			const label = this.override.held
				? `[DEBUG] Holding at ${this.describeWaypoint(idx)} [HOLD]`
				: `[DEBUG] Moving to ${this.describeWaypoint(idx)}`;
			this.override.forcedIndex = null;
			this.commandWaypoint(idx, label);
			return;
		}

		if (this.override.held) {
			const idx = this.getCurrentIndex();
			this.status = idx === null ? '[DEBUG] Holding [HOLD]' : `[DEBUG] Holding at ${this.describeWaypoint(idx)} [HOLD]`;
			return;
		}

		if (!this.movement.isFollowing()) {
			this.startNextLeg(pos);
		} else {
			this.followCurrentLeg(pos);
		}
	}

	private startNextLeg(pos: Point): void {
		if (this.resyncPending) {
			this.resyncPending = false;
			const idx = this.cursor.currentIndex();
			if (idx !== null) {
				this.commandWaypoint(idx, `Resuming to ${this.describeWaypoint(idx)}`);
				return;
			}
		}

		let next = this.advancePastReached(pos);
		let resetRetry = false;
		if (!next) {
			if (!this.cursor.reset) {
				this.halt();
				return;
			}
			this.logAction('Path exhausted, resetting cursor and retrying once', 'warn');
			this.cursor.reset();
			next = this.advancePastReached(pos);
			resetRetry = true;
			if (!next) {
				this.halt();
				return;
			}
		}

		const idx = this.cursor.currentIndex() ?? 0;
		this.commandWaypoint(idx, `${resetRetry ? 'Path reset -> moving to' : 'Moving to'} ${this.describeWaypoint(idx)}`);
		this.logAction(this.status);
	}

	// Waypoints the player already stands on are passed over; the last one is always kept
	private advancePastReached(pos: Point): Point | null {
		let next = this.cursor.advance();
		while (next && distance(pos, next) <= this.arrivalTolerance) {
			const after = this.cursor.advance();
			if (!after) break;
			next = after;
		}
		return next;
	}

	private followCurrentLeg(pos: Point): void {
		const target = this.currentPathPoint;
		if (!target) {
			this.status = 'Lost current waypoint, recovering...';
			this.movement.stop();
			return;
		}

		const dist = distance(pos, target);
		const areaClear = this.scanner.knownTarget === null;

		// Fluid advance when clear; otherwise only once actually at the point
		if ((areaClear && dist <= this.earlyAdvanceDist) || dist <= this.arrivalTolerance) {
			if (!this.advanceIndexAndMove()) this.markArrived();
			return;
		}

		const idx = this.getCurrentIndex();
		this.status = idx === null
			? `Moving to ${formatPoint(target)}`
			: `Moving to ${this.describeWaypoint(idx)}, ${Math.round(dist)} away`;
	}

	private advanceIndexAndMove(): boolean {
		const cur = this.cursor.currentIndex();
		if (cur === null) return false;
		const next = cur + 1;
		if (next >= this.cursor.waypoints.length) return false;

		this.commandWaypoint(next, `Flowing to next ${this.describeWaypoint(next)}`);
		this.logAction(this.status);
		return true;
	}

	private advanceIndexOnly(): boolean {
		const cur = this.cursor.currentIndex();
		if (cur === null) return false;
		const next = cur + 1;
		if (next >= this.cursor.waypoints.length) return false;

		const result = this.cursor.setIndex(next);
		if (!result.ok) return false;
		this.currentPathPoint = this.cursor.waypoints[next];
		this.movement.arrived = false;
		this.resyncPending = true;
		return true;
	}

	private commandWaypoint(idx: number, label: string): boolean {
		const point = this.cursor.waypoints[idx];
		this.cursor.setIndex(idx);
		this.currentPathPoint = point;
		this.movement.arrived = false;

		const result = this.movement.moveTo(point);
		if (!result.ok) {
			// Retry the same point on the next idle tick
			this.movement.stop();
			this.resyncPending = true;
			this.status = `Move to ${formatPoint(point)} failed: ${result.error.message}`;
			console.warn(`⚠️ ${this.status}`);
			return false;
		}

		this.status = label;
		return true;
	}

	private markArrived(): void {
		this.movement.stop();
		this.movement.arrived = true;
		this.status = 'Arrived at final waypoint.';
		this.logAction(this.status);
	}

	private halt(): void {
		this.movement.stop();
		this.status = 'No valid next waypoint! Pathing halted.';
		this.logAction(this.status, 'warn');
	}

	// --------------------------------------------------------------------------
	// ⚔️ COMBAT MODE
	// --------------------------------------------------------------------------

	private enterCombat(target: HostileContact, now: number): void {
		this.currentTarget = target;
		this.lastEnemyCheckAt = now;
		this.modeValue = 'combat';
		this.status = 'Switching to combat mode.';
		this.logAction(`Switching to COMBAT mode (target ${target.id})`, 'warn');
	}

	private updateCombat(now: number, pos: Point): void {
		// Keep path progress while fighting in place
		const wp = this.currentPathPoint;
		if (wp && !this.override.held && distance(pos, wp) <= this.combatReachDist) {
			if (this.advanceIndexOnly()) this.status = 'Marked waypoint reached during combat.';
		}

		const latched = this.currentTarget;
		if (!latched) {
			this.leaveCombat('Combat done. Switching to path mode.', true);
			return;
		}

		const lookup = this.sensing.getHostile(latched.id);
		if (!lookup.ok) {
			console.warn(`⚠️ Target lookup failed (${lookup.error.code}): ${lookup.error.message}`);
			this.leaveCombat('Enemy fetch failed. Returning to path.', true);
			return;
		}
		if (!lookup.value || !lookup.value.alive) {
			this.leaveCombat('Combat done. Switching to path mode.', true);
			return;
		}

		const scan = this.scanner.scan(now, pos);
		if (!scan.target) {
			this.leaveCombat('No enemies in range (throttled scan). Returning to path.');
			return;
		}

		let live: HostileContact | null = lookup.value;
		if (scan.target.id !== latched.id) {
			const swap = this.sensing.getHostile(scan.target.id);
			live = swap.ok ? swap.value : null;
		}
		if (!live || !live.alive) {
			this.leaveCombat('Enemy fetch failed. Returning to path.', true);
			return;
		}
		this.currentTarget = live;
		this.lastEnemyCheckAt = now;

		if (live.id !== this.lastTargetId) {
			const changed = this.actions.changeTarget(live.id);
			if (!changed.ok) {
				console.warn(`⚠️ Target change rejected: ${changed.error.message}`);
				this.leaveCombat('Target change failed. Returning to path.');
				return;
			}
			this.changeTargetCalls++;
			this.lastTargetId = live.id;
		}

		const dest = roundPoint(live.position);
		if (!this.lastMoveTarget || !samePoint(dest, this.lastMoveTarget)) {
			const moved = this.actions.move(dest);
			if (!moved.ok) {
				console.warn(`⚠️ Combat move rejected: ${moved.error.message}`);
				this.leaveCombat('Combat move failed. Returning to path.');
				return;
			}
			this.moveCalls++;
			this.lastMoveTarget = dest;
		}

		this.status = `Closing in on enemy at ${formatPoint(dest)}`;
	}

	private leaveCombat(message: string, staleScan = false): void {
		this.modeValue = 'path';
		this.clearCombat();
		if (staleScan) this.scanner.invalidate();
		this.status = message;
		this.logAction(message);
	}

	// Command de-duplication is per engagement
	private clearCombat(): void {
		this.currentTarget = null;
		this.lastTargetId = null;
		this.lastMoveTarget = null;
	}

	// --------------------------------------------------------------------------
	// 📊 LOGGING
	// --------------------------------------------------------------------------

	private maybeLogStats(now: number): void {
		if (this.statsWindowStart === null) {
			this.statsWindowStart = now;
			return;
		}
		const elapsed = now - this.statsWindowStart;
		if (elapsed < this.statsIntervalMs) return;

		console.log(
			`📊 [Stats over ${Math.round(elapsed / 1000)}s] fetches=${this.scanner.fetches}, ` +
				`changeTarget=${this.changeTargetCalls}, move=${this.moveCalls}`
		);
		this.scanner.resetCounters();
		this.changeTargetCalls = 0;
		this.moveCalls = 0;
		this.statsWindowStart = now;
	}

	private describeWaypoint(idx: number): string {
		const wps = this.cursor.waypoints;
		return `wp ${idx + 1}/${wps.length} ${formatPoint(wps[idx])}`;
	}

	private logAction(message: string, level: 'info' | 'warn' = 'info'): void {
		if (!this.logActions) return;
		if (level === 'warn') {
			console.warn(`🧭 ${message}`);
		} else {
			console.log(`🧭 ${message}`);
		}
	}
}
