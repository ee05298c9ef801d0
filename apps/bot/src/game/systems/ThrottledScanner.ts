import type { HostileContact, Point, SensingPort } from '@waymark/shared';
import { DEFAULT_AGGRO_RANGE, SCAN_INTERVAL_MS, SCAN_MOVE_RATIO, distance } from '@waymark/shared';

export interface ScanResult {
	target: HostileContact | null;
	origin: Point; // player position the scan was taken from
	at: number;
}

export interface ScannerOptions {
	aggroRange?: number;
	scanIntervalMs?: number;
	moveThreshold?: number;
}

/**
 * Nearest live hostile within range, ties resolved by the order the port reports them.
 */
export function findNearestHostile(contacts: readonly HostileContact[], origin: Point, range: number): HostileContact | null {
	let nearest: HostileContact | null = null;
	let minDist = Infinity;
	for (const contact of contacts) {
		if (!contact.alive) continue;
		const d = distance(origin, contact.position);
		if (d > range) continue;
		if (d < minDist) {
			minDist = d;
			nearest = contact;
		}
	}
	return nearest;
}

/**
 * Wraps the sensing port with a distance-or-time gate. Between firings the
 * previous result is returned unchanged.
 */
export class ThrottledScanner {
	readonly aggroRange: number;
	readonly scanIntervalMs: number;
	readonly moveThreshold: number;

	private last: ScanResult | null = null;
	private fetchCount = 0;
	private failureCount = 0;

	constructor(
		private readonly sensing: SensingPort,
		options: ScannerOptions = {}
	) {
		this.aggroRange = options.aggroRange ?? DEFAULT_AGGRO_RANGE;
		this.scanIntervalMs = options.scanIntervalMs ?? SCAN_INTERVAL_MS;
		this.moveThreshold = options.moveThreshold ?? this.aggroRange * SCAN_MOVE_RATIO;
	}

	get cached(): ScanResult | null {
		return this.last;
	}

	// Target from the last firing; null when nothing is known
	get knownTarget(): HostileContact | null {
		return this.last?.target ?? null;
	}

	get fetches(): number {
		return this.fetchCount;
	}

	get failures(): number {
		return this.failureCount;
	}

	shouldFire(now: number, pos: Point): boolean {
		if (!this.last) return true;
		if (distance(pos, this.last.origin) >= this.moveThreshold) return true;
		return now - this.last.at >= this.scanIntervalMs;
	}

	scan(now: number, pos: Point): ScanResult {
		if (this.last && !this.shouldFire(now, pos)) {
			return this.last;
		}

		this.fetchCount++;
		const response = this.sensing.nearbyHostiles(pos, this.aggroRange);
		let target: HostileContact | null = null;
		if (response.ok) {
			target = findNearestHostile(response.value, pos, this.aggroRange);
		} else {
			// Transient: treat as a quiet area for this scan
			this.failureCount++;
			console.warn(`⚠️ Hostile scan failed (${response.error.code}): ${response.error.message}`);
		}

		this.last = { target, origin: { x: pos.x, y: pos.y }, at: now };
		return this.last;
	}

	// Forces the next scan to fire, e.g. once a cached target is known dead
	invalidate(): void {
		this.last = null;
	}

	resetCounters(): void {
		this.fetchCount = 0;
		this.failureCount = 0;
	}

	reset(): void {
		this.invalidate();
		this.resetCounters();
	}
}
