import type {
	ActionPort,
	EntityId,
	HostileContact,
	MovementPort,
	Point,
	PortResult,
	SensingPort,
	WorldPort,
} from '@waymark/shared';
import { distance, formatPoint, portError, portOk } from '@waymark/shared';
import { stepToward } from './motion';
import { SpatialGrid } from './SpatialGrid';

// CONFIG: defaults for the in-process host
const DEFAULT_SPEED = 400; // units per second
const DEFAULT_STOP_RADIUS = 20;
const DEFAULT_LOADING_MS = 2000;
const DEFAULT_HOSTILE_HP = 100;
const DEFAULT_PLAYER_DPS = 50;
const DEFAULT_ATTACK_RANGE = 300;
const DEFAULT_CELL_SIZE = 1000;
const DEFAULT_PORTAL_RADIUS = 150;

interface SimHostile {
	id: EntityId;
	position: Point;
	hp: number;
}

export interface Portal {
	position: Point;
	zoneId: number;
	radius?: number;
	spawn?: Point; // where the player appears inside the zone
}

export interface SimulatedWorldOptions {
	start?: Point;
	locationId?: number;
	speed?: number;
	stopRadius?: number;
	loadingMs?: number;
	portal?: Portal;
	buffSource?: boolean;
	playerDps?: number;
	attackRange?: number;
	dangerRange?: number; // hostiles this close put the player in danger; 0 disables
	cellSize?: number;
}

/**
 * In-process host implementing every port the bot consumes: follow
 * movement, a grid-indexed hostile set, attrition damage, zone loading and
 * a buff source. Advanced explicitly with `step`.
 */
export class SimulatedWorld implements MovementPort, SensingPort, ActionPort, WorldPort {
	arrived = false;
	sensingOnline = true;

	private position: Point;
	private followTarget: Point | null = null;
	private directTarget: Point | null = null;
	private movementPaused = false;

	private locationId: number;
	private explorable = false;
	private loadingUntil: number | null = null;
	private clock = 0;

	private buffed = false;
	private buffRequestCount = 0;
	private targetId: EntityId | null = null;

	private readonly hostiles = new Map<EntityId, SimHostile>();
	private readonly grid: SpatialGrid<SimHostile>;
	private nextHostileId = 1;

	private readonly speed: number;
	private readonly stopRadius: number;
	private readonly loadingMs: number;
	private readonly spawn: Point;
	private readonly portal: Portal | null;
	private readonly buffSource: boolean;
	private readonly playerDps: number;
	private readonly attackRange: number;
	private readonly dangerRange: number;

	constructor(options: SimulatedWorldOptions = {}) {
		this.spawn = options.start ?? { x: 0, y: 0 };
		this.position = this.spawn;
		this.locationId = options.locationId ?? 0;
		this.speed = options.speed ?? DEFAULT_SPEED;
		this.stopRadius = options.stopRadius ?? DEFAULT_STOP_RADIUS;
		this.loadingMs = options.loadingMs ?? DEFAULT_LOADING_MS;
		this.portal = options.portal ?? null;
		this.buffSource = options.buffSource ?? true;
		this.playerDps = options.playerDps ?? DEFAULT_PLAYER_DPS;
		this.attackRange = options.attackRange ?? DEFAULT_ATTACK_RANGE;
		this.dangerRange = options.dangerRange ?? 0;
		this.grid = new SpatialGrid(options.cellSize ?? DEFAULT_CELL_SIZE);
	}

	// ---- Simulation ----

	step(deltaMs: number, now: number): void {
		this.clock = now;
		if (this.loadingUntil !== null && now >= this.loadingUntil) this.loadingUntil = null;
		if (this.isLoading()) return;

		const deltaTime = deltaMs / 1000;
		this.updateMovement(deltaTime);
		this.checkPortal();
		this.processAttrition(deltaTime);
		this.grid.rebuild(this.aliveHostiles());
	}

	addHostile(position: Point, hp = DEFAULT_HOSTILE_HP): EntityId {
		const id = this.nextHostileId++;
		this.hostiles.set(id, { id, position, hp });
		this.grid.rebuild(this.aliveHostiles());
		return id;
	}

	moveHostile(id: EntityId, position: Point): void {
		const hostile = this.hostiles.get(id);
		if (!hostile) return;
		hostile.position = position;
		this.grid.rebuild(this.aliveHostiles());
	}

	killHostile(id: EntityId): void {
		const hostile = this.hostiles.get(id);
		if (hostile) this.defeat(hostile);
	}

	setPlayerPosition(position: Point): void {
		this.position = position;
	}

	get currentTargetId(): EntityId | null {
		return this.targetId;
	}

	get buffRequests(): number {
		return this.buffRequestCount;
	}

	private aliveHostiles(): SimHostile[] {
		return [...this.hostiles.values()].filter((h) => h.hp > 0);
	}

	private updateMovement(deltaTime: number): void {
		if (this.movementPaused) return;

		// Direct moves (engaging) take priority over the follow target
		if (this.directTarget) {
			const step = stepToward(this.position, this.directTarget, this.speed, deltaTime, this.stopRadius);
			this.position = step.position;
			if (step.reached) this.directTarget = null;
			return;
		}

		if (!this.followTarget) return;
		const step = stepToward(this.position, this.followTarget, this.speed, deltaTime, this.stopRadius);
		this.position = step.position;
		if (step.reached) {
			this.followTarget = null;
			this.arrived = true;
		}
	}

	private checkPortal(): void {
		const portal = this.portal;
		if (!portal || this.explorable) return;
		if (distance(this.position, portal.position) > (portal.radius ?? DEFAULT_PORTAL_RADIUS)) return;

		console.log(`🌀 Entering zone ${portal.zoneId}`);
		this.locationId = portal.zoneId;
		this.explorable = true;
		this.position = portal.spawn ?? this.position;
		this.followTarget = null;
		this.directTarget = null;
		this.loadingUntil = this.clock + this.loadingMs;
	}

	private processAttrition(deltaTime: number): void {
		const damage = this.playerDps * deltaTime;
		for (const hostile of this.aliveHostiles()) {
			const dist = distance(this.position, hostile.position);
			const engaged = hostile.id === this.targetId && dist <= this.attackRange;
			const threatening = this.dangerRange > 0 && dist <= this.dangerRange;
			if (!engaged && !threatening) continue;

			hostile.hp = Math.max(0, hostile.hp - damage);
			if (hostile.hp <= 0) this.defeat(hostile);
		}
	}

	private defeat(hostile: SimHostile): void {
		hostile.hp = 0;
		if (this.targetId === hostile.id) this.targetId = null;
		this.grid.rebuild(this.aliveHostiles());
		console.log(`💀 Hostile ${hostile.id} defeated at ${formatPoint(hostile.position)}`);
	}

	private toContact(hostile: SimHostile): HostileContact {
		return { id: hostile.id, position: hostile.position, alive: hostile.hp > 0 };
	}

	// ---- MovementPort ----

	moveTo(point: Point): PortResult<void> {
		if (this.isLoading()) return portError('UNAVAILABLE', 'Zone is loading');
		this.followTarget = point;
		this.directTarget = null;
		this.arrived = false;
		return portOk(undefined);
	}

	isFollowing(): boolean {
		return this.followTarget !== null;
	}

	stop(): void {
		this.followTarget = null;
	}

	reset(): void {
		this.followTarget = null;
		this.directTarget = null;
		this.arrived = false;
		this.movementPaused = false;
	}

	pause(): void {
		this.movementPaused = true;
	}

	resume(): void {
		this.movementPaused = false;
	}

	// ---- SensingPort ----

	nearbyHostiles(position: Point, radius: number): PortResult<HostileContact[]> {
		if (!this.sensingOnline) return portError('UNAVAILABLE', 'Sensing offline');
		return portOk(this.grid.query(position, radius).map((h) => this.toContact(h)));
	}

	getHostile(id: EntityId): PortResult<HostileContact | null> {
		if (!this.sensingOnline) return portError('UNAVAILABLE', 'Sensing offline');
		const hostile = this.hostiles.get(id);
		return portOk(hostile ? this.toContact(hostile) : null);
	}

	// ---- ActionPort ----

	changeTarget(id: EntityId): PortResult<void> {
		const hostile = this.hostiles.get(id);
		if (!hostile || hostile.hp <= 0) return portError('INVALID_TARGET', `No live hostile ${id}`);
		this.targetId = id;
		return portOk(undefined);
	}

	move(point: Point): PortResult<void> {
		if (this.isLoading()) return portError('UNAVAILABLE', 'Zone is loading');
		this.directTarget = point;
		return portOk(undefined);
	}

	// ---- WorldPort ----

	playerPosition(): Point {
		return this.position;
	}

	currentLocationId(): number {
		return this.locationId;
	}

	travelTo(locationId: number): void {
		if (this.isLoading()) return;
		console.log(`🧳 Travelling to location ${locationId}`);
		this.locationId = locationId;
		this.explorable = false;
		this.buffed = false;
		this.position = this.spawn;
		this.followTarget = null;
		this.directTarget = null;
		this.loadingUntil = this.clock + this.loadingMs;
	}

	isLoading(): boolean {
		return this.loadingUntil !== null && this.clock < this.loadingUntil;
	}

	isExplorable(): boolean {
		return this.explorable;
	}

	inDanger(): boolean {
		if (this.dangerRange <= 0) return false;
		return this.grid.query(this.position, this.dangerRange).length > 0;
	}

	hasBuff(): boolean {
		return this.buffed;
	}

	buffAvailable(): boolean {
		return this.buffSource;
	}

	requestBuff(): void {
		this.buffRequestCount++;
		if (this.buffSource && !this.isLoading()) this.buffed = true;
	}
}
