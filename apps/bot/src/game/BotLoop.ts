import { TICK_RATE } from '@waymark/shared';
import type { MissionOrchestrator } from './mission/MissionOrchestrator';

const STATUS_LOG_INTERVAL_MS = 5000;

/** Anything advanced in lockstep with the bot, e.g. the simulated host. */
export interface SteppableHost {
	step(deltaMs: number, now: number): void;
}

export interface BotLoopOptions {
	tickRate?: number;
	host?: SteppableHost;
	statusIntervalMs?: number; // 0 disables status lines
	clock?: () => number;
	onStopped?: () => void;
}

export class BotLoop {
	private readonly tickRate: number;
	private readonly host: SteppableHost | null;
	private readonly statusIntervalMs: number;
	private readonly clock: () => number;
	private readonly onStopped: (() => void) | null;
	private timer: NodeJS.Timeout | null = null;
	private lastTick = 0;
	private lastStatusLog = 0;
	private ticks = 0;

	constructor(
		private readonly orchestrator: MissionOrchestrator,
		options: BotLoopOptions = {}
	) {
		this.tickRate = options.tickRate ?? TICK_RATE;
		this.host = options.host ?? null;
		this.statusIntervalMs = options.statusIntervalMs ?? STATUS_LOG_INTERVAL_MS;
		this.clock = options.clock ?? Date.now;
		this.onStopped = options.onStopped ?? null;
	}

	get isRunning(): boolean {
		return this.timer !== null;
	}

	get tickCount(): number {
		return this.ticks;
	}

	start(): void {
		if (this.timer) return;
		this.lastTick = this.clock();
		this.lastStatusLog = this.lastTick;
		if (!this.orchestrator.isRunning) this.orchestrator.start(this.lastTick);

		console.log(`🤖 Bot loop started (${this.tickRate}ms ticks)`);
		this.timer = setInterval(() => this.step(), this.tickRate);
	}

	/** One tick: advance the host, then the bot. Also called directly by tests. */
	step(): void {
		const now = this.clock();
		const deltaMs = now - this.lastTick;
		this.lastTick = now;
		this.ticks++;

		try {
			this.host?.step(deltaMs, now);
			this.orchestrator.tick(now);
			this.maybeLogStatus(now);
		} catch (err) {
			console.error('❌ Bot tick failed, stopping loop:', err);
			this.stop();
			return;
		}

		if (!this.orchestrator.isRunning) {
			console.log('🏁 Mission finished, stopping loop');
			this.stop();
		}
	}

	stop(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
		console.log(`🛑 Bot loop stopped after ${this.ticks} ticks`);
		this.onStopped?.();
	}

	private maybeLogStatus(now: number): void {
		if (this.statusIntervalMs <= 0 || now - this.lastStatusLog < this.statusIntervalMs) return;
		this.lastStatusLog = now;

		const snap = this.orchestrator.snapshot();
		const index = snap.currentIndex === null ? '-' : String(snap.currentIndex + 1);
		console.log(
			`📍 [${snap.missionState ?? 'idle'}] ${snap.mode} wp ${index}/${snap.waypointCount}: ${snap.status}`
		);
	}
}
