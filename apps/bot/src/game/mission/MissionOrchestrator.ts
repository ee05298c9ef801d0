import { BUFF_DWELL_MS, LOAD_DWELL_MS, RALLY_RADIUS, distance } from '@waymark/shared';
import { StateMachine } from '../fsm/StateMachine';
import { followPath, isFollowPathFinished } from '../path/followPath';
import type { RunStatsSnapshot } from '../state/RunStats';
import type { ControllerMode } from '../systems/PathAndCombatController';
import type { MissionContext } from './MissionContext';

export interface OrchestratorOptions {
	rallyRadius?: number;
	logTransitions?: boolean;
	loop?: boolean; // start the next run as soon as one completes
}

export interface MissionSnapshot {
	running: boolean;
	paused: boolean;
	missionState: string | null;
	dangerState: string | null;
	mode: ControllerMode;
	status: string;
	currentIndex: number | null;
	waypointCount: number;
	holding: boolean;
	combatStarted: boolean;
	stats: RunStatsSnapshot;
}

/**
 * Wires the mission flow (travel, load, outpost walk, buff, path-and-combat)
 * and the always-on danger watch that pauses it.
 */
export class MissionOrchestrator {
	readonly mission = new StateMachine('Mission');
	readonly danger = new StateMachine('Danger Watch');
	readonly interrupt = new StateMachine('Danger: Interrupt');
	readonly rallyRadius: number;
	readonly loop: boolean;

	private running = false;
	private paused = false;

	constructor(
		private readonly ctx: MissionContext,
		options: OrchestratorOptions = {}
	) {
		this.rallyRadius = options.rallyRadius ?? RALLY_RADIUS;
		this.loop = options.loop ?? false;

		const log = options.logTransitions ?? false;
		this.mission.setLogBehavior(log);
		this.danger.setLogBehavior(log);
		this.interrupt.setLogBehavior(log);

		this.buildDangerWatch();
		this.buildMission();
	}

	get isRunning(): boolean {
		return this.running;
	}

	get isPaused(): boolean {
		return this.paused;
	}

	// ---- 🧠 STATE MACHINES ----

	private buildMission(): void {
		const { world, movement } = this.ctx.ports;
		const { startLocationId } = this.ctx.map.definition.ids;

		this.mission
			.addState('Travel To Start', {
				execute: () => {
					if (world.currentLocationId() !== startLocationId) world.travelTo(startLocationId);
				},
				exitCondition: () => world.currentLocationId() === startLocationId && !world.isLoading(),
				transitionDelayMs: LOAD_DWELL_MS,
			})
			.addState('Wait For Load', {
				exitCondition: () => !world.isLoading(),
				transitionDelayMs: LOAD_DWELL_MS,
			})
			.addState('Navigate Outpost', {
				execute: () => followPath(this.ctx.outpostCursor, movement),
				exitCondition: () => isFollowPathFinished(this.ctx.outpostCursor, movement) || world.isExplorable(),
				runOnce: false,
			})
			.addState('Wait For Explorable Load', {
				exitCondition: () => !world.isLoading() && world.isExplorable(),
				transitionDelayMs: LOAD_DWELL_MS,
			})
			.addState('Initial Rally Buff', {
				execute: () => world.requestBuff(),
				exitCondition: () => world.hasBuff() || world.isLoading() || !world.buffAvailable(),
				transitionDelayMs: BUFF_DWELL_MS,
			})
			.addState('Combat and Movement', {
				execute: (now) => this.runCombatAndMovement(now),
				exitCondition: () => this.ctx.controller.isPathComplete(),
				runOnce: false,
			});
	}

	private buildDangerWatch(): void {
		const { world } = this.ctx.ports;

		this.interrupt
			.addState('Hold Until Safe', {
				exitCondition: () => !world.inDanger(),
				runOnce: false,
			})
			.addState('Stand Down', {
				execute: () => this.stopCombat(),
			});

		this.danger
			.addState('Check: In Danger', {
				execute: () => this.pauseAll(),
				exitCondition: () => world.inDanger(),
				runOnce: false,
			})
			.addSubroutine('Danger: Interrupt', () => world.inDanger(), this.interrupt)
			.addState('Resume Mission', {
				execute: () => this.resumeAll(),
				exitCondition: () => !world.inDanger(),
				runOnce: false,
			});
	}

	private runCombatAndMovement(now: number): void {
		const { world } = this.ctx.ports;
		const pos = world.playerPosition();

		// At most one rally point is tracked per tick
		for (const point of this.ctx.map.rallyPoints) {
			if (this.ctx.rallyTrigger.isConfirmed(point)) continue;
			if (distance(pos, point) < this.rallyRadius) {
				this.ctx.rallyTrigger.check(point, now, pos, this.rallyRadius);
				break;
			}
		}

		this.ctx.controller.tick(now, pos);
	}

	// Both run from guards evaluated every tick, so repeated calls must be harmless
	private pauseAll(): void {
		if (!this.ctx.ports.world.inDanger()) return;
		if (!this.mission.isPaused()) {
			console.warn('🛡️ Danger detected, pausing mission');
			this.mission.pause();
		}
		this.ctx.combatStarted = true;
		this.ctx.ports.movement.pause();
	}

	private resumeAll(): void {
		if (this.ctx.ports.world.inDanger()) return;
		if (this.mission.isPaused()) {
			console.log('✅ Danger cleared, resuming mission');
			this.mission.resume();
		}
		this.ctx.ports.movement.resume();
	}

	private stopCombat(): void {
		this.ctx.combatStarted = false;
	}

	// ---- 🎮 RUN CONTROLS ----

	start(now: number): void {
		this.resetEnvironment();
		this.mission.reset();
		this.danger.reset();

		this.running = true;
		this.paused = false;
		this.ctx.stats.beginRun(now);

		this.mission.start();
		this.danger.start();
		console.log(`🚀 Run ${this.ctx.stats.runsAttempted} started on ${this.ctx.map.definition.name}`);
	}

	stop(): void {
		if (!this.running) return;
		this.running = false;
		this.paused = false;
		this.mission.stop();
		this.danger.stop();
		this.ctx.stats.abandonRun();
		this.resetEnvironment();
		console.log('⏹️ Run stopped');
	}

	pause(): void {
		if (!this.running || this.paused) return;
		this.paused = true;
		this.mission.pause();
		this.danger.pause();
		this.ctx.ports.movement.pause();
		console.log('⏸️ Bot paused');
	}

	resume(): void {
		if (!this.running || !this.paused) return;
		this.paused = false;
		this.mission.resume();
		this.danger.resume();
		this.ctx.ports.movement.resume();
		console.log('▶️ Bot resumed');
	}

	togglePause(): void {
		if (this.paused) {
			this.resume();
		} else {
			this.pause();
		}
	}

	tick(now: number): void {
		if (!this.running || this.paused) return;

		if (this.ctx.ports.world.isLoading()) {
			this.ctx.ports.movement.reset();
			return;
		}

		if (this.danger.isFinished()) {
			this.danger.reset();
			this.danger.start();
		}

		// Danger first so a pause lands before the mission body runs
		this.danger.update(now);
		this.mission.update(now);

		if (this.mission.isFinished()) this.completeRun(now);
	}

	snapshot(): MissionSnapshot {
		const { controller } = this.ctx;
		return {
			running: this.running,
			paused: this.paused,
			missionState: this.mission.getCurrentStateName(),
			dangerState: this.danger.getCurrentStateName(),
			mode: controller.mode,
			status: controller.statusMessage,
			currentIndex: controller.getCurrentIndex(),
			waypointCount: controller.getWaypoints().length,
			holding: controller.isHolding,
			combatStarted: this.ctx.combatStarted,
			stats: this.ctx.stats.snapshot(),
		};
	}

	private completeRun(now: number): void {
		const lap = this.ctx.stats.completeRun(now);
		const rate = this.ctx.stats.successRate.toFixed(1);
		console.log(`🏁 Run complete${lap === null ? '' : ` in ${(lap / 1000).toFixed(1)}s`} (success rate ${rate}%)`);

		this.running = false;
		this.mission.stop();
		this.danger.stop();
		this.ctx.ports.movement.stop();

		if (this.loop) this.start(now);
	}

	private resetEnvironment(): void {
		const { ctx } = this;
		ctx.outpostCursor.reset();
		ctx.explorableCursor.reset();
		ctx.rallyTrigger.reset();
		ctx.controller.reset();
		ctx.ports.movement.reset();
		ctx.combatStarted = false;
	}
}
