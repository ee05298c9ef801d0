import assert from 'assert';
import { describe, it } from 'node:test';
import type { Point } from '@waymark/shared';
import type { LoadedMap } from '../src/game/maps/MapLibrary';
import { createMissionContext } from '../src/game/mission/MissionContext';
import { MissionOrchestrator, type OrchestratorOptions } from '../src/game/mission/MissionOrchestrator';
import { SimulatedWorld } from '../src/sim/SimulatedWorld';
import { FakeWorld, createPorts } from './fakes';

function testMap(flatPath: Point[], outpostPath: Point[] = [], rallyPoints: Point[] = []): LoadedMap {
	return {
		definition: {
			name: 'Test Map',
			region: 'test',
			ids: { startLocationId: 5, destinationZoneId: 6 },
			outpostPath,
			path: flatPath,
		},
		flatPath,
		rallyPoints,
		warnings: [],
	};
}

function setup(locationId: number, options: OrchestratorOptions = {}) {
	const ports = createPorts();
	const world = new FakeWorld(locationId);
	const ctx = createMissionContext(
		{ ...ports, world },
		testMap([
			{ x: 0, y: 0 },
			{ x: 1000, y: 0 },
		])
	);
	const orchestrator = new MissionOrchestrator(ctx, options);
	return { ...ports, world, ctx, orchestrator };
}

describe('MissionOrchestrator', () => {
	it('walks the mission states in order and completes the run', () => {
		const { orchestrator, world, movement, ctx } = setup(5);
		const state = () => orchestrator.mission.getCurrentStateName();

		orchestrator.start(0);
		orchestrator.tick(0);
		assert.strictEqual(state(), 'Travel To Start');
		assert.deepStrictEqual(world.travels, []);

		orchestrator.tick(1000);
		assert.strictEqual(state(), 'Wait For Load');
		orchestrator.tick(1100);
		orchestrator.tick(2100);
		assert.strictEqual(state(), 'Navigate Outpost');

		// Empty outpost path is finished at once
		orchestrator.tick(2200);
		assert.strictEqual(state(), 'Wait For Explorable Load');

		world.explorable = true;
		orchestrator.tick(2300);
		orchestrator.tick(3300);
		assert.strictEqual(state(), 'Initial Rally Buff');

		world.buffed = true;
		orchestrator.tick(3400);
		assert.strictEqual(world.buffRequests, 1);
		orchestrator.tick(8399);
		assert.strictEqual(state(), 'Initial Rally Buff');
		orchestrator.tick(8400);
		assert.strictEqual(state(), 'Combat and Movement');

		orchestrator.tick(8500);
		assert.deepStrictEqual(movement.moves, [{ x: 1000, y: 0 }]);
		assert.strictEqual(orchestrator.isRunning, true);

		world.position = { x: 800, y: 0 };
		orchestrator.tick(8600);
		assert.strictEqual(orchestrator.isRunning, false);
		assert.strictEqual(ctx.stats.runsCompleted, 1);
		assert.deepStrictEqual(ctx.stats.lapHistory, [8600]);
		assert.strictEqual(orchestrator.snapshot().status, 'Arrived at final waypoint.');
	});

	it('finishes at once when the map yields no explorable waypoints', () => {
		const ports = createPorts();
		const world = new FakeWorld(5);
		world.explorable = true;
		world.buffed = true;
		const ctx = createMissionContext({ ...ports, world }, testMap([]));
		const orchestrator = new MissionOrchestrator(ctx);

		orchestrator.start(0);
		for (let t = 0; t <= 20_000 && orchestrator.isRunning; t += 100) {
			orchestrator.tick(t);
		}
		assert.strictEqual(orchestrator.isRunning, false);
		assert.deepStrictEqual(ctx.stats.lapHistory, [8500]);
		assert.strictEqual(orchestrator.snapshot().status, 'No waypoints available.');
		assert.deepStrictEqual(ports.movement.moves, []);
	});

	it('travels to the start location when elsewhere', () => {
		const { orchestrator, world } = setup(0);
		orchestrator.start(0);
		orchestrator.tick(0);
		assert.deepStrictEqual(world.travels, [5]);
		orchestrator.tick(100);
		assert.deepStrictEqual(world.travels, [5]);
	});

	it('skips the tick and resets movement while the world loads', () => {
		const { orchestrator, world, movement } = setup(0);
		orchestrator.start(0);
		const resetsAfterStart = movement.resets;

		world.loading = true;
		orchestrator.tick(100);
		assert.strictEqual(movement.resets, resetsAfterStart + 1);
		assert.deepStrictEqual(world.travels, []);
	});

	it('pauses the mission while in danger and resumes once safe', () => {
		const { orchestrator, world, movement, ctx } = setup(5);
		orchestrator.start(0);
		orchestrator.tick(100);

		world.danger = true;
		orchestrator.tick(200);
		assert.strictEqual(orchestrator.mission.isPaused(), true);
		assert.strictEqual(movement.paused, true);
		assert.strictEqual(ctx.combatStarted, true);
		assert.strictEqual(orchestrator.danger.getCurrentStateName(), 'Danger: Interrupt');

		orchestrator.tick(300);
		assert.strictEqual(orchestrator.interrupt.getCurrentStateName(), 'Hold Until Safe');
		assert.strictEqual(orchestrator.mission.getCurrentStateName(), 'Travel To Start');

		world.danger = false;
		orchestrator.tick(400);
		assert.strictEqual(orchestrator.interrupt.getCurrentStateName(), 'Stand Down');
		orchestrator.tick(500);
		assert.strictEqual(ctx.combatStarted, false);
		orchestrator.tick(600);
		assert.strictEqual(orchestrator.danger.getCurrentStateName(), 'Resume Mission');
		assert.strictEqual(orchestrator.mission.isPaused(), true);

		orchestrator.tick(700);
		assert.strictEqual(orchestrator.mission.isPaused(), false);
		assert.strictEqual(movement.paused, false);
		assert.strictEqual(orchestrator.danger.isFinished(), true);

		orchestrator.tick(800);
		assert.strictEqual(orchestrator.danger.getCurrentStateName(), 'Check: In Danger');
		assert.strictEqual(orchestrator.mission.getCurrentStateName(), 'Travel To Start');
	});

	it('freezes everything while paused by the user', () => {
		const { orchestrator, world, movement } = setup(0);
		orchestrator.start(0);

		orchestrator.togglePause();
		assert.strictEqual(orchestrator.isPaused, true);
		assert.strictEqual(movement.paused, true);
		orchestrator.tick(100);
		assert.deepStrictEqual(world.travels, []);

		orchestrator.togglePause();
		assert.strictEqual(orchestrator.isPaused, false);
		orchestrator.tick(200);
		assert.deepStrictEqual(world.travels, [5]);
	});

	it('reports a snapshot for a presentation layer', () => {
		const { orchestrator } = setup(5);
		orchestrator.start(0);

		assert.deepStrictEqual(orchestrator.snapshot(), {
			running: true,
			paused: false,
			missionState: 'Travel To Start',
			dangerState: 'Check: In Danger',
			mode: 'path',
			status: 'Waiting to begin...',
			currentIndex: null,
			waypointCount: 2,
			holding: false,
			combatStarted: false,
			stats: {
				runsAttempted: 1,
				runsCompleted: 0,
				successRate: 0,
				lapCount: 0,
				minLapMs: null,
				maxLapMs: null,
				averageLapMs: null,
				lastLapMs: null,
			},
		});
	});

	it('stops, clears the hold and counts the run as attempted only', () => {
		const { orchestrator, ctx } = setup(5);
		orchestrator.start(0);
		ctx.controller.enableHold();

		orchestrator.stop();
		orchestrator.stop();
		assert.strictEqual(orchestrator.isRunning, false);
		assert.strictEqual(ctx.controller.isHolding, false);
		assert.strictEqual(orchestrator.snapshot().missionState, null);
		assert.strictEqual(ctx.stats.runsAttempted, 1);
		assert.strictEqual(ctx.stats.runsCompleted, 0);
		assert.strictEqual(ctx.stats.inProgress, false);
	});

	it('starts the next run right away when looping', () => {
		const { orchestrator, world, ctx, movement } = setup(5, { loop: true });
		world.explorable = true;
		world.buffed = true;
		orchestrator.start(0);

		for (let t = 0; t <= 20_000 && ctx.stats.runsCompleted === 0; t += 100) {
			// Teleport onto whatever point was last commanded
			world.position = movement.moves[movement.moves.length - 1] ?? world.position;
			orchestrator.tick(t);
		}
		assert.strictEqual(ctx.stats.runsCompleted, 1);
		assert.strictEqual(ctx.stats.runsAttempted, 2);
		assert.strictEqual(orchestrator.isRunning, true);
		assert.strictEqual(orchestrator.mission.getCurrentStateName(), 'Travel To Start');
	});
});

describe('MissionOrchestrator with the simulated host', () => {
	it('runs a whole mission: travel, outpost, zone load, buff, fight and finish', () => {
		const world = new SimulatedWorld({
			start: { x: 0, y: 0 },
			speed: 1000,
			loadingMs: 200,
			portal: { position: { x: 800, y: 0 }, zoneId: 6, spawn: { x: 1000, y: 0 } },
		});
		const hostile = world.addHostile({ x: 1300, y: 100 });
		const rally = { x: 1200, y: 0 };
		const ctx = createMissionContext(
			{ movement: world, sensing: world, actions: world, world },
			testMap(
				[
					{ x: 1000, y: 0 },
					{ x: 1500, y: 0 },
					{ x: 2000, y: 0 },
				],
				[
					{ x: 500, y: 0 },
					{ x: 800, y: 0 },
				],
				[rally]
			),
			{ controller: { aggroRange: 500 }, rallyDebounceMs: 100 }
		);
		const orchestrator = new MissionOrchestrator(ctx);

		orchestrator.start(0);
		let t = 0;
		while (orchestrator.isRunning && t < 60_000) {
			t += 100;
			world.step(100, t);
			orchestrator.tick(t);
		}

		assert.strictEqual(orchestrator.isRunning, false);
		assert.strictEqual(ctx.stats.runsCompleted, 1);
		assert.strictEqual(world.currentLocationId(), 6);
		assert.ok(ctx.rallyTrigger.isConfirmed(rally));
		assert.ok(world.buffRequests >= 2);
		assert.deepStrictEqual(world.getHostile(hostile), {
			ok: true,
			value: { id: hostile, position: { x: 1300, y: 100 }, alive: false },
		});
	});
});
