import assert from 'assert';
import { describe, it } from 'node:test';
import { SimulatedWorld } from '../src/sim/SimulatedWorld';
import { SpatialGrid } from '../src/sim/SpatialGrid';
import { stepToward } from '../src/sim/motion';

describe('stepToward', () => {
	it('moves speed * deltaTime along the line to the goal', () => {
		assert.deepStrictEqual(stepToward({ x: 0, y: 0 }, { x: 0, y: 1000 }, 200, 0.5), {
			position: { x: 0, y: 100 },
			reached: false,
		});
	});

	it('snaps onto the goal instead of overshooting', () => {
		assert.deepStrictEqual(stepToward({ x: 0, y: 0 }, { x: 30, y: 40 }, 100, 1), {
			position: { x: 30, y: 40 },
			reached: true,
		});
	});

	it('counts anything inside the stop radius as reached', () => {
		assert.strictEqual(stepToward({ x: 0, y: 0 }, { x: 10, y: 0 }, 0, 1, 15).reached, true);
	});
});

describe('SpatialGrid', () => {
	it('finds entries across cell borders, ordered by id', () => {
		const grid = new SpatialGrid(100);
		grid.rebuild([
			{ id: 3, position: { x: -20, y: 0 } },
			{ id: 1, position: { x: 120, y: 10 } },
			{ id: 2, position: { x: 500, y: 500 } },
		]);
		assert.deepStrictEqual(
			grid.query({ x: 50, y: 0 }, 100).map((e) => e.id),
			[1, 3]
		);
		assert.deepStrictEqual(grid.query({ x: 1000, y: 1000 }, 50), []);
	});
});

describe('SimulatedWorld', () => {
	it('follows a point and flags arrival', () => {
		const world = new SimulatedWorld({ speed: 1000 });
		assert.deepStrictEqual(world.moveTo({ x: 500, y: 0 }), { ok: true, value: undefined });

		world.step(100, 100);
		assert.deepStrictEqual(world.playerPosition(), { x: 100, y: 0 });
		assert.strictEqual(world.isFollowing(), true);

		for (let t = 200; t <= 500; t += 100) world.step(100, t);
		assert.deepStrictEqual(world.playerPosition(), { x: 500, y: 0 });
		assert.strictEqual(world.isFollowing(), false);
		assert.strictEqual(world.arrived, true);
	});

	it('gives direct moves priority and holds still while paused', () => {
		const world = new SimulatedWorld({ speed: 1000 });
		world.moveTo({ x: 1000, y: 0 });
		world.move({ x: 0, y: 300 });

		world.step(100, 100);
		assert.deepStrictEqual(world.playerPosition(), { x: 0, y: 100 });

		world.pause();
		world.step(100, 200);
		assert.deepStrictEqual(world.playerPosition(), { x: 0, y: 100 });
		world.resume();
		world.step(100, 300);
		assert.deepStrictEqual(world.playerPosition(), { x: 0, y: 200 });
		assert.strictEqual(world.isFollowing(), true);
	});

	it('enters the zone through the portal and loads', () => {
		const world = new SimulatedWorld({
			speed: 1000,
			loadingMs: 500,
			portal: { position: { x: 300, y: 0 }, zoneId: 9, spawn: { x: 5000, y: 5000 } },
		});
		world.moveTo({ x: 300, y: 0 });

		world.step(100, 100);
		assert.strictEqual(world.isExplorable(), false);
		world.step(100, 200);
		assert.strictEqual(world.currentLocationId(), 9);
		assert.strictEqual(world.isExplorable(), true);
		assert.deepStrictEqual(world.playerPosition(), { x: 5000, y: 5000 });
		assert.strictEqual(world.isLoading(), true);
		assert.deepStrictEqual(world.moveTo({ x: 0, y: 0 }), {
			ok: false,
			error: { code: 'UNAVAILABLE', message: 'Zone is loading' },
		});

		world.step(100, 700);
		assert.strictEqual(world.isLoading(), false);
	});

	it('reports nearby live hostiles through the grid', () => {
		const world = new SimulatedWorld();
		const near = world.addHostile({ x: 100, y: 0 });
		world.addHostile({ x: 2500, y: 0 });
		const behind = world.addHostile({ x: -100, y: -50 });

		const scan = world.nearbyHostiles({ x: 0, y: 0 }, 200);
		assert.ok(scan.ok);
		assert.deepStrictEqual(
			scan.value.map((h) => h.id),
			[near, behind]
		);

		world.killHostile(near);
		const after = world.nearbyHostiles({ x: 0, y: 0 }, 200);
		assert.ok(after.ok);
		assert.deepStrictEqual(
			after.value.map((h) => h.id),
			[behind]
		);
		assert.deepStrictEqual(world.getHostile(near), {
			ok: true,
			value: { id: near, position: { x: 100, y: 0 }, alive: false },
		});
		assert.deepStrictEqual(world.getHostile(99), { ok: true, value: null });
	});

	it('fails sensing while offline', () => {
		const world = new SimulatedWorld();
		world.sensingOnline = false;
		const scan = world.nearbyHostiles({ x: 0, y: 0 }, 100);
		assert.strictEqual(scan.ok, false);
		assert.strictEqual(world.getHostile(1).ok, false);
	});

	it('wears down the engaged target and drops it once defeated', () => {
		const world = new SimulatedWorld({ playerDps: 50 });
		const id = world.addHostile({ x: 200, y: 0 }, 10);
		assert.deepStrictEqual(world.changeTarget(id), { ok: true, value: undefined });
		assert.strictEqual(world.currentTargetId, id);

		world.step(100, 100);
		assert.strictEqual(world.currentTargetId, id);
		world.step(100, 200);
		assert.strictEqual(world.currentTargetId, null);
		assert.deepStrictEqual(world.changeTarget(id), {
			ok: false,
			error: { code: 'INVALID_TARGET', message: `No live hostile ${id}` },
		});
	});

	it('puts the player in danger only when a danger range is set', () => {
		const calm = new SimulatedWorld();
		calm.addHostile({ x: 50, y: 0 });
		assert.strictEqual(calm.inDanger(), false);

		const tense = new SimulatedWorld({ dangerRange: 400 });
		tense.addHostile({ x: 300, y: 0 });
		assert.strictEqual(tense.inDanger(), true);
		tense.setPlayerPosition({ x: 1000, y: 0 });
		assert.strictEqual(tense.inDanger(), false);
	});

	it('travels back to spawn and only grants the buff once loaded', () => {
		const world = new SimulatedWorld({ start: { x: 10, y: 10 } });
		world.setPlayerPosition({ x: 500, y: 500 });

		world.travelTo(3);
		assert.strictEqual(world.currentLocationId(), 3);
		assert.deepStrictEqual(world.playerPosition(), { x: 10, y: 10 });
		assert.strictEqual(world.isLoading(), true);

		world.travelTo(4);
		assert.strictEqual(world.currentLocationId(), 3);

		world.requestBuff();
		assert.strictEqual(world.hasBuff(), false);

		world.step(2000, 2000);
		world.requestBuff();
		assert.strictEqual(world.hasBuff(), true);
		assert.strictEqual(world.buffRequests, 2);
	});

	it('never grants a buff without a buff source', () => {
		const world = new SimulatedWorld({ buffSource: false });
		world.requestBuff();
		assert.strictEqual(world.buffAvailable(), false);
		assert.strictEqual(world.hasBuff(), false);
	});
});
