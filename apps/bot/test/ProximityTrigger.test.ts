import assert from 'assert';
import { describe, it } from 'node:test';
import type { Point } from '@waymark/shared';
import { ProximityTrigger } from '../src/game/systems/ProximityTrigger';

const rally = { x: 100, y: 100 };
const near = { x: 110, y: 100 };
const far = { x: 1000, y: 1000 };

describe('ProximityTrigger', () => {
	it('arms, waits for the debounce, then fires exactly once', () => {
		const fired: Point[] = [];
		const trigger = new ProximityTrigger((p) => fired.push(p), 5000);

		assert.strictEqual(trigger.check(rally, 1000, near, 50), 'armed');
		assert.strictEqual(trigger.check(rally, 5999, near, 50), 'waiting');
		assert.strictEqual(fired.length, 0);

		assert.strictEqual(trigger.check(rally, 6000, near, 50), 'fired');
		assert.deepStrictEqual(fired, [rally]);

		assert.strictEqual(trigger.check(rally, 20000, near, 50), 'confirmed');
		assert.strictEqual(fired.length, 1);
		assert.ok(trigger.isConfirmed(rally));
	});

	it('does nothing while the player is out of range', () => {
		const trigger = new ProximityTrigger(() => assert.fail('should not fire'), 10);
		assert.strictEqual(trigger.check(rally, 0, far, 50), 'out-of-range');
		assert.strictEqual(trigger.check(rally, 100, far, 50), 'out-of-range');
		assert.strictEqual(trigger.isConfirmed(rally), false);
	});

	it('treats the radius as exclusive', () => {
		const trigger = new ProximityTrigger(() => undefined);
		assert.strictEqual(trigger.check(rally, 0, { x: 150, y: 100 }, 50), 'out-of-range');
		assert.strictEqual(trigger.check(rally, 0, { x: 149, y: 100 }, 50), 'armed');
	});

	it('tracks points independently and forgets them on reset', () => {
		let count = 0;
		const trigger = new ProximityTrigger(() => count++, 0);
		const other = { x: 120, y: 100 };

		trigger.check(rally, 0, near, 50);
		assert.strictEqual(trigger.check(other, 0, near, 50), 'armed');
		assert.strictEqual(trigger.check(rally, 0, near, 50), 'fired');
		assert.strictEqual(trigger.isConfirmed(other), false);

		trigger.reset();
		assert.strictEqual(trigger.isConfirmed(rally), false);
		assert.strictEqual(trigger.check(rally, 10, near, 50), 'armed');
		assert.strictEqual(count, 1);
	});
});
