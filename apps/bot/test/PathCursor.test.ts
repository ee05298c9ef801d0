import assert from 'assert';
import { describe, it } from 'node:test';
import { PathCursor } from '../src/game/path/PathCursor';

const path = [
	{ x: 0, y: 0 },
	{ x: 10, y: 0 },
	{ x: 20, y: 5 },
];

describe('PathCursor', () => {
	it('hands out every point once, in order', () => {
		const cursor = new PathCursor(path);
		assert.strictEqual(cursor.currentIndex(), null);
		assert.strictEqual(cursor.currentPoint(), null);

		const visited: number[] = [];
		for (let p = cursor.advance(); p; p = cursor.advance()) {
			visited.push(cursor.currentIndex() ?? -1);
		}
		assert.deepStrictEqual(visited, [0, 1, 2]);
		assert.strictEqual(cursor.advance(), null);
		assert.strictEqual(cursor.currentIndex(), 2);
		assert.ok(cursor.isExhausted());
	});

	it('is not exhausted before the last point is handed out', () => {
		const cursor = new PathCursor(path);
		assert.strictEqual(cursor.isExhausted(), false);
		cursor.advance();
		cursor.advance();
		assert.strictEqual(cursor.isExhausted(), false);
		cursor.advance();
		assert.strictEqual(cursor.isExhausted(), true);
	});

	it('sets the index and continues from there', () => {
		const cursor = new PathCursor(path);
		assert.deepStrictEqual(cursor.setIndex(1), { ok: true });
		assert.deepStrictEqual(cursor.currentPoint(), { x: 10, y: 0 });
		assert.deepStrictEqual(cursor.advance(), { x: 20, y: 5 });
	});

	it('rejects out-of-range and fractional indices', () => {
		const cursor = new PathCursor(path);
		assert.deepStrictEqual(cursor.setIndex(3), {
			ok: false,
			error: { code: 'REJECTED', message: 'Index 3 outside 0..2' },
		});
		assert.strictEqual(cursor.setIndex(-1).ok, false);
		assert.strictEqual(cursor.setIndex(0.5).ok, false);
		assert.strictEqual(cursor.currentIndex(), null);
	});

	it('resets back to before the first point', () => {
		const cursor = new PathCursor(path);
		cursor.advance();
		cursor.advance();
		cursor.reset();
		assert.strictEqual(cursor.currentIndex(), null);
		assert.deepStrictEqual(cursor.advance(), { x: 0, y: 0 });
	});

	it('treats an empty path as exhausted', () => {
		const cursor = new PathCursor([]);
		assert.strictEqual(cursor.advance(), null);
		assert.strictEqual(cursor.isExhausted(), true);
		assert.strictEqual(cursor.setIndex(0).ok, false);
		assert.strictEqual(cursor.length, 0);
	});
});
