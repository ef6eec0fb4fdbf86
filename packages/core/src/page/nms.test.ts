import { describe, expect, test } from 'vitest';
import { intersectionOverUnion, isContainedBy, suppressOverlaps } from './nms.js';
import { box } from './test-fixtures.js';

const OPTIONS = { iouThreshold: 0.6, containmentMargin: 20 };

describe('intersectionOverUnion', () => {
	test('identical boxes overlap completely', () => {
		expect(intersectionOverUnion(box(0, 0, 50, 50), box(0, 0, 50, 50))).toBe(1);
	});

	test('disjoint and edge-touching boxes do not overlap', () => {
		expect(intersectionOverUnion(box(0, 0, 50, 50), box(100, 100, 50, 50))).toBe(0);
		expect(intersectionOverUnion(box(0, 0, 50, 50), box(50, 0, 50, 50))).toBe(0);
	});

	test('partial overlap', () => {
		// intersection 50x100, union 100x100 + 100x100 - 5000
		expect(intersectionOverUnion(box(0, 0, 100, 100), box(50, 0, 100, 100))).toBeCloseTo(5000 / 15000);
	});

	test('degenerate boxes give zero', () => {
		expect(intersectionOverUnion(box(0, 0, 0, 0), box(0, 0, 0, 0))).toBe(0);
	});
});

describe('isContainedBy', () => {
	test('inclusive edges', () => {
		expect(isContainedBy(box(10, 10, 20, 20), box(0, 0, 100, 100))).toBe(true);
		expect(isContainedBy(box(0, 0, 100, 100), box(0, 0, 100, 100))).toBe(true);
		expect(isContainedBy(box(90, 90, 20, 20), box(0, 0, 100, 100))).toBe(false);
	});
});

describe('suppressOverlaps', () => {
	test('drops the lower-scored of two heavily overlapping boxes', () => {
		const high = { name: 'high', box: box(5, 5, 100, 100), score: 90 };
		const low = { name: 'low', box: box(0, 0, 100, 100), score: 80 };
		expect(suppressOverlaps([low, high], OPTIONS).map((i) => i.name)).toEqual(['high']);
	});

	test('keeps moderately overlapping boxes', () => {
		const a = { name: 'a', box: box(0, 0, 100, 100), score: 90 };
		const b = { name: 'b', box: box(50, 0, 100, 100), score: 80 };
		expect(suppressOverlaps([a, b], OPTIONS).map((i) => i.name)).toEqual(['a', 'b']);
	});

	test('suppresses a nested child that does not beat its container by the margin', () => {
		const parent = { name: 'parent', box: box(0, 0, 300, 200), score: 100 };
		const child = { name: 'child', box: box(10, 10, 40, 20), score: 95 };
		expect(suppressOverlaps([parent, child], OPTIONS).map((i) => i.name)).toEqual(['parent']);
	});

	test('suppresses a container once a higher-scored child is kept', () => {
		const parent = { name: 'parent', box: box(0, 0, 300, 200), score: 60 };
		const child = { name: 'child', box: box(10, 10, 40, 20), score: 120 };
		expect(suppressOverlaps([parent, child], OPTIONS).map((i) => i.name)).toEqual(['child']);
	});

	test('a zero margin keeps nested items with equal scores', () => {
		const parent = { name: 'parent', box: box(0, 0, 300, 200), score: 100 };
		const child = { name: 'child', box: box(10, 10, 40, 20), score: 100 };
		const kept = suppressOverlaps([parent, child], { iouThreshold: 0.6, containmentMargin: 0 });
		expect(kept.map((i) => i.name)).toEqual(['parent', 'child']);
	});

	test('ties keep input order and the input is not mutated', () => {
		const items = [
			{ name: 'first', box: box(0, 0, 10, 10), score: 50 },
			{ name: 'second', box: box(100, 0, 10, 10), score: 50 },
			{ name: 'third', box: box(200, 0, 10, 10), score: 70 },
		];
		expect(suppressOverlaps(items, OPTIONS).map((i) => i.name)).toEqual(['third', 'first', 'second']);
		expect(items.map((i) => i.name)).toEqual(['first', 'second', 'third']);
	});
});
