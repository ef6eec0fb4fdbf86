import type { Frame } from 'playwright';
import { describe, expect, test, vi } from 'vitest';
import { MarkingConfigSchema } from '../config/types.js';
import { MarkingFailedError } from '../errors.js';
import { EventHub } from '../viewport/event-hub.js';
import type { SessionEventMap } from '../viewport/events.js';
import { Marker } from './marker.js';
import {
	type ApplyArgs,
	type AppliedMark,
	applyMarksInPage,
	clearMarksInPage,
	collectCandidatesInPage,
} from './page-scripts.js';
import { box, candidate } from './test-fixtures.js';
import type { CandidateElement, FrameSnapshot } from './types.js';

// ── Helpers ──

interface FakeFrameOptions {
	url: string;
	candidates?: CandidateElement[];
	parent?: Frame | null;
	detached?: boolean;
	failWith?: Error;
	/** Keys that disappear between collection and marking. */
	vanished?: number[];
	failApply?: Error;
	failClear?: boolean;
}

function fakeFrame(options: FakeFrameOptions): Frame {
	const candidates = options.candidates ?? [];
	const snapshot: FrameSnapshot = { viewport: { width: 1280, height: 720 }, candidates };

	const evaluate = vi.fn(async (fn: unknown, arg: unknown) => {
		if (options.failWith) throw options.failWith;
		if (fn === collectCandidatesInPage) return snapshot;
		if (fn === clearMarksInPage) {
			if (options.failClear) throw new Error('Target closed');
			return undefined;
		}
		if (fn === applyMarksInPage) {
			if (options.failApply) throw options.failApply;
			const { startId, marks } = arg as ApplyArgs;
			const applied: AppliedMark[] = [];
			let nextId = startId;
			for (const mark of marks) {
				if (options.vanished?.includes(mark.key)) continue;
				const found = candidates.find((c) => c.key === mark.key);
				if (!found) continue;
				const { left, top, width, height } = found.box;
				applied.push({ key: mark.key, id: nextId, box: { left, top, width, height } });
				nextId += 1;
			}
			return applied;
		}
		throw new Error('unexpected page function');
	});

	return {
		name: () => '',
		url: () => options.url,
		parentFrame: () => options.parent ?? null,
		isDetached: () => options.detached ?? false,
		evaluate,
	} as unknown as Frame;
}

function buttons(count: number, top = 0): CandidateElement[] {
	return Array.from({ length: count }, (_, key) =>
		candidate({ key, tag: 'button', text: `B${key}`, textLength: 2, box: box(key * 100, top, 60, 30) }),
	);
}

function marker(overrides: Record<string, unknown> = {}, events?: EventHub<SessionEventMap>): Marker {
	return new Marker(MarkingConfigSchema.parse(overrides), events);
}

// ── Tests ──

describe('Marker.markFrames', () => {
	test('numbers elements contiguously across frames from the offset', async () => {
		const main = fakeFrame({ url: 'https://example.com/', candidates: buttons(3) });
		const child = fakeFrame({ url: 'https://example.com/frame', candidates: buttons(2, 200), parent: main });

		const report = await marker().markFrames([main, child], 10);

		expect(report.elements.map((e) => e.id)).toEqual([10, 11, 12, 13, 14]);
		expect(report.elements.map((e) => e.frame.isMain)).toEqual([true, true, true, false, false]);
		expect(report.total).toBe(5);
		expect(report.nextId).toBe(15);
		expect(report.failedFrames).toBe(0);
	});

	test('carries the rendered rectangle and capability of each mark', async () => {
		const frame = fakeFrame({
			url: 'https://example.com/',
			candidates: [candidate({ key: 0, tag: 'input', inputable: true, box: box(20, 40, 200, 30) })],
		});

		const [element] = (await marker().markFrames([frame])).elements;

		expect(element.rect).toEqual({ x: 20, y: 40, width: 200, height: 30 });
		expect(element.capability).toBe('inputable');
		expect(element.tag).toBe('input');
	});

	test('skips detached frames without counting them', async () => {
		const main = fakeFrame({ url: 'https://example.com/', candidates: buttons(2) });
		const gone = fakeFrame({ url: 'https://ads.example/', candidates: buttons(4), parent: main, detached: true });

		const report = await marker().markFrames([main, gone]);

		expect(report.frames).toHaveLength(1);
		expect(report.total).toBe(2);
		expect(gone.evaluate).not.toHaveBeenCalled();
	});

	test('tolerates a failing sub-frame and keeps numbering the rest', async () => {
		const events = new EventHub<SessionEventMap>();
		const failures: string[] = [];
		events.on('frame-failed', (e) => failures.push(e.frameUrl));

		const main = fakeFrame({ url: 'https://example.com/', candidates: buttons(2) });
		const broken = fakeFrame({
			url: 'https://broken.example/',
			parent: main,
			failWith: new Error('Frame was detached'),
		});
		const last = fakeFrame({ url: 'https://example.com/last', candidates: buttons(1), parent: main });

		const report = await marker({}, events).markFrames([main, broken, last], 0);

		expect(report.elements.map((e) => e.id)).toEqual([0, 1, 2]);
		expect(report.failedFrames).toBe(1);
		expect(report.frames[1].outcome).toMatchObject({ ok: false, error: { message: 'Frame was detached' } });
		expect(failures).toEqual(['https://broken.example/']);
	});

	test('clears a frame whose marking broke partway and reuses its IDs', async () => {
		const main = fakeFrame({
			url: 'https://example.com/',
			candidates: buttons(3),
			failApply: new Error('Execution context was destroyed'),
		});
		const child = fakeFrame({ url: 'https://example.com/frame', candidates: buttons(2), parent: main });

		const report = await marker().markFrames([main, child], 0);

		expect(report.elements.map((e) => e.id)).toEqual([0, 1]);
		expect(report.frames[0].outcome).toMatchObject({ ok: false, error: { reservedIds: 0 } });
		expect(main.evaluate).toHaveBeenCalledWith(clearMarksInPage);
	});

	test('skips the IDs of a frame that could not be cleared', async () => {
		const main = fakeFrame({
			url: 'https://example.com/',
			candidates: buttons(3),
			failApply: new Error('Execution context was destroyed'),
			failClear: true,
		});
		const child = fakeFrame({ url: 'https://example.com/frame', candidates: buttons(2), parent: main });

		const report = await marker().markFrames([main, child], 0);

		expect(report.elements.map((e) => e.id)).toEqual([3, 4]);
		expect(report.nextId).toBe(5);
		expect(report.frames[0].outcome).toMatchObject({ ok: false, error: { reservedIds: 3 } });
	});

	test('throws when every frame fails', async () => {
		const only = fakeFrame({ url: 'https://example.com/', failWith: new Error('Execution context was destroyed') });
		await expect(marker().markFrames([only])).rejects.toBeInstanceOf(MarkingFailedError);
	});

	test('respects maxMarks in each frame', async () => {
		const frame = fakeFrame({ url: 'https://example.com/', candidates: buttons(12) });
		const report = await marker({ maxMarks: 4 }).markFrames([frame]);
		expect(report.total).toBe(4);
	});

	test('keeps IDs gap-free when an element vanished before marking', async () => {
		const frame = fakeFrame({ url: 'https://example.com/', candidates: buttons(4), vanished: [1] });
		const report = await marker().markFrames([frame], 5);
		expect(report.elements.map((e) => e.id)).toEqual([5, 6, 7]);
		expect(report.nextId).toBe(8);
	});

	test('passes the configured mode to the collect script', async () => {
		const frame = fakeFrame({ url: 'https://example.com/' });
		await marker({ mode: 'minimal' }).markFrames([frame]);
		expect(frame.evaluate).toHaveBeenCalledWith(collectCandidatesInPage, { mode: 'minimal' });
	});

	test('emits a summary event', async () => {
		const events = new EventHub<SessionEventMap>();
		const frame = fakeFrame({ url: 'https://example.com/', candidates: buttons(3) });
		await marker({}, events).markFrames([frame]);
		expect(events.getHistory('marks-rendered').map((r) => r.payload)).toEqual([
			{ total: 3, frames: 1, failedFrames: 0 },
		]);
	});
});
