import type { Box, CandidateElement, MarkingOptions } from './types.js';

export function box(left: number, top: number, width: number, height: number): Box {
	return { left, top, width, height, right: left + width, bottom: top + height };
}

export function candidate(overrides: Partial<CandidateElement> = {}): CandidateElement {
	return {
		key: 0,
		tier: 'strong',
		tag: 'div',
		role: null,
		text: '',
		textLength: 0,
		hasAriaLabel: false,
		tabIndex: null,
		hasOnClick: false,
		inputable: false,
		canvasLike: false,
		childCount: 0,
		visible: true,
		box: box(0, 0, 40, 20),
		...overrides,
	};
}

export function markingOptions(overrides: Partial<MarkingOptions> = {}): MarkingOptions {
	return {
		startId: 0,
		maxMarks: 80,
		minArea: 400,
		iouThreshold: 0.6,
		mode: 'balanced',
		containmentMargin: 20,
		...overrides,
	};
}

/** Small deterministic PRNG so property-style tests are reproducible. */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}
