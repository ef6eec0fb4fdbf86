import type { CandidateElement, MarkCapability } from './types.js';

/** Base score per tag. Interactive controls rank highest, generic media lowest. */
export const TAG_SCORES: Readonly<Record<string, number>> = {
	button: 100,
	a: 95,
	input: 90,
	textarea: 88,
	select: 85,
	canvas: 75,
	video: 72,
	audio: 70,
	svg: 65,
	img: 50,
};

export const DEFAULT_TAG_SCORE = 30;

export const ROLE_BONUS: Readonly<Record<string, number>> = {
	button: 25,
	link: 22,
	textbox: 20,
	checkbox: 18,
	radio: 18,
	switch: 18,
	menuitem: 15,
	tab: 15,
	option: 12,
	slider: 12,
	combobox: 12,
};

export const SCORE_BONUS = {
	shortText: 15,
	ariaLabel: 12,
	tabIndex: 8,
	onClick: 10,
	inputable: 20,
	reasonableArea: 5,
} as const;

const SHORT_TEXT_LIMIT = 100;
const REASONABLE_AREA = { min: 500, max: 50_000 } as const;

function lookup(table: Readonly<Record<string, number>>, key: string): number | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined;
}

export function boxArea(candidate: Pick<CandidateElement, 'box'>): number {
	return candidate.box.width * candidate.box.height;
}

export function scoreCandidate(candidate: CandidateElement): number {
	let score = lookup(TAG_SCORES, candidate.tag) ?? DEFAULT_TAG_SCORE;

	if (candidate.role) {
		score += lookup(ROLE_BONUS, candidate.role) ?? 0;
	}
	if (candidate.textLength > 0 && candidate.textLength < SHORT_TEXT_LIMIT) {
		score += SCORE_BONUS.shortText;
	}
	if (candidate.hasAriaLabel) {
		score += SCORE_BONUS.ariaLabel;
	}
	if (candidate.tabIndex !== null && candidate.tabIndex >= 0) {
		score += SCORE_BONUS.tabIndex;
	}
	if (candidate.hasOnClick) {
		score += SCORE_BONUS.onClick;
	}
	if (candidate.inputable) {
		score += SCORE_BONUS.inputable;
	}

	const area = boxArea(candidate);
	if (area > REASONABLE_AREA.min && area < REASONABLE_AREA.max) {
		score += SCORE_BONUS.reasonableArea;
	}

	return score;
}

/** Input-capable wins over canvas-like when an element is both. */
export function capabilityOf(candidate: Pick<CandidateElement, 'inputable' | 'canvasLike'>): MarkCapability {
	if (candidate.inputable) return 'inputable';
	if (candidate.canvasLike) return 'canvasLike';
	return 'clickable';
}
