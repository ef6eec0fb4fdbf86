import type { Box } from './types.js';

export interface NmsOptions {
	/** Overlap above which the lower-scored box is dropped. */
	iouThreshold: number;
	/**
	 * When one box contains the other, the later (lower-scored) one survives
	 * only if its score reaches the kept box's score plus this margin.
	 */
	containmentMargin: number;
}

export interface Scored {
	box: Box;
	score: number;
}

export function intersectionOverUnion(a: Box, b: Box): number {
	const left = Math.max(a.left, b.left);
	const top = Math.max(a.top, b.top);
	const right = Math.min(a.right, b.right);
	const bottom = Math.min(a.bottom, b.bottom);

	if (right <= left || bottom <= top) return 0;

	const intersection = (right - left) * (bottom - top);
	const union = a.width * a.height + b.width * b.height - intersection;
	return union > 0 ? intersection / union : 0;
}

export function isContainedBy(inner: Box, outer: Box): boolean {
	return (
		inner.left >= outer.left && inner.right <= outer.right && inner.top >= outer.top && inner.bottom <= outer.bottom
	);
}

/**
 * Greedy non-maximum suppression. Items are visited in descending score order
 * (ties keep their input order) and each is kept unless it overlaps an
 * already-kept item above the IoU threshold, or nests with one (in either
 * direction) without beating its score by the containment margin.
 */
export function suppressOverlaps<T extends Scored>(items: readonly T[], options: NmsOptions): T[] {
	const ordered = [...items].sort((a, b) => b.score - a.score);
	const kept: T[] = [];

	for (const item of ordered) {
		const dominated = kept.some((k) => {
			if (intersectionOverUnion(item.box, k.box) > options.iouThreshold) return true;
			const nested = isContainedBy(item.box, k.box) || isContainedBy(k.box, item.box);
			return nested && item.score < k.score + options.containmentMargin;
		});

		if (!dominated) kept.push(item);
	}

	return kept;
}
