import type { MarkMode } from '../config/types.js';
import type { Size } from '../types.js';
import { suppressOverlaps } from './nms.js';
import { boxArea, capabilityOf, scoreCandidate } from './scoring.js';
import type {
	CandidateElement,
	FrameSnapshot,
	MarkingOptions,
	PlannedMark,
	ScoredCandidate,
	SelectionResult,
} from './types.js';

/** Limits a cursor:pointer element must meet in balanced mode. */
export const POINTER_LIMITS = {
	maxTextLength: 200,
	maxWidth: 600,
	maxHeight: 300,
	maxChildren: 10,
} as const;

/**
 * Whether a cursor:pointer element is worth tagging. Minimal mode ignores
 * them; balanced mode keeps only small, labelled, non-container elements.
 */
export function acceptsPointerCandidate(candidate: CandidateElement, mode: MarkMode): boolean {
	if (mode === 'minimal') return false;
	if (mode === 'all') return true;

	const hasText = candidate.textLength > 0 && candidate.textLength < POINTER_LIMITS.maxTextLength;
	const reasonableSize = candidate.box.width < POINTER_LIMITS.maxWidth && candidate.box.height < POINTER_LIMITS.maxHeight;
	const notContainer = candidate.childCount < POINTER_LIMITS.maxChildren;
	return (hasText || candidate.hasAriaLabel) && reasonableSize && notContainer;
}

export function isOnScreen(candidate: CandidateElement, viewport: Size): boolean {
	const { box } = candidate;
	if (box.bottom < 0 || box.top > viewport.height) return false;
	if (box.right < 0 || box.left > viewport.width) return false;
	return true;
}

export function isEligible(candidate: CandidateElement, viewport: Size, options: MarkingOptions): boolean {
	if (candidate.tier === 'pointer' && !acceptsPointerCandidate(candidate, options.mode)) return false;
	if (boxArea(candidate) < options.minArea) return false;
	if (!isOnScreen(candidate, viewport)) return false;
	return candidate.visible;
}

export function scoreCandidates(candidates: readonly CandidateElement[]): ScoredCandidate[] {
	return candidates.map((candidate) => ({
		...candidate,
		score: scoreCandidate(candidate),
		capability: capabilityOf(candidate),
	}));
}

/**
 * Turns one frame's raw candidates into the ordered set of marks to render:
 * filter, score, de-duplicate, truncate to `maxMarks`, then number from
 * `startId` without gaps.
 */
export function selectMarks(snapshot: FrameSnapshot, options: MarkingOptions): SelectionResult {
	const eligible = snapshot.candidates.filter((candidate) => isEligible(candidate, snapshot.viewport, options));
	const kept = suppressOverlaps(scoreCandidates(eligible), options);
	const limit = Math.max(0, Math.floor(options.maxMarks));
	const truncated = kept.slice(0, limit);

	const marks: PlannedMark[] = truncated.map((candidate, index) => ({
		...candidate,
		id: options.startId + index,
	}));

	return {
		marks,
		stats: {
			collected: snapshot.candidates.length,
			eligible: eligible.length,
			suppressed: eligible.length - kept.length,
			truncated: kept.length - truncated.length,
		},
	};
}
