import type { MarkMode } from '../config/types.js';
import type { ElementId, Rect, Result, Size } from '../types.js';

/** Edge-based box as returned by getBoundingClientRect, in CSS pixels. */
export interface Box {
	left: number;
	top: number;
	right: number;
	bottom: number;
	width: number;
	height: number;
}

export type CandidateTier = 'strong' | 'event' | 'special' | 'pointer';

export type MarkCapability = 'inputable' | 'canvasLike' | 'clickable';

/**
 * Plain description of one element gathered by the in-page collect script.
 * `key` links the descriptor back to the DOM node until marks are applied.
 */
export interface CandidateElement {
	key: number;
	tier: CandidateTier;
	tag: string;
	role: string | null;
	/** First characters of the trimmed text, whitespace collapsed. */
	text: string;
	/** Length of the full trimmed text. */
	textLength: number;
	hasAriaLabel: boolean;
	tabIndex: number | null;
	hasOnClick: boolean;
	inputable: boolean;
	canvasLike: boolean;
	childCount: number;
	visible: boolean;
	box: Box;
}

export interface FrameSnapshot {
	viewport: Size;
	candidates: CandidateElement[];
}

export interface ScoredCandidate extends CandidateElement {
	score: number;
	capability: MarkCapability;
}

/** A candidate that survived selection, with the ID it is planned to receive. */
export interface PlannedMark extends ScoredCandidate {
	id: number;
}

export interface MarkingOptions {
	startId: number;
	maxMarks: number;
	minArea: number;
	iouThreshold: number;
	mode: MarkMode;
	containmentMargin: number;
}

export interface SelectionStats {
	collected: number;
	eligible: number;
	suppressed: number;
	truncated: number;
}

export interface SelectionResult {
	marks: PlannedMark[];
	stats: SelectionStats;
}

// ── Marking pass output ──

export interface FrameRef {
	index: number;
	name: string;
	url: string;
	isMain: boolean;
}

export interface MarkedElement {
	id: ElementId;
	frame: FrameRef;
	/** Frame-local CSS pixel rectangle at the time the tag was rendered. */
	rect: Rect;
	capability: MarkCapability;
	score: number;
	tag: string;
	text: string;
}

export interface FrameError {
	frame: FrameRef;
	message: string;
	/** IDs that may still be stamped in the frame; numbering continues past them. */
	reservedIds: number;
	cause?: unknown;
}

export interface FrameMarking {
	frame: FrameRef;
	outcome: Result<MarkedElement[], FrameError>;
}

export interface MarkingReport {
	elements: MarkedElement[];
	frames: FrameMarking[];
	total: number;
	failedFrames: number;
	/** First ID not used by this pass. */
	nextId: number;
}
