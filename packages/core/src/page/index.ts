export { Marker, frameRef } from './marker.js';
export { selectMarks, scoreCandidates, isEligible } from './select-marks.js';
export { scoreCandidate, capabilityOf, TAG_SCORES, ROLE_BONUS, SCORE_BONUS } from './scoring.js';
export { suppressOverlaps, intersectionOverUnion, isContainedBy } from './nms.js';
export { InteractionResolver, describeElement, SCROLL_DIRECTIONS, type ActionOutcome, type InputMethod } from './interaction.js';
export { locateMarkedElement, markSelector, type LocatedElement } from './locator.js';
export { observe, describeObservation, type Observation } from './observe.js';
export { type ElementDetails, type ScrollDirection } from './page-scripts.js';
export {
	type CandidateElement,
	type FrameSnapshot,
	type MarkingOptions,
	type MarkingReport,
	type MarkedElement,
	type MarkCapability,
	type FrameRef,
	type FrameError,
	type FrameMarking,
	type SelectionResult,
} from './types.js';
