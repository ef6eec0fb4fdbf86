export { BrowserSession, type BrowserSessionOptions, type BrowserLauncher, type PendingScreenshot } from './browser-session.js';
export { SessionGate, type SessionGateOptions, type GateDecision, type GateStatus, type ReleaseOutcome } from './session-gate.js';
export { Navigator, type NavigatorDeps, type NavigationResult } from './navigator.js';
export { LaunchProfile, CONTAINER_FLAGS, CHROME_AUTOMATION_FLAGS } from './launch-profile.js';
export { EventHub, type EventRecord } from './event-hub.js';
export { BaseGuard, type GuardContext } from './guard-base.js';
export { RedirectPolicyGuard, type BlockedHop } from './guards/redirect-policy.js';
export {
	CAPTURE_OPTIONS,
	captureViewport,
	captureRegion,
	captureElement,
	withMarksHidden,
	setMarksVisible,
	imageSize,
	upscale,
	overlayGrid,
	gridSvg,
	type ImageSize,
} from './capture.js';
export {
	type SessionEventMap,
	type NavigationBlockedEvent,
	type NavigationCompletedEvent,
	type SessionAcquiredEvent,
	type SessionReleasedEvent,
	type SessionReclaimedEvent,
	type SessionResetEvent,
	type MarksRenderedEvent,
	type FrameFailedEvent,
} from './events.js';
