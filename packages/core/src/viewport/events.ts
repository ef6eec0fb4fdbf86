import type { UserId } from '../types.js';

// ── Event payload types ──

export interface NavigationBlockedEvent {
	requestedUrl: string;
	blockedUrl: string;
	reason: string;
}

export interface NavigationCompletedEvent {
	url: string;
	title: string;
}

export interface SessionAcquiredEvent {
	userId: UserId;
	refreshed: boolean;
}

export interface SessionReleasedEvent {
	userId: UserId;
}

export interface SessionReclaimedEvent {
	previousOwner: UserId;
	idleMs: number;
}

export interface SessionResetEvent {
	reason: string;
}

export interface MarksRenderedEvent {
	total: number;
	frames: number;
	failedFrames: number;
}

export interface FrameFailedEvent {
	frameUrl: string;
	message: string;
}

// ── Event map ──

export interface SessionEventMap {
	'navigation-blocked': NavigationBlockedEvent;
	'navigation-completed': NavigationCompletedEvent;
	'session-acquired': SessionAcquiredEvent;
	'session-released': SessionReleasedEvent;
	'session-reclaimed': SessionReclaimedEvent;
	'session-reset': SessionResetEvent;
	'marks-rendered': MarksRenderedEvent;
	'frame-failed': FrameFailedEvent;
}
