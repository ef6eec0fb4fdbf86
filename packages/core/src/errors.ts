export class TagsightError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'TagsightError';
	}
}

// ── Security ──

export class SecurityRejectionError extends TagsightError {
	public readonly url: string;
	public readonly reason: string;

	constructor(url: string, reason: string, options?: ErrorOptions) {
		super(`Blocked by security policy: ${reason}`, options);
		this.name = 'SecurityRejectionError';
		this.url = url;
		this.reason = reason;
	}
}

/**
 * A navigation was stopped because one of its hops (a redirect, or the final
 * document URL) failed validation. Kept apart from a generic navigation
 * failure so callers can tell "the page broke" from "we refused to follow it".
 */
export class RedirectBlockedError extends SecurityRejectionError {
	public readonly blockedUrl: string;

	constructor(requestedUrl: string, blockedUrl: string, reason: string, options?: ErrorOptions) {
		super(requestedUrl, reason, options);
		this.message = `Unsafe redirect blocked: ${blockedUrl} (${reason})`;
		this.name = 'RedirectBlockedError';
		this.blockedUrl = blockedUrl;
	}
}

// ── Session ──

export class SessionConflictError extends TagsightError {
	public readonly owner: string;
	public readonly remainingMs: number;

	constructor(owner: string, remainingMs: number, options?: ErrorOptions) {
		super(
			`Browser is in use by ${owner}; retry in ${Math.ceil(remainingMs / 1000)}s or wait for it to be released`,
			options,
		);
		this.name = 'SessionConflictError';
		this.owner = owner;
		this.remainingMs = remainingMs;
	}
}

export class SessionClosedError extends TagsightError {
	constructor(message = 'No page is open; navigate to a URL first', options?: ErrorOptions) {
		super(message, options);
		this.name = 'SessionClosedError';
	}
}

// ── Engine ──

export class EngineFailureError extends TagsightError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'EngineFailureError';
	}
}

export class LaunchFailedError extends EngineFailureError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'LaunchFailedError';
	}
}

export class NavigationFailedError extends EngineFailureError {
	constructor(
		message: string,
		public readonly url: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = 'NavigationFailedError';
	}
}

export class MarkingFailedError extends EngineFailureError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'MarkingFailedError';
	}
}

// ── Elements & arguments ──

export class ElementNotFoundError extends TagsightError {
	public readonly elementId: number;

	constructor(elementId: number, options?: ErrorOptions) {
		super(
			`No element with ID ${elementId} in the latest marking pass; the page may have changed, take a fresh screenshot`,
			options,
		);
		this.name = 'ElementNotFoundError';
		this.elementId = elementId;
	}
}

export class InvalidArgumentError extends TagsightError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'InvalidArgumentError';
	}
}

export class PendingScreenshotError extends InvalidArgumentError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'PendingScreenshotError';
	}
}

export class SchemaViolationError extends InvalidArgumentError {
	public readonly field: string;
	public readonly issues: string[];

	constructor(field: string, issues: string[], options?: ErrorOptions) {
		super(`Validation failed for "${field}": ${issues.join('; ')}`, options);
		this.name = 'SchemaViolationError';
		this.field = field;
		this.issues = issues;
	}
}

// ── Classification ──

export type ErrorKind =
	| 'security'
	| 'redirect'
	| 'conflict'
	| 'not_found'
	| 'invalid'
	| 'closed'
	| 'engine';

export function classifyError(error: unknown): ErrorKind {
	if (error instanceof RedirectBlockedError) return 'redirect';
	if (error instanceof SecurityRejectionError) return 'security';
	if (error instanceof SessionConflictError) return 'conflict';
	if (error instanceof ElementNotFoundError) return 'not_found';
	if (error instanceof InvalidArgumentError) return 'invalid';
	if (error instanceof SessionClosedError) return 'closed';
	return 'engine';
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
