import { clearInterval, setInterval } from 'node:timers';
import { SessionConflictError } from '../errors.js';
import { createLogger } from '../logging.js';
import type { UserId } from '../types.js';
import { AsyncLock } from '../utils.js';
import type { EventHub } from './event-hub.js';
import type { SessionEventMap } from './events.js';

const logger = createLogger('session-gate');

export interface GateDecision {
	granted: boolean;
	message: string;
	/** Set when denied: time until the current owner's session idles out. */
	remainingMs?: number;
	owner?: UserId;
}

export interface ReleaseOutcome {
	ok: boolean;
	message: string;
}

export interface GateStatus {
	owner: UserId | null;
	lastActive: number | null;
	idleMs: number | null;
	remainingMs: number | null;
}

export interface SessionGateOptions {
	idleTimeoutMs: number;
	/** Closes every browser resource; called on release, reclamation and reset. */
	teardown: () => Promise<void>;
	clock?: () => number;
	events?: EventHub<SessionEventMap>;
}

/**
 * Serializes access to the single browser between logical users.
 *
 * Idle ─acquire(u)─▶ Owned(u) ─release(u) | idle timeout─▶ Idle
 *
 * A stale owner is only reclaimed when someone next calls `acquire`, unless
 * the optional sweep is running.
 */
export class SessionGate {
	private owner: UserId | null = null;
	private lastActive = 0;
	private readonly lock = new AsyncLock();
	private readonly idleTimeoutMs: number;
	private readonly teardown: () => Promise<void>;
	private readonly clock: () => number;
	private readonly events?: EventHub<SessionEventMap>;
	private sweepTimer: NodeJS.Timeout | null = null;

	constructor(options: SessionGateOptions) {
		this.idleTimeoutMs = options.idleTimeoutMs;
		this.teardown = options.teardown;
		this.clock = options.clock ?? Date.now;
		this.events = options.events;
	}

	get currentOwner(): UserId | null {
		return this.owner;
	}

	isOwner(user: UserId): boolean {
		return this.owner === user;
	}

	acquire(user: UserId): Promise<GateDecision> {
		return this.lock.run(async () => {
			await this.reclaimIfIdle();

			const now = this.clock();
			if (this.owner === null) {
				this.owner = user;
				this.lastActive = now;
				logger.info(`Session acquired by ${user}`);
				this.events?.emit('session-acquired', { userId: user, refreshed: false });
				return { granted: true, message: 'Browser control acquired.' };
			}

			if (this.owner === user) {
				this.lastActive = now;
				this.events?.emit('session-acquired', { userId: user, refreshed: true });
				return { granted: true, message: 'Continuing session.' };
			}

			const remainingMs = Math.max(1, this.idleTimeoutMs - (now - this.lastActive));
			const conflict = new SessionConflictError(this.owner, remainingMs);
			logger.debug(`Denied ${user}: ${conflict.message}`);
			return { granted: false, message: conflict.message, remainingMs, owner: this.owner };
		});
	}

	/** Like `acquire`, but throws `SessionConflictError` when denied. */
	async acquireOrThrow(user: UserId): Promise<void> {
		const decision = await this.acquire(user);
		if (!decision.granted) {
			throw new SessionConflictError(decision.owner ?? 'another user', decision.remainingMs ?? this.idleTimeoutMs);
		}
	}

	release(user: UserId): Promise<ReleaseOutcome> {
		return this.lock.run(async () => {
			if (this.owner === null) {
				return { ok: true, message: 'The browser is not in use.' };
			}

			if (this.owner !== user) {
				return { ok: false, message: `Cannot release: the browser is owned by ${this.owner}.` };
			}

			await this.clear('released');
			logger.info(`Session released by ${user}`);
			this.events?.emit('session-released', { userId: user });
			return { ok: true, message: 'Browser control released.' };
		});
	}

	/** Drops ownership and tears down resources regardless of who owns the session. */
	reset(reason = 'reset'): Promise<void> {
		return this.lock.run(() => this.clear(reason));
	}

	status(): GateStatus {
		if (this.owner === null) {
			return { owner: null, lastActive: null, idleMs: null, remainingMs: null };
		}
		const idleMs = this.clock() - this.lastActive;
		return {
			owner: this.owner,
			lastActive: this.lastActive,
			idleMs,
			remainingMs: Math.max(0, this.idleTimeoutMs - idleMs),
		};
	}

	/** Periodically reclaims an idle session instead of waiting for the next acquire. */
	startSweep(intervalMs: number): void {
		this.stopSweep();
		this.sweepTimer = setInterval(() => {
			this.lock.run(() => this.reclaimIfIdle()).catch((error: unknown) => {
				logger.warn(`Idle sweep failed: ${error}`);
			});
		}, intervalMs);
		this.sweepTimer.unref();
	}

	stopSweep(): void {
		if (this.sweepTimer) {
			clearInterval(this.sweepTimer);
			this.sweepTimer = null;
		}
	}

	private async reclaimIfIdle(): Promise<void> {
		if (this.owner === null) return;

		const idleMs = this.clock() - this.lastActive;
		if (idleMs <= this.idleTimeoutMs) return;

		const previousOwner = this.owner;
		logger.info(`Session of ${previousOwner} idle for ${Math.round(idleMs / 1000)}s, reclaiming`);
		await this.clear('idle timeout');
		this.events?.emit('session-reclaimed', { previousOwner, idleMs });
	}

	private async clear(reason: string): Promise<void> {
		this.owner = null;
		this.lastActive = 0;
		try {
			await this.teardown();
		} finally {
			this.events?.emit('session-reset', { reason });
		}
	}
}
