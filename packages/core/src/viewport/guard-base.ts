import type { Page } from 'playwright';
import { errorMessage } from '../errors.js';
import { createLogger } from '../logging.js';
import type { EventHub } from './event-hub.js';
import type { SessionEventMap } from './events.js';

const logger = createLogger('guard');

export interface GuardContext {
	page: Page;
	events: EventHub<SessionEventMap>;
}

/**
 * Base class for page guards: objects that hook into a page for the span of
 * one operation and remove every hook again on detach.
 */
export abstract class BaseGuard {
	private context: GuardContext | null = null;
	protected cleanupFns: Array<() => void | Promise<void>> = [];

	abstract readonly name: string;

	get active(): boolean {
		return this.context !== null;
	}

	protected get ctx(): GuardContext {
		if (!this.context) {
			throw new Error(`Guard "${this.name}" is not attached`);
		}
		return this.context;
	}

	async attach(ctx: GuardContext): Promise<void> {
		this.context = ctx;
		await this.setup();
	}

	async detach(): Promise<void> {
		if (!this.context) return;
		for (const cleanup of this.cleanupFns) {
			try {
				await cleanup();
			} catch (error) {
				logger.debug(`Cleanup of guard "${this.name}" failed: ${errorMessage(error)}`);
			}
		}
		this.cleanupFns = [];
		await this.teardown();
		this.context = null;
	}

	protected abstract setup(): Promise<void>;

	protected async teardown(): Promise<void> {}
}
