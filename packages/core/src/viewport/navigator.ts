import type { TimingConfig } from '../config/types.js';
import {
	NavigationFailedError,
	RedirectBlockedError,
	SecurityRejectionError,
	errorMessage,
} from '../errors.js';
import { createLogger } from '../logging.js';
import type { Marker } from '../page/marker.js';
import { observe, type Observation } from '../page/observe.js';
import { type UrlValidator, withDefaultScheme } from '../security/url-validator.js';
import { sleep } from '../utils.js';
import type { BrowserSession } from './browser-session.js';
import { RedirectPolicyGuard } from './guards/redirect-policy.js';

const logger = createLogger('navigator');

export interface NavigatorDeps {
	session: BrowserSession;
	validator: UrlValidator;
	marker: Marker;
	timing: Pick<TimingConfig, 'navigationTimeoutMs' | 'navigationSettleMs'>;
}

export interface NavigationResult extends Observation {
	requestedUrl: string;
}

/**
 * Opens a URL with every hop checked: the input before the browser is
 * touched, each navigation request while it is in flight, and the URL the
 * page finally landed on.
 */
export class Navigator {
	private readonly deps: NavigatorDeps;

	constructor(deps: NavigatorDeps) {
		this.deps = deps;
	}

	async navigate(input: string): Promise<NavigationResult> {
		const { session, validator, marker, timing } = this.deps;
		const url = withDefaultScheme(input);

		const verdict = await validator.validate(url);
		if (!verdict.safe) {
			logger.warn(`Rejected ${url}: ${verdict.reason}`);
			throw new SecurityRejectionError(url, verdict.reason);
		}

		const page = await session.ensurePage();
		const guard = new RedirectPolicyGuard(validator, url);
		await guard.attach({ page, events: session.events });

		try {
			try {
				await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timing.navigationTimeoutMs });
			} catch (error) {
				const blocked = guard.blocked;
				if (blocked) {
					throw new RedirectBlockedError(url, blocked.url, blocked.reason, { cause: error });
				}
				throw new NavigationFailedError(`Navigation to ${url} failed: ${errorMessage(error)}`, url, {
					cause: error,
				});
			}

			await sleep(timing.navigationSettleMs);

			const blocked = guard.blocked;
			if (blocked) {
				throw new RedirectBlockedError(url, blocked.url, blocked.reason);
			}

			const finalUrl = page.url();
			if (finalUrl !== url) {
				const finalVerdict = await validator.validate(finalUrl);
				if (!finalVerdict.safe) {
					await this.leave(finalUrl);
					session.events.emit('navigation-blocked', {
						requestedUrl: url,
						blockedUrl: finalUrl,
						reason: finalVerdict.reason,
					});
					throw new RedirectBlockedError(url, finalUrl, finalVerdict.reason);
				}
			}
		} finally {
			await guard.detach();
		}

		const observation = await observe(page, marker);
		session.events.emit('navigation-completed', { url: observation.url, title: observation.title });
		logger.info(`Opened ${observation.url} (${observation.report.total} marks)`);
		return { ...observation, requestedUrl: url };
	}

	/** Moves off a page that ended somewhere it must not stay. */
	private async leave(unsafeUrl: string): Promise<void> {
		try {
			await this.deps.session.requirePage().goto('about:blank');
		} catch (error) {
			logger.debug(`Could not leave ${unsafeUrl}: ${errorMessage(error)}`);
		}
	}
}
