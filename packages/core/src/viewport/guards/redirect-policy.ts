import type { Route } from 'playwright';
import { errorMessage } from '../../errors.js';
import { createLogger } from '../../logging.js';
import type { UrlValidator, ValidationVerdict } from '../../security/url-validator.js';
import { BaseGuard } from '../guard-base.js';

const logger = createLogger('guard:redirect-policy');

export interface BlockedHop {
	url: string;
	reason: string;
}

/**
 * Re-validates every navigation request while a navigation is in flight, so
 * a redirect to an internal address is aborted before it is fetched. A
 * validator that throws counts as a rejection.
 */
export class RedirectPolicyGuard extends BaseGuard {
	readonly name = 'redirect-policy';

	private readonly validator: UrlValidator;
	private readonly requestedUrl: string;
	private firstBlocked: BlockedHop | null = null;

	constructor(validator: UrlValidator, requestedUrl: string) {
		super();
		this.validator = validator;
		this.requestedUrl = requestedUrl;
	}

	/** First main-frame hop that was refused, if any. */
	get blocked(): BlockedHop | null {
		return this.firstBlocked;
	}

	protected async setup(): Promise<void> {
		const { page, events } = this.ctx;

		const handler = async (route: Route) => {
			const request = route.request();
			if (!request.isNavigationRequest()) {
				await route.continue();
				return;
			}

			const url = request.url();
			let verdict: ValidationVerdict;
			try {
				verdict = await this.validator.validate(url);
			} catch (error) {
				verdict = { safe: false, reason: `validation failed: ${errorMessage(error)}` };
			}

			if (verdict.safe) {
				await route.continue();
				return;
			}

			const mainFrame = request.frame() === page.mainFrame();
			if (mainFrame && !this.firstBlocked) {
				this.firstBlocked = { url, reason: verdict.reason };
			}
			logger.warn(`Blocked ${mainFrame ? 'navigation' : 'frame navigation'} to ${url}: ${verdict.reason}`);
			events.emit('navigation-blocked', {
				requestedUrl: this.requestedUrl,
				blockedUrl: url,
				reason: verdict.reason,
			});
			await route.abort('blockedbyclient');
		};

		await page.route('**/*', handler);
		this.cleanupFns.push(() => page.unroute('**/*', handler));
	}
}
