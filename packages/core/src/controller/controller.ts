import type { Config } from '../config/config.js';
import type { TagsightConfig } from '../config/types.js';
import {
	ElementNotFoundError,
	InvalidArgumentError,
	PendingScreenshotError,
	classifyError,
	errorMessage,
	type ErrorKind,
} from '../errors.js';
import { createLogger } from '../logging.js';
import { InteractionResolver, type ActionOutcome } from '../page/interaction.js';
import { Marker } from '../page/marker.js';
import { describeObservation, type Observation } from '../page/observe.js';
import { downloadImage, type FetchLike } from '../security/image-download.js';
import { type HostResolver, UrlValidator } from '../security/url-validator.js';
import type { Rect, Size, UserId } from '../types.js';
import { AsyncLock, generateId, sleep } from '../utils.js';
import { BrowserSession, type BrowserLauncher } from '../viewport/browser-session.js';
import { captureViewport, toPng } from '../viewport/capture.js';
import { EventHub } from '../viewport/event-hub.js';
import type { SessionEventMap } from '../viewport/events.js';
import { Navigator } from '../viewport/navigator.js';
import { SessionGate } from '../viewport/session-gate.js';
import type { ConfirmAction, ImageDelivery, OperationResult, SendImagesRequest } from './types.js';

const logger = createLogger('controller');

export interface BrowserControllerDeps {
	config: TagsightConfig;
	gate: SessionGate;
	session: BrowserSession;
	navigator: Navigator;
	resolver: InteractionResolver;
	validator: UrlValidator;
	delivery?: ImageDelivery;
	/** HTTP client for image downloads. */
	fetch?: FetchLike;
	clock?: () => number;
}

export interface CreateControllerOptions {
	delivery?: ImageDelivery;
	/** DNS stand-in for the URL validator. */
	hostResolver?: HostResolver;
	launcher?: BrowserLauncher;
	fetch?: FetchLike;
	/** Reclaim idle sessions on a timer instead of only at the next acquire. */
	sweepIntervalMs?: number;
	clock?: () => number;
}

/**
 * Entry point for everything an agent can do with the browser. Each call
 * names the user it acts for and first passes the session gate; errors come
 * back as failed results, and engine failures also reset the browser.
 */
export class BrowserController {
	readonly config: TagsightConfig;
	readonly gate: SessionGate;
	readonly session: BrowserSession;
	private readonly navigator: Navigator;
	private readonly resolver: InteractionResolver;
	private readonly validator: UrlValidator;
	private readonly delivery?: ImageDelivery;
	private readonly fetch?: FetchLike;
	private readonly clock: () => number;
	/** Serializes whole operations, so two calls never touch the page at once. */
	private readonly pageLock = new AsyncLock();

	constructor(deps: BrowserControllerDeps) {
		this.config = deps.config;
		this.gate = deps.gate;
		this.session = deps.session;
		this.navigator = deps.navigator;
		this.resolver = deps.resolver;
		this.validator = deps.validator;
		this.delivery = deps.delivery;
		this.fetch = deps.fetch;
		this.clock = deps.clock ?? Date.now;
	}

	static create(config: Config, options: CreateControllerOptions = {}): BrowserController {
		const events = new EventHub<SessionEventMap>({ maxHistory: 200 });
		const session = new BrowserSession({
			browser: config.browser,
			viewport: config.viewport,
			events,
			launcher: options.launcher,
		});
		const gate = new SessionGate({
			idleTimeoutMs: config.session.idleTimeoutMs,
			teardown: () => session.reset(),
			clock: options.clock,
			events,
		});
		if (options.sweepIntervalMs) {
			gate.startSweep(options.sweepIntervalMs);
		}

		const validator = UrlValidator.fromConfig(config.security, options.hostResolver);
		const marker = new Marker(config.marking, events);

		return new BrowserController({
			config: config.config,
			gate,
			session,
			navigator: new Navigator({ session, validator, marker, timing: config.timing }),
			resolver: new InteractionResolver({ session, marker, timing: config.timing, crop: config.crop }),
			validator,
			delivery: options.delivery,
			fetch: options.fetch,
			clock: options.clock,
		});
	}

	get events(): EventHub<SessionEventMap> {
		return this.session.events;
	}

	// ── Navigation & pointer ──

	navigate(user: UserId, url: string): Promise<OperationResult> {
		return this.run(user, 'navigate', async () => {
			const result = await this.navigator.navigate(url);
			return observed(`Opened "${result.title}" (${result.url}).`, result);
		});
	}

	click(user: UserId, elementId: number): Promise<OperationResult> {
		return this.run(user, 'click', async () => fromOutcome(await this.resolver.click(elementId)));
	}

	clickAt(user: UserId, x: number, y: number): Promise<OperationResult> {
		return this.run(user, 'click at', async () => fromOutcome(await this.resolver.clickAt(x, y)));
	}

	clickRelative(user: UserId, rx: number, ry: number): Promise<OperationResult> {
		return this.run(user, 'relative click', async () => fromOutcome(await this.resolver.clickRelative(rx, ry)));
	}

	clickInElement(user: UserId, elementId: number, rx: number, ry: number): Promise<OperationResult> {
		return this.run(user, 'click in element', async () =>
			fromOutcome(await this.resolver.clickInElement(elementId, rx, ry)),
		);
	}

	// ── Keyboard, scrolling, waiting ──

	input(user: UserId, elementId: number | undefined, text: string): Promise<OperationResult> {
		return this.run(user, 'input', async () => fromOutcome(await this.resolver.input(elementId, text)));
	}

	scroll(user: UserId, direction: string): Promise<OperationResult> {
		return this.run(user, 'scroll', async () => fromOutcome(await this.resolver.scroll(direction)));
	}

	wait(user: UserId, seconds: number): Promise<OperationResult> {
		return this.run(user, 'wait', async () => fromOutcome(await this.resolver.wait(seconds)));
	}

	// ── Inspection ──

	getElementInfo(user: UserId, elementId: number): Promise<OperationResult> {
		return this.run(user, 'element info', async () => fromOutcome(await this.resolver.getElementInfo(elementId)));
	}

	screenshotElement(user: UserId, elementId: number): Promise<OperationResult> {
		return this.run(user, 'element screenshot', async () =>
			fromOutcome(await this.resolver.screenshotElement(elementId)),
		);
	}

	crop(user: UserId, region: Rect, zoom: number): Promise<OperationResult> {
		return this.run(user, 'crop', async () => fromOutcome(await this.resolver.crop(region, zoom)));
	}

	grid(user: UserId): Promise<OperationResult> {
		return this.run(user, 'grid', async () => fromOutcome(await this.resolver.grid()));
	}

	pageInfo(user: UserId): Promise<OperationResult> {
		return this.run(user, 'page info', async () => {
			const page = this.session.requirePage();
			const title = await page.title();
			const url = page.url();
			const viewport = page.viewportSize() ?? this.session.viewportSize;
			return {
				ok: true,
				message: `Current page: "${title}" (${url}), viewport ${viewport.width}x${viewport.height}.`,
				data: { url, title, viewport },
			};
		});
	}

	/** Rebuilds the page at a new size; takes effect on the next navigation. */
	setViewport(user: UserId, size: Size): Promise<OperationResult> {
		return this.run(user, 'resize', async () => {
			await this.session.setViewport(size);
			return {
				ok: true,
				message: `Viewport set to ${size.width}x${size.height}; open a page to continue.`,
				data: { viewport: size },
			};
		});
	}

	// ── Screenshots for the end user ──

	requestUserScreenshot(user: UserId, clean = false): Promise<OperationResult> {
		return this.run(user, 'screenshot', async () => {
			const page = this.session.requirePage();
			await sleep(this.config.timing.userScreenshotWaitMs);
			const image = await captureViewport(page, { clean });
			const shot = {
				id: generateId(),
				userId: user,
				image,
				title: await page.title(),
				url: page.url(),
				clean,
				createdAt: this.clock(),
			};
			this.session.setPending(shot);
			return {
				ok: true,
				message: 'Screenshot ready for review. Confirm with "send" to deliver it or "cancel" to discard it.',
				image,
				data: { id: shot.id, url: shot.url, title: shot.title },
			};
		});
	}

	confirmUserScreenshot(user: UserId, action: ConfirmAction): Promise<OperationResult> {
		return this.run(user, 'confirm screenshot', async () => {
			const shot = this.session.pending;
			if (!shot) {
				throw new PendingScreenshotError('No screenshot is waiting for confirmation; take one first');
			}
			if (shot.userId !== user) {
				throw new PendingScreenshotError('Only the user who took the screenshot can confirm or cancel it');
			}

			if (action === 'cancel') {
				this.session.clearPending();
				return { ok: true, message: 'Screenshot discarded.' };
			}

			if (!this.delivery) {
				this.session.clearPending();
				return { ok: true, message: 'Screenshot released.', image: shot.image, data: { id: shot.id } };
			}

			try {
				await this.delivery.deliver({ userId: shot.userId, image: shot.image, title: shot.title, url: shot.url });
			} catch (error) {
				logger.warn(`Screenshot delivery failed: ${errorMessage(error)}`);
				return {
					ok: false,
					message: `Could not send the screenshot: ${errorMessage(error)}. It is still pending.`,
					errorKind: 'engine',
				};
			}
			this.session.clearPending();
			return { ok: true, message: 'Screenshot sent.', data: { id: shot.id } };
		});
	}

	/**
	 * Sends images found on the page or given by URL. Each one is downloaded
	 * under the URL checks and handed to the delivery; without one, the images
	 * come back in the result as PNG. One failed image does not stop the rest.
	 */
	sendImages(user: UserId, request: SendImagesRequest): Promise<OperationResult> {
		return this.run(user, 'send image', async () => {
			const urls = request.urls ?? [];
			const elementIds = request.elementIds ?? [];
			if (urls.length === 0 && elementIds.length === 0) {
				throw new InvalidArgumentError('Give at least one image URL or element ID');
			}

			const sources = urls.map((url, index) => ({ label: `Image ${index + 1}`, url }));
			const lines: string[] = [];
			const failures: ErrorKind[] = [];

			if (elementIds.length > 0) {
				this.session.requirePage();
				for (const id of elementIds) {
					try {
						const url = await this.resolver.imageSource(id);
						if (url) {
							sources.push({ label: `Element ${id}`, url });
						} else {
							lines.push(`Element ${id}: no image found on this element`);
							failures.push('not_found');
						}
					} catch (error) {
						if (!(error instanceof ElementNotFoundError)) throw error;
						lines.push(`Element ${id}: ${error.message}`);
						failures.push('not_found');
					}
				}
			}

			const referer = this.session.isOpen ? this.session.requirePage().url() : undefined;
			const images: Buffer[] = [];
			const sent: string[] = [];
			for (const source of sources) {
				try {
					const image = await downloadImage(source.url, {
						validator: this.validator,
						timeoutMs: this.config.timing.imageDownloadTimeoutMs,
						referer,
						userAgent: this.config.browser.userAgent,
						fetch: this.fetch,
					});
					if (this.delivery) {
						await this.delivery.deliver({ userId: user, image, title: source.label, url: source.url });
					} else {
						images.push(await toPng(image));
					}
					sent.push(source.url);
					lines.push(`${source.label}: sent`);
				} catch (error) {
					logger.warn(`${source.label} (${source.url}) not sent: ${errorMessage(error)}`);
					lines.push(`${source.label}: ${errorMessage(error)}`);
					failures.push(classifyError(error));
				}
			}

			const total = urls.length + elementIds.length;
			const summary = `Sent ${sent.length} of ${total} image${total === 1 ? '' : 's'}.`;
			const result: OperationResult = {
				ok: sent.length > 0,
				message: [summary, ...lines].join('\n'),
				data: { sent, failed: failures.length },
			};
			if (sent.length === 0) result.errorKind = failures[0];
			if (images.length > 0) {
				result.image = images[0];
				if (images.length > 1) result.images = images.slice(1);
			}
			return result;
		});
	}

	// ── Lifecycle ──

	/** Releases the caller's ownership, closing the browser once running operations finish. */
	close(user: UserId): Promise<OperationResult> {
		return this.pageLock.run(async () => {
			const outcome = await this.gate.release(user);
			return outcome.ok
				? { ok: true, message: outcome.message }
				: { ok: false, message: outcome.message, errorKind: 'conflict' };
		});
	}

	async shutdown(): Promise<void> {
		this.gate.stopSweep();
		await this.gate.reset('shutdown');
	}

	private run(user: UserId, label: string, fn: () => Promise<OperationResult>): Promise<OperationResult> {
		return this.pageLock.run(() => this.runExclusive(user, label, fn));
	}

	private async runExclusive(
		user: UserId,
		label: string,
		fn: () => Promise<OperationResult>,
	): Promise<OperationResult> {
		const decision = await this.gate.acquire(user);
		if (!decision.granted) {
			return {
				ok: false,
				message: decision.message,
				errorKind: 'conflict',
				data: { owner: decision.owner, remainingMs: decision.remainingMs },
			};
		}

		try {
			return await fn();
		} catch (error) {
			return this.fail(label, error);
		}
	}

	private async fail(label: string, error: unknown): Promise<OperationResult> {
		const kind = classifyError(error);
		const message = errorMessage(error);

		if (kind !== 'engine') {
			logger.warn(`${label} refused (${kind}): ${message}`);
			return { ok: false, message, errorKind: kind };
		}

		logger.error(`${label} failed: ${message}`);
		await this.session.reset();
		return {
			ok: false,
			message: `Browser error during ${label}: ${message}. The browser was reset; open the page again to continue.`,
			errorKind: kind,
		};
	}
}

function observed(message: string, observation: Observation): OperationResult {
	return {
		ok: true,
		message: `${message} ${describeObservation(observation)}`,
		image: observation.image,
		data: {
			url: observation.url,
			title: observation.title,
			elements: observation.report.elements.map((element) => ({
				id: element.id,
				tag: element.tag,
				text: element.text,
				capability: element.capability,
			})),
		},
	};
}

function fromOutcome(outcome: ActionOutcome): OperationResult {
	if (outcome.observation) {
		const result = observed(outcome.message, outcome.observation);
		return outcome.data ? { ...result, data: { ...result.data, ...outcome.data } } : result;
	}
	return { ok: true, message: outcome.message, image: outcome.image, data: outcome.data };
}
